import { TypedEventEmitter } from "@libp2p/interface";
import { logger as loggerFn } from "@orbcomm/logger";
import {
	DataEvent,
	type PubSub,
	PubSubClosedError,
	type PubSubEvents,
	Subscriptions,
	matchesTopic,
	validateTopic,
} from "@orbcomm/pubsub-interface";
import { v4 as uuid } from "uuid";

const logger = loggerFn({ module: "pubsub-memory" });

export type Latency =
	| number
	| ((from: MemoryPubSub, to: MemoryPubSub) => number);

export type MemoryNetworkOptions = {
	/** Delivery delay in milliseconds, per message and receiver */
	latency?: Latency;
};

/**
 * A broker-less bus connecting every {@link MemoryPubSub} created from it.
 * Deliveries are asynchronous, like on a real network.
 */
export class MemoryNetwork {
	private nodes: Set<MemoryPubSub> = new Set();
	private latency: Latency;
	private pending: Set<ReturnType<typeof setTimeout>> = new Set();

	constructor(options?: MemoryNetworkOptions) {
		this.latency = options?.latency ?? 0;
	}

	connect(id?: string): MemoryPubSub {
		const node = new MemoryPubSub(this, id ?? uuid());
		this.nodes.add(node);
		return node;
	}

	get peers(): MemoryPubSub[] {
		return [...this.nodes];
	}

	/** @internal */
	disconnect(node: MemoryPubSub) {
		this.nodes.delete(node);
	}

	/** @internal */
	route(from: MemoryPubSub, topic: string, data: Uint8Array) {
		for (const node of this.nodes) {
			if (!node.isSubscribedTo(topic)) {
				continue;
			}
			const ms =
				typeof this.latency === "function"
					? this.latency(from, node)
					: this.latency;
			const timer = setTimeout(() => {
				this.pending.delete(timer);
				node.deliver(topic, data.slice());
			}, ms);
			this.pending.add(timer);
		}
	}

	/**
	 * Closes every connection and drops messages still in flight
	 */
	async stop() {
		for (const timer of this.pending) {
			clearTimeout(timer);
		}
		this.pending.clear();
		await Promise.all([...this.nodes].map((node) => node.close()));
	}
}

export class MemoryPubSub
	extends TypedEventEmitter<PubSubEvents>
	implements PubSub
{
	readonly id: string;
	private subscriptions: Subscriptions = new Subscriptions();
	private network: MemoryNetwork;
	private closed = false;

	constructor(network: MemoryNetwork, id: string) {
		super();
		this.network = network;
		this.id = id;
	}

	subscribe(pattern: string): void {
		this.assertOpen();
		if (this.subscriptions.add(pattern)) {
			logger.debug(`${this.id} subscribed to ${pattern}`);
		}
	}

	unsubscribe(pattern: string): boolean {
		return this.subscriptions.remove(pattern);
	}

	publish(topic: string, data: Uint8Array): void {
		this.assertOpen();
		this.network.route(this, validateTopic(topic), data);
	}

	isSubscribedTo(topic: string): boolean {
		return (
			!this.closed &&
			this.subscriptions
				.patterns()
				.some((pattern) => matchesTopic(pattern, topic))
		);
	}

	/** @internal */
	deliver(topic: string, data: Uint8Array) {
		if (!this.isSubscribedTo(topic)) {
			return;
		}
		this.dispatchEvent(
			new CustomEvent("data", { detail: new DataEvent({ topic, data }) }),
		);
	}

	get isClosed(): boolean {
		return this.closed;
	}

	async close(): Promise<void> {
		this.closed = true;
		this.subscriptions.clear();
		this.network.disconnect(this);
	}

	private assertOpen() {
		if (this.closed) {
			throw new PubSubClosedError();
		}
	}
}
