import { TypedEventEmitter } from "@libp2p/interface";
import { logger as loggerFn } from "@orbcomm/logger";
import {
	DataEvent,
	MULTI_WILDCARD,
	type PubSub,
	PubSubClosedError,
	type PubSubEvents,
	SINGLE_WILDCARD,
	Subscriptions,
	TOPIC_SEPARATOR,
	matchesTopic,
	validateTopic,
} from "@orbcomm/pubsub-interface";
import { type IClientOptions, connectAsync } from "mqtt";
import { v4 as uuid } from "uuid";

const logger = loggerFn({ module: "pubsub-mqtt" });

export type QoS = 0 | 1 | 2;

export const DEFAULT_CONNECT_TIMEOUT = 5 * 1000;

type MessageListener = (topic: string, payload: Buffer) => void;

/**
 * The part of mqtt's `MqttClient` this transport relies on
 */
export interface MqttConnection {
	subscribeAsync(topic: string, options: { qos: QoS }): Promise<unknown>;
	unsubscribeAsync(topic: string): Promise<unknown>;
	publishAsync(
		topic: string,
		message: Buffer,
		options: { qos: QoS },
	): Promise<unknown>;
	on(event: "message", listener: MessageListener): unknown;
	removeListener(event: "message", listener: MessageListener): unknown;
	endAsync(): Promise<void>;
}

export type MqttPubSubOptions = {
	id?: string;
	qos?: QoS;
};

/**
 * Maps a topic pattern onto an MQTT topic filter
 */
export const toMqttFilter = (pattern: string): string =>
	pattern
		.split(TOPIC_SEPARATOR)
		.map((segment) =>
			segment === MULTI_WILDCARD
				? "#"
				: segment === SINGLE_WILDCARD
					? "+"
					: segment,
		)
		.join(TOPIC_SEPARATOR);

export class MqttPubSub
	extends TypedEventEmitter<PubSubEvents>
	implements PubSub
{
	readonly id: string;
	private client: MqttConnection;
	private qos: QoS;
	private subscriptions: Subscriptions = new Subscriptions();
	private closed = false;
	private onMessageBound: MessageListener;

	constructor(client: MqttConnection, options?: MqttPubSubOptions) {
		super();
		this.client = client;
		this.id = options?.id ?? uuid();
		this.qos = options?.qos ?? 0;
		this.onMessageBound = this.onMessage.bind(this);
		this.client.on("message", this.onMessageBound);
	}

	/**
	 * Connects to a broker. Fails once the first attempt fails, or after
	 * `connectTimeout` ms without a CONNACK.
	 */
	static async connect(
		url: string,
		options?: MqttPubSubOptions & {
			connectTimeout?: number;
			client?: IClientOptions;
		},
	): Promise<MqttPubSub> {
		const id = options?.id ?? uuid();
		const client = await connectAsync(
			url,
			{
				clientId: "orbcomm_" + id,
				connectTimeout: options?.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
				...options?.client,
			},
			false,
		);
		logger.debug(`connected to ${url}`);
		return new MqttPubSub(client, { ...options, id });
	}

	async subscribe(pattern: string): Promise<void> {
		this.assertOpen();
		if (this.subscriptions.add(pattern)) {
			try {
				await this.client.subscribeAsync(toMqttFilter(pattern), {
					qos: this.qos,
				});
			} catch (error) {
				this.subscriptions.remove(pattern);
				throw error;
			}
			logger.debug(`subscribed to ${pattern}`);
		}
	}

	async unsubscribe(pattern: string): Promise<boolean> {
		if (!this.subscriptions.remove(pattern)) {
			return false;
		}
		if (!this.closed) {
			await this.client.unsubscribeAsync(toMqttFilter(pattern));
		}
		return true;
	}

	async publish(topic: string, data: Uint8Array): Promise<void> {
		this.assertOpen();
		await this.client.publishAsync(validateTopic(topic), Buffer.from(data), {
			qos: this.qos,
		});
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.subscriptions.clear();
		this.client.removeListener("message", this.onMessageBound);
		await this.client.endAsync();
	}

	private onMessage(topic: string, payload: Buffer) {
		// messages for a filter we just left may still be in flight
		const subscribed = this.subscriptions
			.patterns()
			.some((pattern) => matchesTopic(pattern, topic));
		if (!subscribed) {
			return;
		}
		this.dispatchEvent(
			new CustomEvent("data", {
				detail: new DataEvent({ topic, data: new Uint8Array(payload) }),
			}),
		);
	}

	private assertOpen() {
		if (this.closed) {
			throw new PubSubClosedError();
		}
	}
}
