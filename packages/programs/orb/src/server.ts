import { TypedEventEmitter } from "@libp2p/interface";
import type { PubSub } from "@orbcomm/pubsub-interface";
import { RPC, type RequestContext } from "@orbcomm/rpc";
import { delay } from "@orbcomm/time";
import {
	type Action,
	type ActionRegistry,
	type CommandDefinition,
	type CommandKind,
	QueryKind,
	defaultRegistry,
} from "./actions.js";
import {
	ActionRequest,
	DeviceIdentity,
	DiscoveryProbe,
	FailureReply,
	Reply,
	SuccessReply,
} from "./encoding.js";
import { UnknownActionError } from "./errors.js";
import type { CommandExecutor } from "./executor.js";
import { logger } from "./logger.js";
import {
	ANNOUNCE_TOPIC,
	DISCOVERY_TOPIC,
	deviceTopicPattern,
	validateDeviceId,
} from "./topics.js";

export type DeviceProperties = {
	id: string;
	name: string;
	hardwareVersion: string;
};

export type OrbServerOptions = {
	pubsub: PubSub;
	properties: DeviceProperties;
	executor: CommandExecutor;
	registry?: ActionRegistry;

	/** Re-announce the identity every `announceInterval` ms. Off when unset */
	announceInterval?: number;

	/** How long {@link OrbServer.close} waits for handlers still running */
	closeTimeout?: number;
};

export type ServerStatus = "closed" | "open";

export type RequestEvent = {
	topic: string;
	action: Action;
};

export type ReplyEvent = {
	topic: string;
	reply: Reply;
};

export interface OrbServerEvents {
	request: CustomEvent<RequestEvent>;
	reply: CustomEvent<ReplyEvent>;
}

const DEFAULT_CLOSE_TIMEOUT = 5 * 1000;

/**
 * Answers discovery probes, queries and commands addressed to one device
 */
export class OrbServer {
	readonly events = new TypedEventEmitter<OrbServerEvents>();
	readonly identity: DeviceIdentity;

	private pubsub: PubSub;
	private properties: DeviceProperties;
	private registry: ActionRegistry;
	private executor: CommandExecutor;
	private announceInterval?: number;
	private closeTimeout: number;

	private discovery?: RPC<DiscoveryProbe, DeviceIdentity>;
	private actions?: RPC<ActionRequest, Reply>;
	private announcer?: RPC<DeviceIdentity, DeviceIdentity>;
	private announceTimer?: ReturnType<typeof setInterval>;
	private inFlight: Set<Promise<void>> = new Set();
	private exclusive: Promise<void> = Promise.resolve();

	constructor(options: OrbServerOptions) {
		this.pubsub = options.pubsub;
		this.properties = {
			...options.properties,
			id: validateDeviceId(options.properties.id),
		};
		this.registry = options.registry ?? defaultRegistry;
		this.executor = options.executor;
		this.announceInterval = options.announceInterval;
		this.closeTimeout = options.closeTimeout ?? DEFAULT_CLOSE_TIMEOUT;
		this.identity = new DeviceIdentity({
			id: this.properties.id,
			name: this.properties.name,
			hardwareVersion: this.properties.hardwareVersion,
		});
	}

	get id(): string {
		return this.properties.id;
	}

	get status(): ServerStatus {
		return this.actions ? "open" : "closed";
	}

	async open(): Promise<void> {
		if (this.actions) {
			throw new Error("Already open");
		}

		const discovery = new RPC<DiscoveryProbe, DeviceIdentity>(this.pubsub);
		const actions = new RPC<ActionRequest, Reply>(this.pubsub);
		const announcer = new RPC<DeviceIdentity, DeviceIdentity>(this.pubsub);
		this.discovery = discovery;
		this.actions = actions;
		this.announcer = announcer;

		await discovery.open({
			topic: DISCOVERY_TOPIC,
			queryType: DiscoveryProbe,
			responseType: DeviceIdentity,
			responseHandler: (probe) => {
				logger.debug(`discovery probe from ${probe.from}`);
				return this.identity;
			},
		});
		await actions.open({
			topic: deviceTopicPattern(this.id),
			queryType: ActionRequest,
			responseType: Reply,
			responseHandler: (request, context) =>
				this.track(this.handleAction(request, context)),
			invalidRequestHandler: (error, context) =>
				this.invalidRequest(error, context),
		});
		await announcer.open({
			queryType: DeviceIdentity,
			responseType: DeviceIdentity,
		});

		logger.info(`orb ${this.id} listening on ${deviceTopicPattern(this.id)}`);

		await this.announce();
		if (this.announceInterval) {
			this.announceTimer = setInterval(() => {
				this.announce().catch((error) => {
					logger.warn(
						"failed to announce: " +
							(error instanceof Error ? error.message : String(error)),
					);
				});
			}, this.announceInterval);
		}
	}

	/**
	 * Publish the identity on the announcement topic
	 */
	async announce(): Promise<void> {
		if (!this.announcer) {
			throw new Error("Not open");
		}
		await this.announcer.send(this.identity, { topic: ANNOUNCE_TOPIC });
	}

	async close(): Promise<void> {
		if (!this.actions) {
			return;
		}
		clearInterval(this.announceTimer);
		this.announceTimer = undefined;

		const rpcs = [this.discovery, this.actions, this.announcer];
		this.discovery = undefined;
		this.actions = undefined;
		this.announcer = undefined;
		await Promise.all(rpcs.map((rpc) => rpc?.close()));

		if (this.inFlight.size > 0) {
			const controller = new AbortController();
			const timedOut = await Promise.race([
				Promise.allSettled(this.inFlight).then(() => false),
				delay(this.closeTimeout, { signal: controller.signal }).then(
					() => true,
				),
			]);
			controller.abort();
			if (timedOut) {
				logger.warn(
					`abandoning ${this.inFlight.size} request(s) still running after ${this.closeTimeout}ms`,
				);
			}
		}
		logger.info(`orb ${this.id} closed`);
	}

	private track<T>(promise: Promise<T>): Promise<T> {
		const settled = promise.then(
			() => undefined,
			() => undefined,
		);
		this.inFlight.add(settled);
		void settled.then(() => this.inFlight.delete(settled));
		return promise;
	}

	private async handleAction(
		request: ActionRequest,
		context: RequestContext<Reply>,
	): Promise<Reply | undefined> {
		let action: Action;
		try {
			const resolved = this.registry.resolve(context.topic);
			if (resolved.deviceId !== this.id) {
				return undefined;
			}
			action = resolved.action;
		} catch (error) {
			if (error instanceof UnknownActionError) {
				return this.reply(
					context.topic,
					new FailureReply({ kind: error.kind, message: error.message }),
				);
			}
			throw error;
		}

		logger.debug(
			`${this.registry.format(action)} from ${request.from} on ${context.topic}`,
		);
		this.events.dispatchEvent(
			new CustomEvent("request", {
				detail: { topic: context.topic, action },
			}),
		);

		if (action.type === "query") {
			return this.reply(
				context.topic,
				new SuccessReply({ payload: this.lookup(action.kind) }),
			);
		}

		const definition = this.registry.command(action.kind);
		try {
			// disruptive effects reply as soon as they have started
			const ack = await this.run(action.kind, definition);
			return this.reply(context.topic, new SuccessReply({ payload: ack }));
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			logger.error(`${definition.token} failed: ${message}`);
			return this.reply(
				context.topic,
				new FailureReply({ kind: "ExecutionError", message }),
			);
		}
	}

	private invalidRequest(error: unknown, context: RequestContext<Reply>): Reply {
		logger.debug(
			`malformed request on ${context.topic}: ` +
				(error instanceof Error ? error.message : String(error)),
		);
		return this.reply(
			context.topic,
			new FailureReply({
				kind: "InvalidRequest",
				message: "Malformed request on " + context.topic,
			}),
		);
	}

	private lookup(kind: QueryKind): string {
		switch (kind) {
			case QueryKind.Name:
				return this.properties.name;
			case QueryKind.Id:
				return this.properties.id;
			case QueryKind.HardwareVersion:
				return this.properties.hardwareVersion;
		}
	}

	private run(
		kind: CommandKind,
		definition: CommandDefinition,
	): Promise<string> {
		const execute = () =>
			this.executor.execute(kind, { detach: definition.disruptive });
		if (!definition.exclusive) {
			return execute();
		}
		const result = this.exclusive.then(execute);
		// the queue only orders executions, callers observe the outcome
		this.exclusive = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	private reply(topic: string, reply: Reply): Reply {
		this.events.dispatchEvent(
			new CustomEvent("reply", { detail: { topic, reply } }),
		);
		return reply;
	}
}
