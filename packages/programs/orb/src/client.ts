import type { PubSub } from "@orbcomm/pubsub-interface";
import { MalformedResponseError, RPC } from "@orbcomm/rpc";
import { AbortError } from "@orbcomm/time";
import { v4 as uuid } from "uuid";
import {
	type Action,
	type ActionRegistry,
	CommandKind,
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
import {
	AmbiguousOutcomeError,
	ExecutionError,
	InvalidRequestError,
	NoResponseError,
	type OrbError,
	TransportError,
	UnknownActionError,
} from "./errors.js";
import { logger } from "./logger.js";
import {
	ANNOUNCE_TOPIC,
	DISCOVERY_TOPIC,
	replyInbox,
	validateDeviceId,
} from "./topics.js";

export const DEFAULT_DISCOVERY_TIMEOUT = 2 * 1000;
export const DEFAULT_REQUEST_TIMEOUT = 5 * 1000;

export type OrbClientOptions = {
	pubsub: PubSub;
	registry?: ActionRegistry;

	/** Names the reply inboxes of this client. Random when unset */
	session?: string;
};

export type RequestOptions = {
	timeout?: number;
	signal?: AbortSignal;
};

const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

const toRemoteError = (reply: FailureReply): OrbError => {
	switch (reply.kind) {
		case "UnknownAction":
			return new UnknownActionError(reply.message);
		case "ExecutionError":
			return new ExecutionError(reply.message);
		case "InvalidRequest":
			return new InvalidRequestError(reply.message);
		default:
			return new TransportError(
				`Unexpected failure kind '${reply.kind}': ${reply.message}`,
			);
	}
};

/**
 * Discovers, queries and commands orbs
 */
export class OrbClient {
	readonly session: string;

	private pubsub: PubSub;
	private registry: ActionRegistry;
	private discovery?: RPC<DiscoveryProbe, DeviceIdentity>;
	private actions?: RPC<ActionRequest, Reply>;
	private watchers: Set<RPC<DeviceIdentity, DeviceIdentity>> = new Set();

	constructor(options: OrbClientOptions) {
		this.pubsub = options.pubsub;
		this.registry = options.registry ?? defaultRegistry;
		this.session = options.session ?? uuid();
	}

	async open(): Promise<void> {
		if (this.actions) {
			throw new Error("Already open");
		}
		const discovery = new RPC<DiscoveryProbe, DeviceIdentity>(this.pubsub);
		const actions = new RPC<ActionRequest, Reply>(this.pubsub);
		await discovery.open({
			inbox: replyInbox(this.session, "discover"),
			queryType: DiscoveryProbe,
			responseType: DeviceIdentity,
		});
		await actions.open({
			inbox: replyInbox(this.session),
			queryType: ActionRequest,
			responseType: Reply,
		});
		this.discovery = discovery;
		this.actions = actions;
	}

	async close(): Promise<void> {
		const rpcs = [this.discovery, this.actions, ...this.watchers];
		this.discovery = undefined;
		this.actions = undefined;
		this.watchers.clear();
		await Promise.all(rpcs.map((rpc) => rpc?.close()));
	}

	/**
	 * Ids of the devices that answered a probe within `timeout`. Always waits
	 * for the whole window.
	 */
	async discover(
		timeout = DEFAULT_DISCOVERY_TIMEOUT,
		options?: { signal?: AbortSignal },
	): Promise<Set<string>> {
		const devices = await this.discoverDevices(timeout, options);
		return new Set(devices.map((device) => device.id));
	}

	/**
	 * Identities of the devices that answered a probe, one per id
	 */
	async discoverDevices(
		timeout = DEFAULT_DISCOVERY_TIMEOUT,
		options?: { signal?: AbortSignal },
	): Promise<DeviceIdentity[]> {
		const discovery = this.assertOpen(this.discovery);
		const responses = await this.transport(() =>
			discovery.request(new DiscoveryProbe({ from: this.session }), {
				topic: DISCOVERY_TOPIC,
				timeout,
				signal: options?.signal,
			}),
		);

		const devices = new Map<string, DeviceIdentity>();
		for (const { response } of responses) {
			if (!devices.has(response.id)) {
				devices.set(response.id, response);
			}
		}
		logger.debug(
			`discovered ${devices.size} device(s) from ${responses.length} replies`,
		);
		return [...devices.values()];
	}

	/**
	 * @param query a {@link QueryKind} or its token, e.g. `hardware_version`
	 * @returns the queried value
	 */
	async query(
		deviceId: string,
		query: QueryKind | string,
		options?: RequestOptions,
	): Promise<string> {
		const kind =
			typeof query === "string" ? this.registry.parseQuery(query) : query;
		return this.request(deviceId, { type: "query", kind }, options);
	}

	/**
	 * @param command a {@link CommandKind} or its token, e.g. `reset_gimbal`
	 * @returns the device's acknowledgement
	 */
	async command(
		deviceId: string,
		command: CommandKind | string,
		options?: RequestOptions,
	): Promise<string> {
		const kind =
			typeof command === "string"
				? this.registry.parseCommand(command)
				: command;
		return this.request(deviceId, { type: "command", kind }, options);
	}

	/**
	 * Calls `onAnnounce` for every identity devices announce from now on
	 * @returns a function that stops watching
	 */
	async watch(
		onAnnounce: (device: DeviceIdentity) => void,
	): Promise<() => Promise<void>> {
		this.assertOpen(this.actions);
		const watcher = new RPC<DeviceIdentity, DeviceIdentity>(this.pubsub);
		await watcher.open({
			topic: ANNOUNCE_TOPIC,
			queryType: DeviceIdentity,
			responseType: DeviceIdentity,
			responseHandler: (device) => {
				onAnnounce(device);
				return undefined;
			},
		});
		this.watchers.add(watcher);
		return async () => {
			this.watchers.delete(watcher);
			await watcher.close();
		};
	}

	private async request(
		deviceId: string,
		action: Action,
		options?: RequestOptions,
	): Promise<string> {
		const topic = this.registry.topicFor(validateDeviceId(deviceId), action);
		const actions = this.assertOpen(this.actions);
		const timeout = options?.timeout ?? DEFAULT_REQUEST_TIMEOUT;

		const responses = await this.transport(() =>
			actions.request(new ActionRequest({ from: this.session }), {
				topic,
				timeout,
				amount: 1,
				signal: options?.signal,
			}),
		);

		const reply = responses[0]?.response;
		if (reply == null) {
			const what = this.registry.format(action);
			if (action.type === "command") {
				throw new AmbiguousOutcomeError(
					`No reply to ${what} from '${deviceId}' within ${timeout}ms. The command may or may not have been executed`,
				);
			}
			throw new NoResponseError(
				`No reply to ${what} from '${deviceId}' within ${timeout}ms`,
			);
		}
		if (reply instanceof SuccessReply) {
			return reply.payload;
		}
		if (reply instanceof FailureReply) {
			throw toRemoteError(reply);
		}
		throw new TransportError(`Unexpected reply from '${deviceId}'`);
	}

	private async transport<T>(fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			if (error instanceof AbortError) {
				throw error;
			}
			if (error instanceof MalformedResponseError) {
				throw new TransportError(error.message, { cause: error });
			}
			throw new TransportError("Transport failure: " + errorMessage(error), {
				cause: error,
			});
		}
	}

	private assertOpen<T>(rpc: T | undefined): T {
		if (rpc == null) {
			throw new Error("Not open");
		}
		return rpc;
	}
}
