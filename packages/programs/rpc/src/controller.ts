import {
	type AbstractType,
	BorshError,
	deserialize,
	serialize,
} from "@dao-xyz/borsh";
import { TypedEventEmitter } from "@libp2p/interface";
import {
	type DataEvent,
	type PubSub,
	joinTopic,
	matchesTopic,
	validatePattern,
	validateTopic,
} from "@orbcomm/pubsub-interface";
import { AbortError } from "@orbcomm/time";
import { randomBytes } from "crypto";
import pDefer, { type DeferredPromise } from "p-defer";
import { toString } from "uint8arrays";
import { v4 as uuid } from "uuid";
import { RPCMessage, RequestV0, ResponseV0 } from "./encoding.js";
import {
	MalformedResponseError,
	type RPCRequestOptions,
	type RPCResponse,
	logger,
} from "./io.js";

export type RPCSetupOptions<Q, R> = {
	/** Pattern of the topics this instance answers requests on */
	topic?: string;

	/** Topic responses to our own requests are published on */
	inbox?: string;

	queryType: AbstractType<Q>;
	responseType: AbstractType<R>;
	responseHandler?: ResponseHandler<Q, R>;

	/**
	 * Answers requests whose body does not decode as `queryType`. Such requests
	 * are dropped when unset.
	 */
	invalidRequestHandler?: InvalidRequestHandler<R>;
};

export type RequestContext<R> = {
	/** Concrete topic the request was published on */
	topic: string;
	id: Uint8Array;

	/**
	 * Replies before the handler returns, e.g. when the work that follows may
	 * take this process down. The handler's return value is then ignored.
	 */
	respond: (response: R) => Promise<void>;
};

export type ResponseHandler<Q, R> = (
	query: Q,
	context: RequestContext<R>,
) => Promise<R | undefined> | R | undefined;

export type InvalidRequestHandler<R> = (
	error: unknown,
	context: RequestContext<R>,
) => Promise<R | undefined> | R | undefined;

export type RequestEvent<Q> = {
	request: Q;
	topic: string;
};

export type ResponseEvent<R> = RPCResponse<R>;

export interface RPCEvents<Q, R> {
	request: CustomEvent<RequestEvent<Q>>;
	response: CustomEvent<ResponseEvent<R>>;
	close: CustomEvent<void>;
}

const DEFAULT_TIMEOUT = 10 * 1000;

const idString = (id: Uint8Array) => toString(id, "base64");

export class RPC<Q, R> {
	readonly pubsub: PubSub;
	readonly events = new TypedEventEmitter<RPCEvents<Q, R>>();

	private _closed = true;
	private _responseHandler?: ResponseHandler<Q, R>;
	private _invalidRequestHandler?: InvalidRequestHandler<R>;
	private _responseResolver: Map<string, (response: ResponseV0) => void> =
		new Map();
	private _requestType!: AbstractType<Q>;
	private _responseType!: AbstractType<R>;
	private _rpcTopic?: string;
	private _inbox!: string;
	private _inboxSubscribed = false;
	private _subscribing: Promise<void> | undefined;
	private _onMessageBound = (evt: CustomEvent<DataEvent>) => {
		void this._onMessage(evt.detail);
	};

	constructor(pubsub: PubSub) {
		this.pubsub = pubsub;
	}

	async open(args: RPCSetupOptions<Q, R>): Promise<void> {
		if (!this._closed) {
			throw new Error("Already open");
		}
		this._rpcTopic = args.topic && validatePattern(args.topic);
		this._inbox = validateTopic(
			args.inbox ?? joinTopic("_rpc", this.pubsub.id, uuid()),
		);
		this._responseHandler = args.responseHandler;
		this._invalidRequestHandler = args.invalidRequestHandler;
		this._requestType = args.queryType;
		this._responseType = args.responseType;
		this._closed = false;

		this.pubsub.addEventListener("data", this._onMessageBound);
		if (this._rpcTopic && this._responseHandler) {
			await this.pubsub.subscribe(this._rpcTopic);
			logger.debug("subscribed to request topic: " + this._rpcTopic);
		}
	}

	public async close(): Promise<void> {
		if (this._closed) {
			return;
		}
		this._closed = true;
		this.pubsub.removeEventListener("data", this._onMessageBound);
		this.events.dispatchEvent(new CustomEvent("close"));

		await this._subscribing;
		const unsubscribes: Promise<boolean>[] = [];
		if (this._rpcTopic && this._responseHandler) {
			unsubscribes.push(
				Promise.resolve(this.pubsub.unsubscribe(this._rpcTopic)),
			);
		}
		if (this._inboxSubscribed) {
			this._inboxSubscribed = false;
			unsubscribes.push(
				Promise.resolve(this.pubsub.unsubscribe(this._inbox)),
			);
		}
		await Promise.all(unsubscribes);
	}

	get closed(): boolean {
		return this._closed;
	}

	public get topic(): string | undefined {
		return this._rpcTopic;
	}

	public get inbox(): string {
		if (!this._inbox) {
			throw new Error("Not initialized");
		}
		return this._inbox;
	}

	private async subscribeInbox(): Promise<void> {
		await this._subscribing;
		if (this._inboxSubscribed) {
			return;
		}
		this._inboxSubscribed = true;
		this._subscribing = Promise.resolve(this.pubsub.subscribe(this._inbox));
		try {
			await this._subscribing;
		} catch (error) {
			this._inboxSubscribed = false;
			throw error;
		} finally {
			this._subscribing = undefined;
		}
		logger.debug("subscribed to inbox (responses): " + this._inbox);
	}

	private async _onMessage(event: DataEvent): Promise<void> {
		const { topic, data } = event;
		const isRequestTopic =
			this._rpcTopic != null && matchesTopic(this._rpcTopic, topic);
		const isInbox = topic === this._inbox;
		if (!isRequestTopic && !isInbox) {
			return;
		}

		try {
			const rpcMessage = deserialize(data, RPCMessage);
			if (rpcMessage instanceof RequestV0) {
				if (isRequestTopic && this._responseHandler) {
					await this.handleRequest(rpcMessage, topic, this._responseHandler);
				}
			} else if (rpcMessage instanceof ResponseV0) {
				if (isInbox) {
					const handler = this._responseResolver.get(
						idString(rpcMessage.requestId),
					);
					// responses after the window closed have no handler
					handler?.(rpcMessage);
				}
			}
		} catch (error) {
			if (error instanceof BorshError) {
				logger.debug("Got message for a different namespace on " + topic);
				return;
			}

			logger.error(
				"Error handling message on " +
					topic +
					": " +
					(error instanceof Error ? error.message : String(error)),
			);
		}
	}

	private async handleRequest(
		rpcMessage: RequestV0,
		topic: string,
		responseHandler: ResponseHandler<Q, R>,
	) {
		let responded = false;
		const respond = async (response: R) => {
			if (responded) {
				throw new Error("Already responded to request on " + topic);
			}
			responded = true;
			if (!rpcMessage.respondTo) {
				return;
			}
			await this.pubsub.publish(
				rpcMessage.respondTo,
				serialize(
					new ResponseV0({
						response: serialize(response),
						requestId: rpcMessage.id,
					}),
				),
			);
		};

		const context: RequestContext<R> = { topic, id: rpcMessage.id, respond };

		let request: Q;
		try {
			request = deserialize(rpcMessage.request, this._requestType);
		} catch (error) {
			if (!this._invalidRequestHandler) {
				throw error;
			}
			const response = await this._invalidRequestHandler(error, context);
			if (response !== undefined && !responded) {
				await respond(response);
			}
			return;
		}

		this.events.dispatchEvent(
			new CustomEvent("request", {
				detail: { request, topic },
			}),
		);

		const response = await responseHandler(request, context);

		if (response !== undefined && !responded) {
			await respond(response);
		}
	}

	private seal(request: Q, respondTo?: string): RequestV0 {
		return new RequestV0({
			id: new Uint8Array(randomBytes(32)),
			request: serialize(request),
			respondTo,
		});
	}

	/**
	 * Send message and don't expect any response
	 */
	public async send(message: Q, options: { topic: string }): Promise<void> {
		if (this._closed) {
			throw new AbortError("Closed");
		}
		await this.pubsub.publish(options.topic, serialize(this.seal(message)));
	}

	private createResponseHandler(
		promise: DeferredPromise<void>,
		allResults: RPCResponse<R>[],
		options: RPCRequestOptions<R>,
	) {
		return (response: ResponseV0) => {
			let decoded: R;
			try {
				decoded = deserialize(response.response, this._responseType);
			} catch (error) {
				logger.error(
					"failed to deserialize response: " +
						(error instanceof Error ? error.message : String(error)),
				);
				promise.reject(
					new MalformedResponseError(
						"Malformed response to request on " + options.topic,
					),
				);
				return;
			}

			const result: RPCResponse<R> = {
				response: decoded,
				requestId: response.requestId,
			};
			this.events.dispatchEvent(
				new CustomEvent("response", {
					detail: result,
				}),
			);
			allResults.push(result);
			if (options.amount != null && allResults.length >= options.amount) {
				promise.resolve();
			}
		};
	}

	/**
	 * Send a request and collect the responses that arrive before the timeout,
	 * or until `amount` responses have been received
	 */
	public async request(
		request: Q,
		options: RPCRequestOptions<R>,
	): Promise<RPCResponse<R>[]> {
		if (this._closed) {
			throw new AbortError("Closed");
		}
		const signal = options.signal;
		if (signal?.aborted) {
			throw new AbortError("Aborted");
		}
		await this.subscribeInbox();

		const requestMessage = this.seal(request, this._inbox);
		const requestBytes = serialize(requestMessage);

		const allResults: RPCResponse<R>[] = [];
		const deferredPromise = pDefer<void>();

		const timeoutFn = setTimeout(() => {
			deferredPromise.resolve();
		}, options.timeout ?? DEFAULT_TIMEOUT);

		const abortListener = () => {
			deferredPromise.reject(new AbortError("Aborted"));
		};
		signal?.addEventListener("abort", abortListener);

		const closeListener = () => {
			deferredPromise.reject(new AbortError("Closed"));
		};
		this.events.addEventListener("close", closeListener);

		const id = idString(requestMessage.id);
		this._responseResolver.set(
			id,
			this.createResponseHandler(deferredPromise, allResults, options),
		);

		try {
			// the window may close (abort, close) while the publish is pending
			await Promise.all([
				this.pubsub.publish(options.topic, requestBytes),
				deferredPromise.promise,
			]);
		} finally {
			clearTimeout(timeoutFn);
			this.events.removeEventListener("close", closeListener);
			signal?.removeEventListener("abort", abortListener);
			this._responseResolver.delete(id);
		}

		return allResults;
	}
}
