import type { TypedEventTarget } from "@libp2p/interface";

export class DataEvent {
	/** Concrete topic the message was published on */
	topic: string;

	data: Uint8Array;

	constructor(properties: { topic: string; data: Uint8Array }) {
		this.topic = properties.topic;
		this.data = properties.data;
	}
}

export interface PubSubEvents {
	data: CustomEvent<DataEvent>;
}

export class PubSubClosedError extends Error {
	constructor(message = "PubSub is closed") {
		super(message);
	}
}

type MaybePromise<T> = Promise<T> | T;

/**
 * A connection to a topic based message bus.
 *
 * Subscriptions are patterns (see {@link matchesTopic}). A message matching
 * several subscriptions of one connection is delivered once; listeners filter
 * on {@link DataEvent.topic} themselves.
 */
export interface PubSub extends TypedEventTarget<PubSubEvents> {
	/** Unique for the lifetime of the connection */
	readonly id: string;

	subscribe(pattern: string): MaybePromise<void>;

	/**
	 * @returns true when the last subscriber of the pattern left and the
	 * subscription was removed
	 */
	unsubscribe(pattern: string): MaybePromise<boolean>;

	publish(topic: string, data: Uint8Array): MaybePromise<void>;

	close(): Promise<void>;
}

export * from "./topic.js";
export * from "./subscriptions.js";
