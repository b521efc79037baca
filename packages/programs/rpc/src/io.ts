import { logger as loggerFn } from "@orbcomm/logger";

export const logger = loggerFn({ module: "rpc" });

export type RPCRequestResponseOptions<R> = {
	/** Resolve as soon as this many responses have arrived */
	amount?: number;

	/** Length of the collection window in milliseconds */
	timeout?: number;

	signal?: AbortSignal;
};

export type RPCRequestOptions<R> = RPCRequestResponseOptions<R> & {
	/** Topic to publish the request on */
	topic: string;
};

export type RPCResponse<R> = {
	response: R;
	requestId: Uint8Array;
};

export class MalformedResponseError extends Error {}
