import { field, fixedArray, option, variant } from "@dao-xyz/borsh";

@variant(0)
export abstract class RPCMessage {}

@variant(0)
export class RequestV0 extends RPCMessage {
	@field({ type: fixedArray("u8", 32) })
	id: Uint8Array;

	/** Topic to publish responses on. Absent for fire and forget messages */
	@field({ type: option("string") })
	respondTo?: string;

	@field({ type: Uint8Array })
	request: Uint8Array;

	constructor(properties: {
		id: Uint8Array;
		request: Uint8Array;
		respondTo?: string;
	}) {
		super();
		this.id = properties.id;
		this.respondTo = properties.respondTo;
		this.request = properties.request;
	}
}

@variant(1)
export class ResponseV0 extends RPCMessage {
	@field({ type: fixedArray("u8", 32) })
	requestId: Uint8Array;

	@field({ type: Uint8Array })
	response: Uint8Array;

	constructor(properties: { response: Uint8Array; requestId: Uint8Array }) {
		super();
		this.response = properties.response;
		this.requestId = properties.requestId;
	}
}
