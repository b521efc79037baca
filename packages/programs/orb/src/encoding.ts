import { field, option, variant } from "@dao-xyz/borsh";
import type { RemoteErrorKind } from "./errors.js";

@variant("probe")
export class DiscoveryProbe {
	/** Session id of the requesting client, for diagnostics */
	@field({ type: "string" })
	from: string;

	constructor(properties: { from: string }) {
		this.from = properties.from;
	}
}

@variant("device")
export class DeviceIdentity {
	@field({ type: "string" })
	id: string;

	@field({ type: option("string") })
	name?: string;

	@field({ type: option("string") })
	hardwareVersion?: string;

	constructor(properties: {
		id: string;
		name?: string;
		hardwareVersion?: string;
	}) {
		this.id = properties.id;
		this.name = properties.name;
		this.hardwareVersion = properties.hardwareVersion;
	}
}

/**
 * Body of an addressed query or command. The action itself is carried by the
 * topic.
 */
@variant("action")
export class ActionRequest {
	@field({ type: "string" })
	from: string;

	constructor(properties: { from: string }) {
		this.from = properties.from;
	}
}

@variant(0)
export abstract class Reply {}

@variant(0)
export class SuccessReply extends Reply {
	/** Query value, or the acknowledgement of a command */
	@field({ type: "string" })
	payload: string;

	constructor(properties: { payload: string }) {
		super();
		this.payload = properties.payload;
	}
}

@variant(1)
export class FailureReply extends Reply {
	/** A {@link RemoteErrorKind}, unchecked until the client reads it */
	@field({ type: "string" })
	kind: string;

	@field({ type: "string" })
	message: string;

	constructor(properties: { kind: RemoteErrorKind; message: string }) {
		super();
		this.kind = properties.kind;
		this.message = properties.message;
	}
}
