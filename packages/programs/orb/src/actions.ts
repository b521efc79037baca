import { isValidSegment } from "@orbcomm/pubsub-interface";
import { AmbiguousActionError, UnknownActionError } from "./errors.js";
import { COMMAND_NAMESPACE, deviceTopic, parseDeviceTopic } from "./topics.js";

/** Read-only requests */
export enum QueryKind {
	Name = 0,
	Id = 1,
	HardwareVersion = 2,
}

/** Side-effecting requests, addressed under `command/` */
export enum CommandKind {
	Reboot = 0,
	Shutdown = 1,
	ResetGimbal = 2,
}

export type QueryAction = { type: "query"; kind: QueryKind };
export type CommandAction = { type: "command"; kind: CommandKind };
export type Action = QueryAction | CommandAction;

export type QueryDefinition = {
	token: string;
	description: string;
};

export type CommandDefinition = {
	token: string;
	description: string;

	/**
	 * The device may not survive the effect (power off, reboot). The reply is
	 * sent before the effect is initiated.
	 */
	disruptive: boolean;

	/**
	 * The effect mutates shared device state. Exclusive commands run one at a
	 * time on a device.
	 */
	exclusive: boolean;
};

export type ActionTables = {
	queries: Readonly<Record<QueryKind, Readonly<QueryDefinition>>>;
	commands: Readonly<Record<CommandKind, Readonly<CommandDefinition>>>;
};

export const QUERIES: ActionTables["queries"] = Object.freeze({
	[QueryKind.Name]: { token: "name", description: "Configured display name" },
	[QueryKind.Id]: { token: "id", description: "Device id" },
	[QueryKind.HardwareVersion]: {
		token: "hardware_version",
		description: "Hardware version",
	},
});

export const COMMANDS: ActionTables["commands"] = Object.freeze({
	[CommandKind.Reboot]: {
		token: "reboot",
		description: "Reboot the device",
		disruptive: true,
		exclusive: false,
	},
	[CommandKind.Shutdown]: {
		token: "shutdown",
		description: "Power the device off",
		disruptive: true,
		exclusive: false,
	},
	[CommandKind.ResetGimbal]: {
		token: "reset_gimbal",
		description: "Move the gimbal back to its home position",
		disruptive: false,
		exclusive: false,
	},
});

const queryKinds = (): QueryKind[] =>
	Object.values(QueryKind).filter(
		(x): x is QueryKind => typeof x === "number",
	);

const commandKinds = (): CommandKind[] =>
	Object.values(CommandKind).filter(
		(x): x is CommandKind => typeof x === "number",
	);

const indexTokens = <K>(
	kinds: K[],
	tokenOf: (kind: K) => string,
	label: string,
): Map<string, K> => {
	const index = new Map<string, K>();
	for (const kind of kinds) {
		const token = tokenOf(kind);
		if (!isValidSegment(token)) {
			throw new AmbiguousActionError(
				`Invalid ${label} token '${token}': tokens must be single topic segments`,
			);
		}
		if (index.has(token)) {
			throw new AmbiguousActionError(
				`The ${label} token '${token}' is registered more than once`,
			);
		}
		index.set(token, kind);
	}
	return index;
};

export type ResolvedTopic = {
	deviceId: string;
	action: Action;
};

/**
 * The closed set of actions a device understands, with the mapping between
 * actions, their tokens and their topics.
 *
 * Built once and shared by reference; an instance never changes after
 * construction.
 */
export class ActionRegistry {
	private readonly tables: ActionTables;
	private readonly queryIndex: Map<string, QueryKind>;
	private readonly commandIndex: Map<string, CommandKind>;

	constructor(tables: ActionTables = { queries: QUERIES, commands: COMMANDS }) {
		this.tables = tables;
		this.queryIndex = indexTokens(
			queryKinds(),
			(kind) => tables.queries[kind].token,
			"query",
		);
		this.commandIndex = indexTokens(
			commandKinds(),
			(kind) => tables.commands[kind].token,
			"command",
		);
		if (this.queryIndex.has(COMMAND_NAMESPACE)) {
			throw new AmbiguousActionError(
				`The query token '${COMMAND_NAMESPACE}' collides with the command namespace`,
			);
		}
	}

	queries(): QueryKind[] {
		return [...this.queryIndex.values()];
	}

	commands(): CommandKind[] {
		return [...this.commandIndex.values()];
	}

	parseQuery(token: string): QueryKind {
		const kind = this.queryIndex.get(token);
		if (kind == null) {
			throw new UnknownActionError(
				`Unknown query '${token}'. Expecting one of: ${[...this.queryIndex.keys()].join(", ")}`,
			);
		}
		return kind;
	}

	parseCommand(token: string): CommandKind {
		const kind = this.commandIndex.get(token);
		if (kind == null) {
			throw new UnknownActionError(
				`Unknown command '${token}'. Expecting one of: ${[...this.commandIndex.keys()].join(", ")}`,
			);
		}
		return kind;
	}

	query(kind: QueryKind): Readonly<QueryDefinition> {
		return this.tables.queries[kind];
	}

	command(kind: CommandKind): Readonly<CommandDefinition> {
		return this.tables.commands[kind];
	}

	tokenOf(action: Action): string {
		return action.type === "query"
			? this.query(action.kind).token
			: this.command(action.kind).token;
	}

	/** Topic segments after the device id */
	pathOf(action: Action): string[] {
		return action.type === "query"
			? [this.tokenOf(action)]
			: [COMMAND_NAMESPACE, this.tokenOf(action)];
	}

	topicFor(deviceId: string, action: Action): string {
		return deviceTopic(deviceId, ...this.pathOf(action));
	}

	queryTopic(deviceId: string, kind: QueryKind): string {
		return this.topicFor(deviceId, { type: "query", kind });
	}

	commandTopic(deviceId: string, kind: CommandKind): string {
		return this.topicFor(deviceId, { type: "command", kind });
	}

	/**
	 * Inverse of {@link topicFor}
	 */
	resolve(topic: string): ResolvedTopic {
		const parsed = parseDeviceTopic(topic);
		if (!parsed) {
			throw new UnknownActionError(`Not a device topic: '${topic}'`);
		}
		const { deviceId, path } = parsed;
		if (path.length === 1) {
			return {
				deviceId,
				action: { type: "query", kind: this.parseQuery(path[0]) },
			};
		}
		if (path.length === 2 && path[0] === COMMAND_NAMESPACE) {
			return {
				deviceId,
				action: { type: "command", kind: this.parseCommand(path[1]) },
			};
		}
		throw new UnknownActionError(
			`Unknown action '${path.join("/")}' for device '${deviceId}'`,
		);
	}

	/** `query:name`, `command:reboot` */
	format(action: Action): string {
		return action.type + ":" + this.tokenOf(action);
	}
}

export const defaultRegistry = new ActionRegistry();
