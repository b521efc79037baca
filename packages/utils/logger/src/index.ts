import pino, { type Logger } from "pino";

export type LogLevel =
	| "fatal"
	| "error"
	| "warn"
	| "info"
	| "debug"
	| "trace"
	| "silent";

const LEVELS: LogLevel[] = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
];

const isLogLevel = (value: string): value is LogLevel =>
	(LEVELS as string[]).includes(value);

export const getLogLevel = (): LogLevel | undefined => {
	const level = process.env.LOG_LEVEL;
	if (!level) return undefined;

	if (!isLogLevel(level)) {
		throw new Error(
			`Unexpected LOG_LEVEL: ${level}. Expecting one of: ${JSON.stringify(LEVELS)}`,
		);
	}
	return level;
};

let root: Logger | undefined;

/**
 * Diagnostics go to stderr so that command output on stdout stays parseable
 */
const getRoot = (): Logger =>
	root || (root = pino({ base: undefined }, pino.destination(2)));

const logger = (options?: { module?: string; level?: LogLevel }): Logger => {
	const base = getRoot().child(
		options?.module ? { module: options.module } : {},
	);

	const level = options?.level ?? getLogLevel();
	if (level) {
		base.level = level;
	}

	return base;
};

export { logger, type Logger };
