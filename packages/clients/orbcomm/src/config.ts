import { logger as loggerFn } from "@orbcomm/logger";
import type { DeviceProperties } from "@orbcomm/orb";
import { execFile } from "child_process";
import fs from "fs";
import os from "os";
import path from "path";
import { promisify } from "util";

const logger = loggerFn({ module: "cli" });

export const DEFAULT_BROKER = "mqtt://localhost:1883";

export const DEFAULT_PROPERTIES: Readonly<DeviceProperties> = Object.freeze({
	id: "UnknownOrb",
	name: "DevOrb",
	hardwareVersion: "UnknownHWVersion",
});

export const ORB_NAME_PATH = "/usr/persistent/orb-name";
export const HARDWARE_VERSION_PATH = "/usr/persistent/hardware_version";
export const ORB_ID_PROGRAM = "orb-id";

export const getHomeConfigDir = (): string => {
	const configDir = path.join(os.homedir(), ".orbcomm");
	return configDir;
};

export const getConfigPath = (configDir: string): string => {
	return path.join(configDir, "config.json");
};

export type Config = {
	broker?: string;
	timeout?: number;
	announceInterval?: number;
};

export class ConfigError extends Error {}

const isNotFound = (error: unknown) =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

const readText = (file: string) => fs.promises.readFile(file, "utf8");

const optional = <T>(
	object: Record<string, unknown>,
	key: string,
	check: (value: unknown) => value is T,
	expected: string,
	file: string,
): T | undefined => {
	const value = object[key];
	if (value === undefined) {
		return undefined;
	}
	if (!check(value)) {
		throw new ConfigError(`Invalid '${key}' in ${file}: expecting ${expected}`);
	}
	return value;
};

const isString = (value: unknown): value is string =>
	typeof value === "string" && value.length > 0;

const isPositiveNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value) && value > 0;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value != null && !Array.isArray(value);

/**
 * Reads the optional JSON config file. A missing file is an empty config.
 */
export const loadConfig = async (
	file: string = getConfigPath(getHomeConfigDir()),
	readFile: (file: string) => Promise<string> = readText,
): Promise<Config> => {
	let text: string;
	try {
		text = await readFile(file);
	} catch (error) {
		if (isNotFound(error)) {
			return {};
		}
		throw error;
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (error) {
		throw new ConfigError(`${file} is not valid JSON`, { cause: error });
	}
	if (!isRecord(json)) {
		throw new ConfigError(`${file} must contain a JSON object`);
	}
	return {
		broker: optional(json, "broker", isString, "a url", file),
		timeout: optional(
			json,
			"timeout",
			isPositiveNumber,
			"a positive number",
			file,
		),
		announceInterval: optional(
			json,
			"announceInterval",
			isPositiveNumber,
			"a positive number",
			file,
		),
	};
};

export type PropertySources = {
	env: NodeJS.ProcessEnv;
	readFile: (file: string) => Promise<string>;

	/** Runs a program and returns its stdout */
	run: (file: string, args: string[]) => Promise<string>;
};

const execFileAsync = promisify(execFile);

export const defaultPropertySources = (): PropertySources => ({
	env: process.env,
	readFile: readText,
	run: async (file, args) => {
		const { stdout } = await execFileAsync(file, args, { encoding: "utf8" });
		return stdout;
	},
});

const fromSource = async (
	description: string,
	read: () => Promise<string>,
): Promise<string | undefined> => {
	try {
		const value = (await read()).trim();
		return value.length > 0 ? value : undefined;
	} catch (error) {
		logger.warn(
			`Failed to read ${description}: ` +
				(error instanceof Error ? error.message : String(error)),
		);
		return undefined;
	}
};

/**
 * Resolves each property from, in order: the given value, the environment, the
 * device, the default
 */
export const resolveDeviceProperties = async (
	given: Partial<DeviceProperties>,
	sources: PropertySources = defaultPropertySources(),
): Promise<DeviceProperties> => {
	const { env, readFile, run } = sources;
	const id =
		given.id ||
		env.ORB_ID ||
		(await fromSource(`'${ORB_ID_PROGRAM}' output`, () =>
			run(ORB_ID_PROGRAM, []),
		)) ||
		DEFAULT_PROPERTIES.id;
	const name =
		given.name ||
		env.ORB_NAME ||
		(await fromSource(ORB_NAME_PATH, () => readFile(ORB_NAME_PATH))) ||
		DEFAULT_PROPERTIES.name;
	const hardwareVersion =
		given.hardwareVersion ||
		env.ORB_HARDWARE_VERSION ||
		(await fromSource(HARDWARE_VERSION_PATH, () =>
			readFile(HARDWARE_VERSION_PATH),
		)) ||
		DEFAULT_PROPERTIES.hardwareVersion;
	return { id, name, hardwareVersion };
};
