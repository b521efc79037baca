import { logger as loggerFn } from "@orbcomm/logger";
import {
	type CommandExecutor,
	DEFAULT_DISCOVERY_TIMEOUT,
	DEFAULT_REQUEST_TIMEOUT,
	OrbClient,
	OrbError,
	OrbServer,
	ShellCommandExecutor,
	TransportError,
	defaultRegistry,
	validateDeviceId,
} from "@orbcomm/orb";
import type { PubSub } from "@orbcomm/pubsub-interface";
import { MqttPubSub } from "@orbcomm/pubsub-mqtt";
import { delay } from "@orbcomm/time";
import chalk, { type ChalkInstance } from "chalk";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
	type Config,
	DEFAULT_BROKER,
	type PropertySources,
	defaultPropertySources,
	getConfigPath,
	getHomeConfigDir,
	loadConfig,
	resolveDeviceProperties,
} from "./config.js";

const logger = loggerFn({ module: "cli" });

export type CliContext = {
	/** Opens the transport for a broker url */
	connect: (broker: string, options: { timeout: number }) => Promise<PubSub>;
	stdout: (line: string) => void;
	stderr: (line: string) => void;
	chalk: ChalkInstance;
	env: NodeJS.ProcessEnv;
	configPath: string;
	properties: PropertySources;
	executor: CommandExecutor;

	/** Resolves when a running `serve` or `watch` should stop */
	waitForShutdown: () => Promise<void>;
};

export class UsageError extends Error {}

const waitForSignal = () =>
	new Promise<void>((resolve) => {
		const stop = () => {
			process.off("SIGINT", stop);
			process.off("SIGTERM", stop);
			resolve();
		};
		process.on("SIGINT", stop);
		process.on("SIGTERM", stop);
	});

export const connectBroker: CliContext["connect"] = (broker, options) =>
	MqttPubSub.connect(broker, { connectTimeout: options.timeout });

const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

const defaultContext = (): CliContext => ({
	connect: connectBroker,
	stdout: (line) => console.log(line),
	stderr: (line) => console.error(line),
	chalk,
	env: process.env,
	configPath: getConfigPath(getHomeConfigDir()),
	properties: defaultPropertySources(),
	executor: new ShellCommandExecutor(),
	waitForShutdown: waitForSignal,
});

/**
 * Runs the program
 * @returns the exit code
 */
export const cli = async (
	args: string[] = hideBin(process.argv),
	overrides?: Partial<CliContext>,
): Promise<number> => {
	const context: CliContext = { ...defaultContext(), ...overrides };
	const { stdout, stderr } = context;
	const colors = context.chalk;

	let config: Config | undefined;
	const getConfig = async () =>
		config || (config = await loadConfig(context.configPath));

	const broker = async (flag: string | undefined) =>
		flag ||
		context.env.ORBCOMM_BROKER ||
		(await getConfig()).broker ||
		DEFAULT_BROKER;

	const timeout = async (flag: number | undefined, fallback: number) =>
		flag ?? (await getConfig()).timeout ?? fallback;

	/** Connects, or fails with a TransportError after `within` ms */
	const connect = async (url: string, within: number): Promise<PubSub> => {
		logger.debug(`connecting to ${url}`);
		const connecting = context.connect(url, { timeout: within });
		const controller = new AbortController();
		try {
			const pubsub = await Promise.race([
				connecting,
				delay(within, { signal: controller.signal }).then(() => undefined),
			]);
			if (pubsub) {
				return pubsub;
			}
		} catch (error) {
			throw new TransportError(
				`Failed to connect to ${url}: ${errorMessage(error)}`,
				{ cause: error },
			);
		} finally {
			controller.abort();
		}
		connecting
			.then((late) => late.close())
			.catch((error) =>
				logger.debug(`abandoned connection failed: ${errorMessage(error)}`),
			);
		throw new TransportError(`Could not connect to ${url} within ${within}ms`);
	};

	/** Opens a transport for the duration of `fn` */
	const withPubSub = async <T>(
		brokerFlag: string | undefined,
		fn: (pubsub: PubSub) => Promise<T>,
		connectTimeout?: number,
	): Promise<T> => {
		const url = await broker(brokerFlag);
		const pubsub = await connect(
			url,
			connectTimeout ?? (await timeout(undefined, DEFAULT_REQUEST_TIMEOUT)),
		);
		try {
			return await fn(pubsub);
		} finally {
			await pubsub.close();
		}
	};

	const withClient = <T>(
		brokerFlag: string | undefined,
		fn: (client: OrbClient) => Promise<T>,
		connectTimeout?: number,
	): Promise<T> =>
		withPubSub(
			brokerFlag,
			async (pubsub) => {
				const client = new OrbClient({ pubsub });
				await client.open();
				try {
					return await fn(client);
				} finally {
					await client.close();
				}
			},
			connectTimeout,
		);

	try {
		await yargs(args)
			.scriptName("orbcomm")
			.option("broker", {
				describe: "Broker url",
				defaultDescription: DEFAULT_BROKER,
				type: "string",
				alias: "b",
				global: true,
			})
			.command(
				"ping",
				"Discover the orbs that are online",
				(yargs) =>
					yargs.option("timeout", {
						describe: "How long to collect replies, in ms",
						type: "number",
						alias: "t",
					}),
				async (argv) => {
					const window = await timeout(
						argv.timeout,
						DEFAULT_DISCOVERY_TIMEOUT,
					);
					const ids = await withClient(argv.broker, (client) =>
						client.discover(window),
					);
					if (ids.size === 0) {
						stderr(colors.yellow("No orbs found"));
					}
					for (const id of [...ids].sort()) {
						stdout(id);
					}
				},
			)
			.command(
				"query <token>",
				"Read a property of an orb",
				(yargs) =>
					yargs
						.positional("token", {
							describe: "name, id or hardware_version",
							type: "string",
							demandOption: true,
						})
						.option("id", {
							describe: "Device id",
							type: "string",
							demandOption: true,
						})
						.option("timeout", {
							describe: "How long to wait for a reply, in ms",
							type: "number",
							alias: "t",
						}),
				async (argv) => {
					const id = validateDeviceId(argv.id);
					const kind = defaultRegistry.parseQuery(argv.token);
					const window = await timeout(argv.timeout, DEFAULT_REQUEST_TIMEOUT);
					const value = await withClient(
						argv.broker,
						(client) => client.query(id, kind, { timeout: window }),
						window,
					);
					stdout(value);
				},
			)
			.command(
				"command <token>",
				"Make an orb perform an action",
				(yargs) =>
					yargs
						.positional("token", {
							describe: "reboot, shutdown or reset_gimbal",
							type: "string",
							demandOption: true,
						})
						.option("id", {
							describe: "Device id",
							type: "string",
							demandOption: true,
						})
						.option("timeout", {
							describe: "How long to wait for a reply, in ms",
							type: "number",
							alias: "t",
						}),
				async (argv) => {
					const id = validateDeviceId(argv.id);
					const kind = defaultRegistry.parseCommand(argv.token);
					const window = await timeout(argv.timeout, DEFAULT_REQUEST_TIMEOUT);
					const ack = await withClient(
						argv.broker,
						(client) => client.command(id, kind, { timeout: window }),
						window,
					);
					stdout(colors.green(ack));
				},
			)
			.command(
				"serve",
				"Answer discovery, queries and commands as an orb",
				(yargs) =>
					yargs
						.option("id", {
							describe: "Device id",
							defaultDescription: "$ORB_ID, or the output of 'orb-id'",
							type: "string",
						})
						.option("name", {
							describe: "Display name",
							defaultDescription: "$ORB_NAME, or /usr/persistent/orb-name",
							type: "string",
						})
						.option("hardware-version", {
							describe: "Hardware version",
							defaultDescription:
								"$ORB_HARDWARE_VERSION, or /usr/persistent/hardware_version",
							type: "string",
						})
						.option("announce-interval", {
							describe: "Re-announce the identity every n ms",
							type: "number",
						}),
				async (argv) => {
					const properties = await resolveDeviceProperties(
						{
							id: argv.id,
							name: argv.name,
							hardwareVersion: argv["hardware-version"],
						},
						context.properties,
					);
					const announceInterval =
						argv["announce-interval"] ??
						(await getConfig()).announceInterval;
					await withPubSub(argv.broker, async (pubsub) => {
						const server = new OrbServer({
							pubsub,
							properties,
							executor: context.executor,
							announceInterval,
						});
						await server.open();
						stdout(
							`Serving orb ${colors.green(properties.id)} (${properties.name}, ${properties.hardwareVersion})`,
						);
						try {
							await context.waitForShutdown();
						} finally {
							await server.close();
						}
					});
				},
			)
			.command(
				"watch",
				"Print the orbs announcing themselves",
				(yargs) =>
					yargs.option("duration", {
						describe: "Stop after n ms",
						defaultDescription: "until interrupted",
						type: "number",
						alias: "d",
					}),
				async (argv) => {
					const duration = argv.duration;
					await withClient(argv.broker, async (client) => {
						const stop = await client.watch((device) => {
							stdout(
								[
									device.id,
									device.name ?? "",
									device.hardwareVersion ?? "",
								].join("\t"),
							);
						});
						try {
							await (duration != null
								? delay(duration)
								: context.waitForShutdown());
						} finally {
							await stop();
						}
					});
				},
			)
			.strict()
			.demandCommand(1)
			.exitProcess(false)
			.fail((message, error) => {
				throw error ?? new UsageError(message);
			})
			.parseAsync();
		return 0;
	} catch (error) {
		if (error instanceof OrbError) {
			stderr(colors.red(`${error.kind}: ${error.message}`));
		} else {
			stderr(colors.red(errorMessage(error)));
			if (!(error instanceof UsageError)) {
				logger.debug(error);
			}
		}
		return 1;
	}
};
