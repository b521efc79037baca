import { execFile, spawn } from "child_process";
import { promisify } from "util";
import { CommandKind } from "./actions.js";
import { ExecutionError } from "./errors.js";

export type ExecuteOptions = {
	/**
	 * Resolve once the effect has started instead of when it completes. Used
	 * for effects the process may not outlive.
	 */
	detach?: boolean;
};

export interface CommandExecutor {
	/**
	 * Performs the effect of a command
	 * @returns a human readable acknowledgement
	 */
	execute(kind: CommandKind, options?: ExecuteOptions): Promise<string>;
}

export type ProcessRunner = (
	file: string,
	args: string[],
	options: { detach: boolean },
) => Promise<void>;

const execFileAsync = promisify(execFile);

/** Spawns without waiting, settling on `spawn` or `error` */
const start = (file: string, args: string[]) =>
	new Promise<void>((resolve, reject) => {
		const child = spawn(file, args, { detached: true, stdio: "ignore" });
		child.once("error", reject);
		child.once("spawn", () => {
			child.unref();
			resolve();
		});
	});

export const defaultRunner: ProcessRunner = async (file, args, options) => {
	if (options.detach) {
		return start(file, args);
	}
	await execFileAsync(file, args, { encoding: "utf8" });
};

export type ShellCommands = Record<CommandKind, string[] | undefined>;

/** `undefined` means the command has no OS level effect */
export const DEFAULT_SHELL_COMMANDS: Readonly<ShellCommands> = Object.freeze({
	[CommandKind.Reboot]: ["sudo", "reboot"],
	[CommandKind.Shutdown]: ["shutdown", "now"],
	[CommandKind.ResetGimbal]: undefined,
});

const ACKNOWLEDGEMENTS: Readonly<Record<CommandKind, string>> = Object.freeze({
	[CommandKind.Reboot]: "Reboot initiated",
	[CommandKind.Shutdown]: "Shutdown initiated",
	[CommandKind.ResetGimbal]: "Reset gimbal command executed successfully",
});

/**
 * Executes commands by running programs on the host
 */
export class ShellCommandExecutor implements CommandExecutor {
	private commands: ShellCommands;
	private runner: ProcessRunner;

	constructor(options?: {
		commands?: Partial<ShellCommands>;
		runner?: ProcessRunner;
	}) {
		this.commands = { ...DEFAULT_SHELL_COMMANDS, ...options?.commands };
		this.runner = options?.runner ?? defaultRunner;
	}

	async execute(kind: CommandKind, options?: ExecuteOptions): Promise<string> {
		const command = this.commands[kind];
		if (command && command.length > 0) {
			const [file, ...args] = command;
			try {
				await this.runner(file, args, { detach: options?.detach ?? false });
			} catch (error) {
				throw new ExecutionError(
					`Command '${command.join(" ")}' failed: ${
						error instanceof Error ? error.message : String(error)
					}`,
					{ cause: error },
				);
			}
		}
		return ACKNOWLEDGEMENTS[kind];
	}
}
