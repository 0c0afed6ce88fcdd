import { getLog } from "./Logger";
import { type ChildProcessByStdio, spawn } from "node:child_process";
import type { Readable } from "node:stream";
import type { ExecutionResult } from "opsgate-common";

const log = getLog(import.meta);

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;
export const KILL_GRACE_MS = 5_000;
export const TIMEOUT_MESSAGE = "Command timed out";

/**
 * An argument vector is spawned without a shell; a string is interpreted by the shell.
 */
export type Command = ReadonlyArray<string> | string;

export interface RunOptions {
	/** Timeout in milliseconds (default: 60000) */
	timeoutMs?: number;
	/** Working directory (default: the gateway's own) */
	cwd?: string;
	/** Cap for each captured stream; the excess is dropped (default: 10 MiB) */
	maxOutputBytes?: number;
}

/**
 * The single point through which tools spawn processes.
 */
export interface ProcessRunner {
	run(command: Command, options?: RunOptions): Promise<ExecutionResult>;
}

class OutputBuffer {
	private readonly chunks: Array<Buffer> = [];
	private size = 0;

	constructor(private readonly limit: number) {}

	append(chunk: Buffer): void {
		const remaining = this.limit - this.size;
		if (remaining <= 0) {
			return;
		}
		const kept = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
		this.chunks.push(kept);
		this.size += kept.length;
	}

	toString(): string {
		return Buffer.concat(this.chunks).toString("utf8");
	}
}

function describeCommand(command: Command): string {
	return typeof command === "string" ? command : command.join(" ");
}

function failure(stderr: string, stdout = "", timedOut = false): ExecutionResult {
	return { stdout, stderr, exitCode: -1, success: false, timedOut };
}

/**
 * Runs a command and captures its output. Never rejects: spawn errors, non-zero exits
 * and timeouts all resolve with `success: false`.
 */
export function runProcess(command: Command, options: RunOptions = {}): Promise<ExecutionResult> {
	const { timeoutMs = DEFAULT_TIMEOUT_MS, cwd, maxOutputBytes = DEFAULT_MAX_OUTPUT_BYTES } = options;
	const display = describeCommand(command);

	log.info({ command: display, cwd, timeoutMs }, "Running command");

	return new Promise(resolve => {
		let proc: ChildProcessByStdio<null, Readable, Readable>;
		try {
			if (typeof command === "string") {
				proc = spawn(command, { cwd, shell: true, stdio: ["ignore", "pipe", "pipe"] });
			} else {
				const [file, ...args] = command;
				if (!file) {
					resolve(failure("Empty command"));
					return;
				}
				proc = spawn(file, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
			}
		} catch (error) {
			log.error({ command: display, error }, "Command failed to start");
			resolve(failure(error instanceof Error ? error.message : String(error)));
			return;
		}

		const stdout = new OutputBuffer(maxOutputBytes);
		const stderr = new OutputBuffer(maxOutputBytes);
		let settled = false;
		let killTimer: ReturnType<typeof setTimeout> | undefined;

		function settle(result: ExecutionResult): void {
			if (!settled) {
				settled = true;
				resolve(result);
			}
		}

		const timeoutId = setTimeout(() => {
			log.warn({ command: display, cwd, timeoutMs }, "Command timed out");
			proc.kill("SIGTERM");
			killTimer = setTimeout(() => {
				if (proc.exitCode === null && proc.signalCode === null) {
					proc.kill("SIGKILL");
				}
			}, KILL_GRACE_MS);
			killTimer.unref();
			// Resolve now: a grandchild holding the pipes open must not keep the caller waiting
			settle(failure(TIMEOUT_MESSAGE, stdout.toString(), true));
		}, timeoutMs);

		proc.stdout.on("data", (data: Buffer) => stdout.append(data));
		proc.stderr.on("data", (data: Buffer) => stderr.append(data));

		proc.on("error", error => {
			clearTimeout(timeoutId);
			log.error({ command: display, error }, "Command failed to start");
			settle(failure(error.message, stdout.toString()));
		});

		proc.on("close", code => {
			clearTimeout(timeoutId);
			if (killTimer) {
				clearTimeout(killTimer);
			}
			const exitCode = code ?? -1;
			if (exitCode !== 0) {
				log.warn({ command: display, cwd, exitCode }, "Command exited with non-zero code");
			} else {
				log.debug({ command: display, cwd }, "Command completed successfully");
			}
			settle({
				stdout: stdout.toString(),
				stderr: stderr.toString(),
				exitCode,
				success: exitCode === 0,
				timedOut: false,
			});
		});
	});
}

export function createProcessRunner(): ProcessRunner {
	return { run: runProcess };
}
