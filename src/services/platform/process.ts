/**
 * Process spawning utilities.
 */

import { execa } from "execa";
import type { Logger } from "../logging/index.js";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /**
   * Environment variables.
   * When provided, replaces process.env entirely (no merging).
   */
  readonly env?: NodeJS.ProcessEnv;
  /** Kill the process if it runs longer than this many milliseconds */
  readonly timeout?: number;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal, timed out, or failed to spawn.
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM') */
  readonly signal?: string;
  /** True if the process was killed because it exceeded ProcessOptions.timeout */
  readonly timedOut?: boolean;
}

/**
 * Handle for a spawned process.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status - check result fields instead.
   * Spawn failures resolve with exitCode null and the error text in stderr.
   */
  wait(): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to it.
   * Returns synchronously - the process is spawned immediately.
   *
   * @example
   * const proc = runner.run('java', ['-version']);
   * const result = await proc.wait();
   * if (result.exitCode !== 0) {
   *   console.error(result.stderr);
   * }
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

type ExecaSubprocess = ReturnType<typeof execa>;

/**
 * SpawnedProcess implementation wrapping an execa subprocess.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private cachedResult: ProcessResult | null = null;

  constructor(
    private readonly subprocess: ExecaSubprocess,
    private readonly logger: Logger,
    private readonly command: string
  ) {}

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  async wait(): Promise<ProcessResult> {
    if (this.cachedResult !== null) {
      return this.cachedResult;
    }

    const result = await this.waitForProcess();
    this.cachedResult = result;
    this.logResult(result);
    return result;
  }

  private logResult(result: ProcessResult): void {
    this.logOutputLines(result.stdout, "stdout");
    this.logOutputLines(result.stderr, "stderr");

    if (result.timedOut) {
      this.logger.warn("Timed out", { command: this.command, pid: this.pid ?? 0 });
      return;
    }
    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid ?? 0,
      exitCode: result.exitCode ?? -1,
    });
  }

  /**
   * Log output lines (stdout or stderr) at SILLY level.
   */
  private logOutputLines(output: string, stream: "stdout" | "stderr"): void {
    if (!output) return;

    const prefix = `[${this.command} ${this.pid ?? 0}]`;
    for (const line of output.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.silly(`${prefix} ${stream}: ${line}`);
    }
  }

  private async waitForProcess(): Promise<ProcessResult> {
    try {
      return this.convertResult(await this.subprocess);
    } catch (error) {
      // reject: false keeps exit failures in the result; anything thrown here is unexpected
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error("Spawn failed", { command: this.command, error: message });
      return { stdout: "", stderr: message, exitCode: null };
    }
  }

  private convertResult(result: Awaited<ExecaSubprocess>): ProcessResult {
    let stderr = typeof result.stderr === "string" ? result.stderr : "";
    // Spawn errors (ENOENT, EACCES) come back as failed results with the reason in originalMessage
    if (result.failed && !stderr && "originalMessage" in result) {
      stderr = String(result.originalMessage);
    }

    const processResult: ProcessResult = {
      stdout: typeof result.stdout === "string" ? result.stdout : "",
      stderr,
      exitCode: result.exitCode ?? null,
      timedOut: result.timedOut,
    };
    if (result.signal) {
      return { ...processResult, signal: result.signal };
    }
    return processResult;
  }
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const subprocess = execa(command, [...args], {
      cleanup: true,
      encoding: "utf8",
      reject: false, // Don't throw on non-zero exit - check exitCode instead
      windowsHide: true,
      ...(options?.cwd && { cwd: options.cwd }),
      ...(options?.timeout !== undefined && { timeout: options.timeout }),
      // extendEnv: false so keys deleted from the custom env are not inherited
      ...(options?.env && { env: options.env, extendEnv: false }),
    });

    const spawned = new ExecaSpawnedProcess(subprocess, this.logger, command);

    // Spawn failures have no PID and are logged by wait()
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }

    return spawned;
  }
}
