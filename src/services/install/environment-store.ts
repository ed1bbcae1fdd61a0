/**
 * Machine-scope environment variable storage.
 */

import { EnvironmentError } from "../errors.js";
import type { ProcessRunner } from "../platform/process.js";
import type { Logger } from "../logging/index.js";

/**
 * Read and write persistent machine-wide environment variables.
 */
export interface EnvironmentStore {
  /**
   * @returns The stored value, or undefined when the variable is not set
   * @throws EnvironmentError when the store cannot be read
   */
  get(name: string): Promise<string | undefined>;

  /**
   * @throws EnvironmentError when the store cannot be written
   */
  set(name: string, value: string): Promise<void>;
}

/**
 * Makes PowerShell write stdout as UTF-8 instead of the console code page.
 */
export const UTF8_OUTPUT_PREFIX = "[Console]::OutputEncoding = [System.Text.Encoding]::UTF8; ";

export interface PowerShellEnvironmentStoreOptions {
  /** PowerShell executable. Default: powershell.exe */
  readonly shell?: string;
  /** Per-call timeout in ms. Default: 30000 */
  readonly timeoutMs?: number;
}

/**
 * Quote a value as a PowerShell single-quoted string literal.
 */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * EnvironmentStore backed by `[Environment]::Get/SetEnvironmentVariable`
 * with the Machine target. Writing requires an elevated process.
 */
export class PowerShellEnvironmentStore implements EnvironmentStore {
  private readonly shell: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly logger: Logger,
    options: PowerShellEnvironmentStoreOptions = {}
  ) {
    this.shell = options.shell ?? "powershell.exe";
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async get(name: string): Promise<string | undefined> {
    const value = await this.runCommand(
      `${UTF8_OUTPUT_PREFIX}[Environment]::GetEnvironmentVariable(${quotePowerShell(name)}, 'Machine')`,
      `read machine variable ${name}`
    );
    return value === "" ? undefined : value;
  }

  async set(name: string, value: string): Promise<void> {
    await this.runCommand(
      `[Environment]::SetEnvironmentVariable(${quotePowerShell(name)}, ${quotePowerShell(value)}, 'Machine')`,
      `write machine variable ${name}`
    );
    this.logger.debug("Machine variable written", { name });
  }

  private async runCommand(command: string, action: string): Promise<string> {
    const proc = this.processRunner.run(
      this.shell,
      ["-NoProfile", "-NonInteractive", "-Command", command],
      { timeout: this.timeoutMs }
    );
    const result = await proc.wait();

    if (result.exitCode !== 0) {
      const reason = result.stderr.trim() || (result.timedOut ? "timed out" : `exit code ${result.exitCode ?? "none"}`);
      throw new EnvironmentError(`Failed to ${action}: ${reason}`);
    }
    return result.stdout;
  }
}
