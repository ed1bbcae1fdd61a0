/**
 * Tests for the command-line front end.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import * as path from "node:path";
import {
  EXIT_CONFIGURATION,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  createProgressReporter,
  main,
  type CliDeps,
  type CliPlatform,
} from "./cli.js";
import { createFileSystemMock, file } from "./services/platform/filesystem.state-mock.js";
import { createMockHttpClient } from "./services/platform/http-client.state-mock.js";
import { createMockPlatformInfo } from "./services/platform/platform-info.test-utils.js";
import {
  createMockProcessRunner,
  createMockSpawnedProcess,
} from "./services/platform/process.test-utils.js";
import { createMockArchiveExtractor } from "./services/install/archive-extractor.test-utils.js";
import { createMockEnvironmentStore } from "./services/install/environment-store.state-mock.js";
import {
  createMockLogger,
  createMockLoggingService,
  type MockLoggingService,
} from "./services/logging/logging.test-utils.js";
import type { PlatformInfo } from "./services/platform/platform-info.js";

const ARCHIVE = path.resolve("/downloads/sample.zip");
const DEST = path.resolve("/opt/java");
const VERSION = 'openjdk version "21.0.5" 2024-10-15';

interface Harness {
  deps: CliDeps;
  stdout: string[];
  stderr: string[];
  loggingService: MockLoggingService;
  createLoggingService: Mock<CliDeps["createLoggingService"]>;
}

function createHarness(
  options: { env?: NodeJS.ProcessEnv; writeExecutable?: boolean; platformInfo?: PlatformInfo } = {}
): Harness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const loggingService = createMockLoggingService();
  const fileSystemLayer = createFileSystemMock({ entries: { [ARCHIVE]: file("PK") } });
  const writeExecutable = options.writeExecutable ?? true;

  const platform: CliPlatform = {
    httpClient: createMockHttpClient(),
    fileSystemLayer,
    processRunner: createMockProcessRunner(
      createMockSpawnedProcess({ waitResult: { exitCode: 0, stdout: "", stderr: `${VERSION}\n` } })
    ),
    platformInfo: options.platformInfo ?? createMockPlatformInfo(),
    environmentStore: createMockEnvironmentStore(),
    extractor: createMockArchiveExtractor({
      onExtract: async (_archive, destDir) => {
        if (writeExecutable) {
          fileSystemLayer.$.setEntry(path.join(destDir, "bin", "java.exe"), file("MZ"));
        }
      },
    }),
  };

  const createLoggingService = vi.fn<CliDeps["createLoggingService"]>(() => loggingService);
  const deps: CliDeps = {
    env: options.env ?? {},
    output: {
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
    },
    createLoggingService,
    createPlatform: () => platform,
  };

  return { deps, stdout, stderr, loggingService, createLoggingService };
}

describe("main", () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  it("installs from a file and prints the version", async () => {
    const exitCode = await main(["--file", ARCHIVE, "--destination", DEST], harness.deps);

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(harness.stdout).toEqual([VERSION]);
    expect(harness.stderr).toEqual([]);
  });

  it("exits with the configuration code when no source is given", async () => {
    const exitCode = await main(["--destination", DEST], harness.deps);

    expect(exitCode).toBe(EXIT_CONFIGURATION);
    expect(harness.stderr).toEqual([
      "[configuration] No archive source given: pass --file <archive> or --latest",
    ]);
    expect(harness.stdout).toEqual([]);
  });

  it("rejects --file together with --latest", async () => {
    const exitCode = await main(["--file", ARCHIVE, "--latest"], harness.deps);

    expect(exitCode).toBe(EXIT_CONFIGURATION);
    expect(harness.stderr).toEqual([
      "[configuration] Both an archive file and --latest were given; choose one",
    ]);
  });

  it("rejects an invalid environment override", async () => {
    harness = createHarness({ env: { JDK_INSTALLER_REQUEST_TIMEOUT_MS: "soon" } });

    const exitCode = await main(["--file", ARCHIVE], harness.deps);

    expect(exitCode).toBe(EXIT_CONFIGURATION);
    expect(harness.stderr[0]).toMatch(/^\[configuration\] Invalid environment: /);
  });

  it("exits with the configuration code on an unknown option", async () => {
    const exitCode = await main(["--bogus"], harness.deps);

    expect(exitCode).toBe(EXIT_CONFIGURATION);
    expect(harness.stderr[0]).toMatch(/^error: unknown option '--bogus'/);
    expect(harness.createLoggingService).not.toHaveBeenCalled();
  });

  it("prints help and exits successfully", async () => {
    const exitCode = await main(["--help"], harness.deps);

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(harness.stdout.join("\n")).toContain("--update-path");
  });

  it("reports a stage failure with its type and exits with 1", async () => {
    harness = createHarness({ writeExecutable: false });

    const exitCode = await main(["--file", ARCHIVE, "--destination", DEST], harness.deps);

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(harness.stderr).toEqual([
      `[verification] binary not found at ${path.join(DEST, "bin", "java.exe")}`,
    ]);
    expect(harness.loggingService.getLogger("cli")?.error).toHaveBeenCalledWith(
      "Installation failed",
      { error: `binary not found at ${path.join(DEST, "bin", "java.exe")}` }
    );
  });

  it("enables debug logging with --verbose", async () => {
    await main(["--file", ARCHIVE, "--destination", DEST, "--verbose"], harness.deps);

    expect(harness.createLoggingService).toHaveBeenCalledWith(true, {});
  });

  it("warns when not running on Windows x64", async () => {
    harness = createHarness({ platformInfo: createMockPlatformInfo({ platform: "linux" }) });

    await main(["--file", ARCHIVE, "--destination", DEST], harness.deps);

    expect(harness.loggingService.getLogger("cli")?.warn).toHaveBeenCalledWith(
      "Release archives target Windows x64",
      { platform: "linux", arch: "x64" }
    );
  });

  it("disposes the logging service", async () => {
    await main(["--file", ARCHIVE, "--destination", DEST], harness.deps);

    expect(harness.loggingService.dispose).toHaveBeenCalledTimes(1);
  });
});

describe("createProgressReporter", () => {
  it("logs once per 10% step", () => {
    const logger = createMockLogger();
    const report = createProgressReporter(logger);

    report({ bytesDownloaded: 0, totalBytes: 1000 });
    report({ bytesDownloaded: 50, totalBytes: 1000 });
    report({ bytesDownloaded: 100, totalBytes: 1000 });
    report({ bytesDownloaded: 1000, totalBytes: 1000 });

    expect(logger.info.mock.calls.map(([, context]) => context?.percent)).toEqual([0, 10, 100]);
  });

  it("logs every 10 MiB when the size is unknown", () => {
    const logger = createMockLogger();
    const report = createProgressReporter(logger);
    const mib = 1024 * 1024;

    report({ bytesDownloaded: mib, totalBytes: null });
    report({ bytesDownloaded: 5 * mib, totalBytes: null });
    report({ bytesDownloaded: 12 * mib, totalBytes: null });

    expect(logger.info.mock.calls.map(([, context]) => context?.bytesDownloaded)).toEqual([
      mib,
      12 * mib,
    ]);
  });
});
