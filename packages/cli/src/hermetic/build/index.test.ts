// pattern: Imperative Shell
import { chmod, mkdir, stat } from "fs/promises";

import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  createTempWorkspace,
  type TempWorkspace,
} from "../../test-utils/project/temp-project.js";
import { fakeToolchainScript } from "../../test-utils/toolchain/fake-toolchain.js";
import { BuildFailure } from "../../utils/errors.js";

import { isExecutableFile, runOfflineBuild } from "./index.js";

import type { ArgStringTemplate } from "../../config/types/index.js";
import type { SandboxConfig } from "../../utils/sandbox/index.js";
import type { ResolvedPath } from "../types.js";

const BUILD_ARGS = ["build", "-o", "{{output}}"].map(
  arg => arg as ArgStringTemplate
);

const NO_SANDBOX: SandboxConfig = {
  enabled: false,
  allowRead: [],
  allowReadWrite: [],
};

describe("runOfflineBuild", () => {
  const logger = pino({ level: "silent" });
  let workspace: TempWorkspace;
  let sourceDir: ResolvedPath;
  let output: ResolvedPath;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    await workspace.writeFile("source/main.go", "package main\n");
    sourceDir = workspace.resolve("source") as ResolvedPath;
    output = workspace.resolve("dist/retrodep") as ResolvedPath;
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  async function toolchain(
    options: Parameters<typeof fakeToolchainScript>[0] = {}
  ): Promise<string> {
    return workspace.writeScript("toolchain/bin/go", fakeToolchainScript(options));
  }

  it("should build an executable at the output path", async () => {
    const command = await toolchain();

    const result = await runOfflineBuild({
      sourceDir,
      overlay: {},
      command,
      args: BUILD_ARGS,
      output,
      sandbox: NO_SANDBOX,
      logger,
    });

    expect(result.artifactPath).toBe(output);
    expect(result.toolchainPath).toBe(command);
    expect(await isExecutableFile(output)).toBe(true);
  });

  it("should run in the source tree with the overlay applied", async () => {
    const command = await toolchain();

    const result = await runOfflineBuild({
      sourceDir,
      overlay: {
        GOFLAGS: "-mod=mod",
        GOPROXY: "file:///deps/gomod/cache/download",
      },
      command,
      args: BUILD_ARGS,
      output,
      sandbox: NO_SANDBOX,
      logger,
    });

    expect(result.toolOutput.split("\n")).toEqual([
      `cwd=${sourceDir}`,
      "GOFLAGS=-mod=mod",
      "GOPROXY=file:///deps/gomod/cache/download",
    ]);
  });

  it("should let the overlay win over inherited variables", async () => {
    const previous = process.env["GOFLAGS"];
    process.env["GOFLAGS"] = "-mod=readonly";
    try {
      const command = await toolchain();

      const result = await runOfflineBuild({
        sourceDir,
        overlay: { GOFLAGS: "-mod=vendor" },
        command,
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      });

      expect(result.toolOutput).toContain("GOFLAGS=-mod=vendor");
    } finally {
      if (previous === undefined) {
        delete process.env["GOFLAGS"];
      } else {
        process.env["GOFLAGS"] = previous;
      }
    }
  });

  it("should create the output directory", async () => {
    const command = await toolchain();
    const nested = workspace.resolve("out/deep/retrodep") as ResolvedPath;

    await runOfflineBuild({
      sourceDir,
      overlay: {},
      command,
      args: BUILD_ARGS,
      output: nested,
      sandbox: NO_SANDBOX,
      logger,
    });

    expect((await stat(nested)).isFile()).toBe(true);
  });

  it("should carry the toolchain output when the build fails", async () => {
    const command = await toolchain({
      exitCode: 1,
      stderr: "main.go:3:2: cannot find module providing package example.test/dep",
      artifact: "none",
    });

    const error: unknown = await runOfflineBuild({
      sourceDir,
      overlay: {},
      command,
      args: BUILD_ARGS,
      output,
      sandbox: NO_SANDBOX,
      logger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BuildFailure);
    expect(error).toMatchObject({
      message: "Build command exited with code 1",
      toolExitCode: 1,
    });
    expect(error instanceof BuildFailure && error.toolOutput).toContain(
      "main.go:3:2: cannot find module providing package example.test/dep"
    );
  });

  it("should fail when the build produces no artifact", async () => {
    const command = await toolchain({ artifact: "none" });

    await expect(
      runOfflineBuild({
        sourceDir,
        overlay: {},
        command,
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      })
    ).rejects.toThrow(`Build exited 0 but ${output} is not an executable file`);
  });

  it("should not accept an artifact left by an earlier run", async () => {
    await workspace.writeScript("dist/retrodep", "#!/bin/sh\nexit 0\n");
    const command = await toolchain({ artifact: "none" });

    await expect(
      runOfflineBuild({
        sourceDir,
        overlay: {},
        command,
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      })
    ).rejects.toThrow(`Build exited 0 but ${output} is not an executable file`);
    expect(await isExecutableFile(output)).toBe(false);
  });

  it("should fail when the artifact is not executable", async () => {
    const command = await toolchain({ artifact: "not-executable" });

    await expect(
      runOfflineBuild({
        sourceDir,
        overlay: {},
        command,
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      })
    ).rejects.toBeInstanceOf(BuildFailure);
  });

  it("should fail before running anything when the source tree is missing", async () => {
    const command = await toolchain();
    const missing = workspace.resolve("nowhere") as ResolvedPath;

    await expect(
      runOfflineBuild({
        sourceDir: missing,
        overlay: {},
        command,
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      })
    ).rejects.toThrow(`Source tree not found: ${missing}`);
    expect(await isExecutableFile(output)).toBe(false);
  });

  it("should report a source tree that cannot be inspected", async () => {
    const command = await toolchain();
    await workspace.writeFile("notadir", "");
    const unreachable = workspace.resolve("notadir/source") as ResolvedPath;

    const error: unknown = await runOfflineBuild({
      sourceDir: unreachable,
      overlay: {},
      command,
      args: BUILD_ARGS,
      output,
      sandbox: NO_SANDBOX,
      logger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BuildFailure);
    expect(error instanceof BuildFailure && error.message).toContain(
      `Cannot inspect source tree ${unreachable}: ENOTDIR`
    );
  });

  it("should report an output directory that cannot be created", async () => {
    const command = await toolchain();
    const blocker = await workspace.writeFile("blocker", "");
    const blocked = workspace.resolve("blocker/retrodep") as ResolvedPath;

    const error: unknown = await runOfflineBuild({
      sourceDir,
      overlay: {},
      command,
      args: BUILD_ARGS,
      output: blocked,
      sandbox: NO_SANDBOX,
      logger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BuildFailure);
    expect(error instanceof BuildFailure && error.message).toContain(
      `Cannot create output directory ${blocker}: EEXIST`
    );
  });

  it("should fail when the source tree is empty", async () => {
    const command = await toolchain();
    const empty = workspace.resolve("empty") as ResolvedPath;
    await mkdir(empty);

    await expect(
      runOfflineBuild({
        sourceDir: empty,
        overlay: {},
        command,
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      })
    ).rejects.toThrow(`Source tree is empty: ${empty}`);
  });

  it("should fail when the toolchain cannot be found", async () => {
    await expect(
      runOfflineBuild({
        sourceDir,
        overlay: {},
        command: "sealcheck-no-such-toolchain",
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      })
    ).rejects.toThrow(
      "Toolchain command not found: sealcheck-no-such-toolchain"
    );
  });

  it("should reject a toolchain without execute permission", async () => {
    const command = await toolchain();
    await chmod(command, 0o644);

    await expect(
      runOfflineBuild({
        sourceDir,
        overlay: {},
        command,
        args: BUILD_ARGS,
        output,
        sandbox: NO_SANDBOX,
        logger,
      })
    ).rejects.toThrow(`Toolchain command not found: ${command}`);
  });
});
