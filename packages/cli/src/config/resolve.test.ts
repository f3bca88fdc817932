// pattern: Functional Core
import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../utils/errors.js";

import { validateSettingsObject } from "./loaders/settings-harness.js";
import { resolveHarnessConfig } from "./resolve.js";

import type { SettingsHarness } from "./types/index.js";

function settings(data: unknown): SettingsHarness {
  if (!validateSettingsObject(data)) {
    throw new Error("validateSettingsObject returned false");
  }
  return data;
}

describe("resolveHarnessConfig", () => {
  it("should fill every gap with the defaults", () => {
    const config = resolveHarnessConfig(
      settings({ version: 1 }),
      "/work",
      {},
      "/elsewhere"
    );

    expect(config).toEqual({
      probe: { url: "https://proxy.golang.org", timeoutMs: 5000 },
      environment: { file: "/work/prefetch.env", format: "auto" },
      sourceDir: "/work/source",
      build: {
        command: "go",
        args: ["build", "-o", "{{output}}"],
        output: "/work/dist/retrodep",
      },
      smokeTest: { args: ["--help"], timeoutMs: 10000 },
      sandbox: { enabled: false, allowRead: [], allowReadWrite: [] },
    });
  });

  it("should resolve config paths against the config directory", () => {
    const config = resolveHarnessConfig(
      settings({
        version: 1,
        environment: { file: "deps/prefetch.json", format: "json" },
        source: { dir: "../checkout" },
        build: { output: "/abs/out/tool" },
        sandbox: { allowRead: ["toolchains"], allowReadWrite: ["/cache"] },
      }),
      "/work/ci",
      {},
      "/elsewhere"
    );

    expect(config.environment).toEqual({
      file: "/work/ci/deps/prefetch.json",
      format: "json",
    });
    expect(config.sourceDir).toBe("/work/checkout");
    expect(config.build.output).toBe("/abs/out/tool");
    expect(config.sandbox.allowRead).toEqual(["/work/ci/toolchains"]);
    expect(config.sandbox.allowReadWrite).toEqual(["/cache"]);
  });

  it("should resolve command line paths against the working directory", () => {
    const config = resolveHarnessConfig(
      settings({ version: 1, environment: { file: "ignored.env" } }),
      "/work",
      { envFile: "other.env", sourceDir: "src", output: "bin/tool" },
      "/cwd"
    );

    expect(config.environment.file).toBe("/cwd/other.env");
    expect(config.sourceDir).toBe("/cwd/src");
    expect(config.build.output).toBe("/cwd/bin/tool");
  });

  it("should let overrides win over the config file", () => {
    const config = resolveHarnessConfig(
      settings({
        version: 1,
        probe: { url: "https://config.example.test", timeoutMs: 100 },
        sandbox: { enabled: true },
      }),
      "/work",
      {
        probeUrl: "http://cli.example.test",
        probeTimeoutMs: 250,
        sandbox: false,
      }
    );

    expect(config.probe).toEqual({
      url: "http://cli.example.test",
      timeoutMs: 250,
    });
    expect(config.sandbox.enabled).toBe(false);
  });

  it("should resolve a relative toolchain path against the config directory", () => {
    const relative = resolveHarnessConfig(
      settings({ version: 1, build: { command: "./tools/go" } }),
      "/work"
    );
    const onPath = resolveHarnessConfig(
      settings({ version: 1, build: { command: "go1.22" } }),
      "/work"
    );

    expect(relative.build.command).toBe("/work/tools/go");
    expect(onPath.build.command).toBe("go1.22");
  });

  it("should reject a probe URL that is not http or https", () => {
    expect(() =>
      resolveHarnessConfig(settings({ version: 1 }), "/work", {
        probeUrl: "ftp://mirror.example.test",
      })
    ).toThrow(
      "Probe URL must use http or https, got ftp: in ftp://mirror.example.test"
    );
  });

  it("should reject a probe URL that does not parse", () => {
    expect(() =>
      resolveHarnessConfig(settings({ version: 1 }), "/work", {
        probeUrl: "proxy.golang.org",
      })
    ).toThrow(ConfigurationError);
  });

  it("should reject a non-positive probe timeout", () => {
    expect(() =>
      resolveHarnessConfig(settings({ version: 1 }), "/work", {
        probeTimeoutMs: 0,
      })
    ).toThrow(
      "Probe timeout must be a positive integer of milliseconds, got 0"
    );
  });
});
