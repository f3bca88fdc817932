// pattern: Functional Core
import { describe, expect, it } from "vitest";

import {
  BuildFailure,
  ConfigurationError,
  EnvironmentLoadError,
  ExitCodes,
  failureKindOf,
  HermeticityViolation,
  SealcheckError,
  SmokeTestFailure,
  ValidationError,
} from "./errors.js";

describe("sealcheck errors", () => {
  it("should give every failure class its own exit code", () => {
    const codes = [
      new HermeticityViolation("reachable", "https://example.test", 204),
      new EnvironmentLoadError("missing", "/deps/prefetch.env"),
      new BuildFailure("exit 1"),
      new SmokeTestFailure("exit 2", "/dist/tool"),
    ].map(error => error.exitCode);

    expect(codes).toEqual([10, 11, 12, 13]);
  });

  it("should share the configuration exit code between config and validation errors", () => {
    expect(new ConfigurationError("bad").exitCode).toBe(
      ExitCodes.CONFIGURATION
    );
    expect(new ValidationError("bad", ["/probe: nope"]).exitCode).toBe(
      ExitCodes.CONFIGURATION
    );
  });

  it("should keep the class name and the details of the failure", () => {
    const error = new BuildFailure("Build command exited with code 2", "out", 2);

    expect(error).toBeInstanceOf(SealcheckError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("BuildFailure");
    expect(error.category).toBe("build");
    expect(error.toolOutput).toBe("out");
    expect(error.toolExitCode).toBe(2);
  });

  it("should leave optional details unset", () => {
    const error = new EnvironmentLoadError("missing", "/deps/prefetch.env");

    expect(error.line).toBeUndefined();
    expect(error.filePath).toBe("/deps/prefetch.env");
  });

  it("should leave tool details unset when none are given", () => {
    const error = new BuildFailure("Source tree is empty: /src");

    expect(error.toolOutput).toBeUndefined();
    expect(error.toolExitCode).toBeUndefined();
  });
});

describe("failureKindOf", () => {
  it("should name the pipeline failure an error represents", () => {
    expect(
      failureKindOf(new HermeticityViolation("x", "https://example.test", 200))
    ).toBe("HermeticityViolation");
    expect(failureKindOf(new EnvironmentLoadError("x", "/f"))).toBe(
      "EnvironmentLoadError"
    );
    expect(failureKindOf(new BuildFailure("x"))).toBe("BuildFailure");
    expect(failureKindOf(new SmokeTestFailure("x", "/a"))).toBe(
      "SmokeTestFailure"
    );
  });

  it("should return null for anything else", () => {
    expect(failureKindOf(new ConfigurationError("x"))).toBeNull();
    expect(failureKindOf(new Error("x"))).toBeNull();
    expect(failureKindOf("x")).toBeNull();
  });
});
