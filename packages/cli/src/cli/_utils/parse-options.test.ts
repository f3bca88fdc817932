// pattern: Functional Core

import { InvalidArgumentError } from "@commander-js/extra-typings";
import { describe, expect, it } from "vitest";

import { parseChoice, parseTimeoutMs } from "./parse-options.js";

describe("parseTimeoutMs", () => {
  it("should parse whole milliseconds", () => {
    expect(parseTimeoutMs("2500")).toBe(2500);
  });

  it("should reject fractions, units and negatives", () => {
    expect(() => parseTimeoutMs("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseTimeoutMs("5s")).toThrow(
      "Must be a whole number of milliseconds."
    );
    expect(() => parseTimeoutMs("-1")).toThrow(InvalidArgumentError);
  });

  it("should reject zero", () => {
    expect(() => parseTimeoutMs("0")).toThrow("Must be greater than zero.");
  });
});

describe("parseChoice", () => {
  const parseFormat = parseChoice(["env", "json"] as const);

  it("should return the matching choice", () => {
    expect(parseFormat("json")).toBe("json");
  });

  it("should list the choices when nothing matches", () => {
    expect(() => parseFormat("yaml")).toThrow("Must be one of: env, json.");
  });
});
