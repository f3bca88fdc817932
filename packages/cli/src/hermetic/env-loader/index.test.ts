// pattern: Imperative Shell
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { EnvironmentLoadError } from "../../utils/errors.js";

import {
  detectEnvironmentFormat,
  EnvironmentParseError,
  formatOverlay,
  loadEnvironmentFile,
  parseEnvFile,
  parseEnvJson,
} from "./index.js";

describe("parseEnvFile", () => {
  it("should parse the lines a prefetch tool writes", () => {
    const content = [
      "# generated by the prefetch step",
      "export GOFLAGS=-mod=mod",
      "GOMODCACHE=/tmp/deps/gomod/pkg/mod",
      "",
      "export GOPROXY='file:///tmp/deps/gomod/pkg/mod/cache/download'",
      'GONOSUMDB="*"',
      "EMPTY=",
      'SPACED="a b"   # trailing comment',
      "UNQUOTED=value # comment",
    ].join("\n");

    expect(parseEnvFile(content)).toEqual({
      GOFLAGS: "-mod=mod",
      GOMODCACHE: "/tmp/deps/gomod/pkg/mod",
      GOPROXY: "file:///tmp/deps/gomod/pkg/mod/cache/download",
      GONOSUMDB: "*",
      EMPTY: "",
      SPACED: "a b",
      UNQUOTED: "value",
    });
  });

  it("should apply shell escapes inside double quotes only", () => {
    const content = [
      'ESCAPED="say \\"hi\\" \\$HOME \\n"',
      "LITERAL='$HOME \\x'",
    ].join("\n");

    expect(parseEnvFile(content)).toEqual({
      ESCAPED: 'say "hi" $HOME \\n',
      LITERAL: "$HOME \\x",
    });
  });

  it("should keep the last value of a repeated key", () => {
    expect(parseEnvFile("GOPROXY=first\nGOPROXY=second\n")).toEqual({
      GOPROXY: "second",
    });
  });

  it("should keep a variable named after an object property", () => {
    const parsed = parseEnvFile("__proto__=x\nGOFLAGS=-mod=mod\n");

    expect(Object.entries(parsed)).toEqual([
      ["__proto__", "x"],
      ["GOFLAGS", "-mod=mod"],
    ]);
    expect(Object.getPrototypeOf(parsed)).toBe(Object.prototype);
  });

  it("should accept CRLF line endings", () => {
    expect(parseEnvFile("A=1\r\nB=2\r\n")).toEqual({ A: "1", B: "2" });
  });

  it("should return an empty map for a file of comments", () => {
    expect(parseEnvFile("# nothing here\n\n")).toEqual({});
  });

  it("should reject a line without an assignment", () => {
    expect(() => parseEnvFile("A=1\n\nNOEQUALS\n")).toThrow(
      "line 3: expected KEY=VALUE, got: NOEQUALS"
    );
  });

  it("should reject invalid variable names", () => {
    expect(() => parseEnvFile("1BAD=x")).toThrow(
      'line 1: invalid variable name: "1BAD"'
    );
    expect(() => parseEnvFile("SPACE BEFORE=x")).toThrow(
      'line 1: invalid variable name: "SPACE BEFORE"'
    );
  });

  it("should reject unterminated quotes", () => {
    expect(() => parseEnvFile('Q="open')).toThrow(
      "line 1: unterminated double quote"
    );
    expect(() => parseEnvFile("Q='open")).toThrow(
      "line 1: unterminated single quote"
    );
  });

  it("should reject text after a closing quote", () => {
    expect(() => parseEnvFile("Q='a' b")).toThrow(
      "line 1: unexpected text after closing quote: b"
    );
  });

  it("should report the line number on the error", () => {
    try {
      parseEnvFile("A=1\nB='x");
      expect.unreachable("parse should have failed");
    } catch (error) {
      expect(error).toBeInstanceOf(EnvironmentParseError);
      expect((error as EnvironmentParseError).line).toBe(2);
    }
  });
});

describe("parseEnvJson", () => {
  it("should parse a list of name/value entries", () => {
    const content = JSON.stringify([
      { name: "GOFLAGS", value: "-mod=mod" },
      { name: "GOMODCACHE", value: "/deps/gomod" },
    ]);

    expect(parseEnvJson(content)).toEqual({
      GOFLAGS: "-mod=mod",
      GOMODCACHE: "/deps/gomod",
    });
  });

  it("should keep an entry named after an object property", () => {
    const content = JSON.stringify([
      { name: "__proto__", value: "x" },
      { name: "constructor", value: "y" },
    ]);

    expect(Object.entries(parseEnvJson(content))).toEqual([
      ["__proto__", "x"],
      ["constructor", "y"],
    ]);
  });

  it("should reject entries without a value", () => {
    expect(() => parseEnvJson('[{"name": "GOFLAGS"}]')).toThrow(
      "invalid environment JSON: /0: must have required property 'value'"
    );
  });

  it("should reject a top-level object", () => {
    expect(() => parseEnvJson('{"GOFLAGS": "-mod=mod"}')).toThrow(
      "invalid environment JSON: root: must be array"
    );
  });
});

describe("detectEnvironmentFormat", () => {
  it("should pick json for .json files in auto mode", () => {
    expect(detectEnvironmentFormat("/deps/prefetch.json", "auto")).toBe("json");
    expect(detectEnvironmentFormat("/deps/prefetch.env", "auto")).toBe("env");
  });

  it("should honour an explicit format", () => {
    expect(detectEnvironmentFormat("/deps/prefetch.json", "env")).toBe("env");
  });
});

describe("formatOverlay", () => {
  it("should write sorted export lines with double-quote escaping", () => {
    const overlay = { GOPROXY: "file:///deps", A: 'it\'s "$x"' };

    expect(formatOverlay(overlay, "env")).toBe(
      'export A="it\'s \\"\\$x\\""\nexport GOPROXY="file:///deps"\n'
    );
  });

  it("should produce lines the parser reads back unchanged", () => {
    const overlay = {
      GOFLAGS: "-mod=mod",
      TRICKY: 'back\\slash `tick` "quote" $dollar',
    };

    expect(parseEnvFile(formatOverlay(overlay, "env"))).toEqual(overlay);
    expect(parseEnvJson(formatOverlay(overlay, "json"))).toEqual(overlay);
  });

  it("should refuse values with line breaks in env format", () => {
    expect(() => formatOverlay({ MULTI: "a\nb" }, "env")).toThrow(
      "Variable MULTI contains a line break"
    );
  });
});

describe("loadEnvironmentFile", () => {
  const logger = pino({ level: "silent" });
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "sealcheck-env-test-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should return every variable in the file", async () => {
    const filePath = join(testDir, "prefetch.env");
    await writeFile(
      filePath,
      "export GOFLAGS=-mod=mod\nexport GOPROXY=file:///deps/gomod\n"
    );

    const overlay = await loadEnvironmentFile({
      filePath,
      format: "auto",
      logger,
    });

    expect(overlay).toEqual({
      GOFLAGS: "-mod=mod",
      GOPROXY: "file:///deps/gomod",
    });
    expect(Object.isFrozen(overlay)).toBe(true);
  });

  it("should not modify the file or the process environment", async () => {
    const filePath = join(testDir, "prefetch.env");
    const content = "SEALCHECK_TEST_ONLY_VAR=injected\n";
    await writeFile(filePath, content);

    await loadEnvironmentFile({ filePath, format: "env", logger });

    expect(await readFile(filePath, "utf8")).toBe(content);
    expect(process.env["SEALCHECK_TEST_ONLY_VAR"]).toBeUndefined();
  });

  it("should load JSON files", async () => {
    const filePath = join(testDir, "prefetch.json");
    await writeFile(
      filePath,
      JSON.stringify([{ name: "GOFLAGS", value: "-mod=mod" }])
    );

    const overlay = await loadEnvironmentFile({
      filePath,
      format: "auto",
      logger,
    });

    expect(overlay).toEqual({ GOFLAGS: "-mod=mod" });
  });

  it("should fail with EnvironmentLoadError when the file is missing", async () => {
    const filePath = join(testDir, "missing.env");

    const attempt = loadEnvironmentFile({ filePath, format: "auto", logger });

    await expect(attempt).rejects.toBeInstanceOf(EnvironmentLoadError);
    await expect(attempt).rejects.toThrow(
      `Environment file not found: ${filePath}`
    );
  });

  it("should fail with EnvironmentLoadError when the path is a directory", async () => {
    const attempt = loadEnvironmentFile({
      filePath: testDir,
      format: "env",
      logger,
    });

    await expect(attempt).rejects.toBeInstanceOf(EnvironmentLoadError);
    await expect(attempt).rejects.toThrow(
      `Could not read environment file ${testDir}`
    );
  });

  it("should carry the line number of a malformed line", async () => {
    const filePath = join(testDir, "prefetch.env");
    await writeFile(filePath, "GOFLAGS=-mod=mod\nnot an assignment\n");

    const error: unknown = await loadEnvironmentFile({
      filePath,
      format: "env",
      logger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EnvironmentLoadError);
    expect(error).toMatchObject({
      filePath,
      line: 2,
      message: `Could not parse environment file ${filePath}: line 2: expected KEY=VALUE, got: not an assignment`,
    });
  });

  it("should fail on JSON that does not parse", async () => {
    const filePath = join(testDir, "prefetch.json");
    await writeFile(filePath, "[{");

    await expect(
      loadEnvironmentFile({ filePath, format: "json", logger })
    ).rejects.toBeInstanceOf(EnvironmentLoadError);
  });
});
