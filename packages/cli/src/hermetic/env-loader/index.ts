// pattern: Mixed (unavoidable)
// Parsing is pure; loading reads exactly one file and never writes

import { readFile } from "fs/promises";
import { extname } from "path";

import { type Static, Type } from "@sinclair/typebox";

import { ajv, formatAjvErrors } from "../../utils/ajv.js";
import { EnvironmentLoadError } from "../../utils/errors.js";

import type { EnvironmentFileFormat } from "../../config/types/index.js";
import type { EnvironmentOverlay } from "../types.js";
import type { Logger } from "pino";

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Characters a backslash escapes inside double quotes in a POSIX shell
const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', "\\", "$", "`"]);

export const EnvironmentJsonEntry = Type.Object({
  name: Type.String({ pattern: ENV_KEY_PATTERN.source }),
  value: Type.String(),
});
export const EnvironmentJson = Type.Array(EnvironmentJsonEntry);
export type EnvironmentJson = Static<typeof EnvironmentJson>;

const validateEnvironmentJson = ajv.compile<EnvironmentJson>(EnvironmentJson);

/**
 * A malformed line in a KEY=VALUE environment file
 */
export class EnvironmentParseError extends Error {
  public readonly line: number;

  constructor(message: string, line: number) {
    super(`line ${line}: ${message}`);
    this.name = "EnvironmentParseError";
    this.line = line;
  }
}

// Anything after a closing quote must be blank or a comment
function assertTrailerIsComment(trailer: string, line: number): void {
  const trimmed = trailer.trim();
  if (trimmed !== "" && !(/^\s/.test(trailer) && trimmed.startsWith("#"))) {
    throw new EnvironmentParseError(
      `unexpected text after closing quote: ${trimmed}`,
      line
    );
  }
}

function parseSingleQuoted(raw: string, line: number): string {
  const end = raw.indexOf("'", 1);
  if (end === -1) {
    throw new EnvironmentParseError("unterminated single quote", line);
  }
  assertTrailerIsComment(raw.slice(end + 1), line);
  return raw.slice(1, end);
}

function parseDoubleQuoted(raw: string, line: number): string {
  let value = "";
  for (let i = 1; i < raw.length; i++) {
    const char = raw.charAt(i);
    if (char === "\\" && i + 1 < raw.length) {
      const next = raw.charAt(i + 1);
      value += DOUBLE_QUOTE_ESCAPABLE.has(next) ? next : `\\${next}`;
      i++;
      continue;
    }
    if (char === '"') {
      assertTrailerIsComment(raw.slice(i + 1), line);
      return value;
    }
    value += char;
  }
  throw new EnvironmentParseError("unterminated double quote", line);
}

function parseValue(raw: string, line: number): string {
  const value = raw.trimStart();
  if (value.startsWith("'")) {
    return parseSingleQuoted(value, line);
  }
  if (value.startsWith('"')) {
    return parseDoubleQuoted(value, line);
  }
  return value.replace(/\s+#.*$/, "").trim();
}

/**
 * Parses shell-sourceable KEY=VALUE lines.
 * Blank lines and # comments are skipped, `export ` is optional, and a
 * repeated key keeps its last value.
 */
export function parseEnvFile(content: string): Record<string, string> {
  // A Map keeps keys such as __proto__ that plain assignment would drop
  const result = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  for (const [index, rawLine] of lines.entries()) {
    const lineNumber = index + 1;
    const trimmed = rawLine.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      continue;
    }

    const assignment = trimmed.replace(/^export\s+/, "");
    const equals = assignment.indexOf("=");
    if (equals === -1) {
      throw new EnvironmentParseError(
        `expected KEY=VALUE, got: ${trimmed}`,
        lineNumber
      );
    }

    const key = assignment.slice(0, equals);
    if (!ENV_KEY_PATTERN.test(key)) {
      throw new EnvironmentParseError(
        `invalid variable name: ${JSON.stringify(key)}`,
        lineNumber
      );
    }

    result.set(key, parseValue(assignment.slice(equals + 1), lineNumber));
  }

  return Object.fromEntries(result);
}

/**
 * Parses a JSON list of {name, value} entries
 */
export function parseEnvJson(content: string): Record<string, string> {
  const data: unknown = JSON.parse(content);
  if (!validateEnvironmentJson(data)) {
    throw new Error(
      `invalid environment JSON: ${formatAjvErrors(validateEnvironmentJson.errors).join(", ")}`
    );
  }

  return Object.fromEntries(data.map(entry => [entry.name, entry.value]));
}

/**
 * Picks the concrete format for a file; auto means JSON for .json files
 */
export function detectEnvironmentFormat(
  filePath: string,
  format: EnvironmentFileFormat
): "env" | "json" {
  if (format !== "auto") {
    return format;
  }
  return extname(filePath).toLowerCase() === ".json" ? "json" : "env";
}

function shellQuote(key: string, value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new Error(
      `Variable ${key} contains a line break and cannot be written as a KEY=VALUE line`
    );
  }
  return `"${value.replace(/["\\$`]/g, char => `\\${char}`)}"`;
}

/**
 * Renders an overlay back into a file the loader accepts
 */
export function formatOverlay(
  overlay: EnvironmentOverlay,
  format: "env" | "json"
): string {
  const keys = Object.keys(overlay).sort();

  if (format === "json") {
    const entries: EnvironmentJson = keys.map(name => ({
      name,
      value: overlay[name] ?? "",
    }));
    return `${JSON.stringify(entries, null, 2)}\n`;
  }

  return keys
    .map(key => `export ${key}=${shellQuote(key, overlay[key] ?? "")}\n`)
    .join("");
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export interface LoadEnvironmentOptions {
  filePath: string;
  format: EnvironmentFileFormat;
  logger: Logger;
}

/**
 * Reads the prefetched environment file into an immutable overlay.
 * Missing, unreadable and malformed files all fail with EnvironmentLoadError;
 * there is no fallback.
 */
export async function loadEnvironmentFile(
  options: LoadEnvironmentOptions
): Promise<EnvironmentOverlay> {
  const { filePath, logger } = options;
  const format = detectEnvironmentFormat(filePath, options.format);

  logger.debug({ filePath, format }, "Loading environment file");

  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new EnvironmentLoadError(
        `Environment file not found: ${filePath}`,
        filePath
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new EnvironmentLoadError(
      `Could not read environment file ${filePath}: ${reason}`,
      filePath
    );
  }

  let parsed: Record<string, string>;
  try {
    parsed = format === "json" ? parseEnvJson(content) : parseEnvFile(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EnvironmentLoadError(
      `Could not parse environment file ${filePath}: ${reason}`,
      filePath,
      error instanceof EnvironmentParseError ? error.line : undefined
    );
  }

  const keys = Object.keys(parsed);
  if (keys.length === 0) {
    logger.warn(
      { filePath },
      "Environment file defines no variables; the build will resolve dependencies without an injected cache"
    );
  }

  logger.debug({ filePath, keys }, "Environment file loaded");
  return Object.freeze({ ...parsed });
}
