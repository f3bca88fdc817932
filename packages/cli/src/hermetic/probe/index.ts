// pattern: Mixed (unavoidable)
// The probe is a single network attempt; classifying its outcome is pure

import { HermeticityViolation } from "../../utils/errors.js";

import type { NetworkReachabilityResult, UnreachableReason } from "../types.js";
import type { Logger } from "pino";

const DNS_ERROR_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "EAI_NONAME",
  "EAI_FAIL",
  "EAI_NODATA",
]);

const TIMEOUT_ERROR_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
]);

export type UnreachableResult = Extract<
  NetworkReachabilityResult,
  { status: "unreachable" }
>;

export interface ProbeOptions {
  /** URL that must not be reachable */
  url: string;
  /** Give up after this many milliseconds */
  timeoutMs: number;
  logger: Logger;
  /** Injectable for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

function readStringProp(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === "string" ? prop : undefined;
}

/**
 * Maps a failed fetch to the reason the host was unreachable.
 * fetch wraps socket and resolver errors in a TypeError whose `cause` carries the code.
 */
export function classifyProbeError(error: unknown): {
  reason: UnreachableReason;
  detail: string;
} {
  const name = readStringProp(error, "name");
  const cause: unknown =
    typeof error === "object" && error !== null && "cause" in error
      ? error.cause
      : undefined;
  const code = readStringProp(cause, "code") ?? readStringProp(error, "code");
  const detail =
    readStringProp(cause, "message") ??
    readStringProp(error, "message") ??
    String(error);

  if (name === "TimeoutError" || name === "AbortError") {
    return { reason: "timeout", detail };
  }
  if (code && TIMEOUT_ERROR_CODES.has(code)) {
    return { reason: "timeout", detail };
  }
  if (code && DNS_ERROR_CODES.has(code)) {
    return { reason: "dns", detail };
  }
  if (code) {
    return { reason: "connection", detail };
  }
  return { reason: "other", detail };
}

/**
 * Sends one HEAD request to the probe URL.
 * Any HTTP answer, whatever its status, means the host is reachable.
 * Network failures are never thrown: they are the unreachable outcome.
 */
export async function probeNetwork(
  options: ProbeOptions
): Promise<NetworkReachabilityResult> {
  const { url, timeoutMs, logger } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const startedAt = performance.now();

  logger.debug({ url, timeoutMs }, "Probing outbound network access");

  try {
    const response = await fetchImpl(url, {
      method: "HEAD",
      redirect: "manual",
      signal: AbortSignal.timeout(timeoutMs),
    });
    const elapsedMs = Math.round(performance.now() - startedAt);

    logger.debug(
      { url, httpStatus: response.status, elapsedMs },
      "Probe target answered"
    );
    return {
      status: "reachable",
      url,
      elapsedMs,
      httpStatus: response.status,
    };
  } catch (error) {
    const elapsedMs = Math.round(performance.now() - startedAt);
    const { reason, detail } = classifyProbeError(error);

    logger.debug(
      { url, reason, detail, elapsedMs },
      "Probe target unreachable"
    );
    return { status: "unreachable", url, elapsedMs, reason, detail };
  }
}

/**
 * Runs the probe and throws HermeticityViolation if the network is reachable
 */
export async function assertNetworkIsolated(
  options: ProbeOptions
): Promise<UnreachableResult> {
  const result = await probeNetwork(options);

  if (result.status === "reachable") {
    throw new HermeticityViolation(
      `Network is reachable from the build environment: ${result.url} answered with HTTP ${result.httpStatus}`,
      result.url,
      result.httpStatus
    );
  }

  options.logger.info(
    { url: result.url, reason: result.reason },
    "Network is isolated"
  );
  return result;
}
