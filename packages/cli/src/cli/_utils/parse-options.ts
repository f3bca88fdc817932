// pattern: Functional Core

import { InvalidArgumentError } from "@commander-js/extra-typings";

/**
 * Commander argument parser for millisecond timeouts
 */
export function parseTimeoutMs(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Must be a whole number of milliseconds.");
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed <= 0) {
    throw new InvalidArgumentError("Must be greater than zero.");
  }
  return parsed;
}

/**
 * Commander argument parser for an output format, given the accepted ones
 */
export function parseChoice<T extends string>(
  choices: readonly T[]
): (value: string) => T {
  return (value: string): T => {
    const match = choices.find(choice => choice === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Must be one of: ${choices.join(", ")}.`);
    }
    return match;
  };
}
