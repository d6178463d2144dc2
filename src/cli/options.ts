/**
 * Option parsers shared by the commands.
 */

import { InvalidArgumentError } from "commander";

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

/** Accumulates a repeatable option into a list */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
