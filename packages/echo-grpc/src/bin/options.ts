// Option parsers shared by the CLIs.

import { InvalidArgumentError } from "commander";
import { DEMO_KINDS, type DemoKind } from "../demo.ts";

/** Parse a non-negative integer option. */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`expected a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

export type DemoSelection = DemoKind | "all";

export function parseDemoSelection(value: string): DemoSelection {
  if (value === "all") return value;
  const kind = DEMO_KINDS.find((k) => k === value);
  if (!kind) {
    throw new InvalidArgumentError(`expected one of ${[...DEMO_KINDS, "all"].join(", ")}`);
  }
  return kind;
}
