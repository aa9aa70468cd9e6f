import { randomUUID } from "node:crypto";
import type { RunId } from "./types.js";

export function asRunId(value: string): RunId {
  return value as RunId;
}

export function newRunId(): RunId {
  return asRunId(randomUUID());
}
