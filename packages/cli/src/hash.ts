import { createHash } from "node:crypto";
import { stripTimestamp } from "@scenecast/codegen";
import type { GenerateMode } from "./config.js";

export interface RunSummary {
  ok: boolean;
  outPath: string;
  mode: GenerateMode;
  warnings: readonly string[];
  bodyHash: string;
}

/** sha256 of a generated module without its timestamp line. */
export function hashGeneratedBody(code: string): string {
  return createHash("sha256").update(stripTimestamp(code), "utf8").digest("hex");
}

/** Summary JSON with its keys sorted, so equal runs print equal text. */
export function renderSummary(summary: RunSummary): string {
  const entries = Object.entries(summary).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(Object.fromEntries(entries), null, 2);
}
