import { createHash } from "node:crypto";

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, item]) => [key, normalize(item)]));
  }
  return value;
}

/**
 * Key-order independent sha256 of a JSON-compatible value.
 */
export function fingerprintPayload(payload: unknown): string {
  return createHash("sha256").update(JSON.stringify(normalize(payload))).digest("hex");
}

export function controlRunId(controls: unknown, transactions: unknown): string {
  return `run_${fingerprintPayload({ controls, transactions }).slice(0, 24)}`;
}
