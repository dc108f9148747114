import { createHash } from "node:crypto";
import { assertString, InvalidArgumentError } from "./errors.js";

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** JSON with object keys sorted at every depth, so equal mappings serialize equally. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? "null" : canonicalJson(item))).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const fields = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** sha256 over the normalized text and the canonical metadata; the dedup key of an entry. */
export function computeVectorId(text: unknown, metadata: unknown): string {
  assertString(text, "text");
  if (!isPlainObject(metadata)) {
    throw new InvalidArgumentError("metadata", "an object", metadata);
  }
  return createHash("sha256")
    .update(normalizeText(text))
    .update("\u0000")
    .update(canonicalJson(metadata))
    .digest("hex");
}
