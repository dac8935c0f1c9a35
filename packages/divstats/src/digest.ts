import crypto from "crypto";
import { DivKey } from "./defs";

/**
 * Canonical JSON encoding of a key: object fields in sorted order, so
 * structurally equal keys always encode identically.
 */
export function stringifyKey(key: DivKey): string {
  if (key === null || typeof key !== "object") {
    return JSON.stringify(key);
  }
  if (Array.isArray(key)) {
    return "[" + key.map(stringifyKey).join(",") + "]";
  }
  const pairs = Object.keys(key)
    .sort()
    .map((field) => JSON.stringify(field) + ":" + stringifyKey(key[field]));
  return "{" + pairs.join(",") + "}";
}

export function stringDigest(data: string): string {
  const hasher = crypto.createHash("sha256");
  hasher.update(data);
  return hasher.digest("hex");
}

export const keyHash = (key: DivKey): string => stringDigest(stringifyKey(key));
