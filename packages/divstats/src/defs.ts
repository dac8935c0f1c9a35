/**
 *  Common type definitions used throughout divstats
 */

export type Scalar = bigint | number | string | boolean | Date | null;

/**
 * Partition keys are opaque to the engine, but must be JSON-like so that
 * they can be fingerprinted deterministically.
 */
export type DivKey =
  | string
  | number
  | boolean
  | null
  | DivKey[]
  | { [field: string]: DivKey };

export interface PartitionRecord<V = unknown> {
  key: DivKey;
  value: V;
}

// Per-family views of a cell value; null means missing for that family.

export const asCategory = (val: Scalar | undefined): string | null => {
  if (val == null) {
    return null;
  }
  if (val instanceof Date) {
    return val.toISOString();
  }
  return String(val);
};

export const asNumber = (val: Scalar | undefined): number | null => {
  if (typeof val === "number") {
    return Number.isNaN(val) ? null : val;
  }
  // rounds to the nearest double beyond Number.MAX_SAFE_INTEGER
  if (typeof val === "bigint") {
    return Number(val);
  }
  return null;
};

export const asDate = (val: Scalar | undefined): Date | null => {
  if (val instanceof Date) {
    return Number.isNaN(val.getTime()) ? null : val;
  }
  return null;
};
