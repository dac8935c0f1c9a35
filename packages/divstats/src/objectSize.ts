import { SizeEstimator } from "./localContrib";
import { TableRep } from "./TableRep";

const jsonReplacer = (_key: string, v: unknown): unknown =>
  typeof v === "bigint" ? v.toString() : v;

/**
 * Default partition size estimate: the byte length of the value's JSON
 * encoding (tables are measured by their rows). Values JSON can't encode
 * count as zero bytes.
 */
export const estimateObjectSize: SizeEstimator = (value: unknown): number => {
  const target = value instanceof TableRep ? value.rowData : value;
  const encoded = JSON.stringify(target, jsonReplacer);
  return encoded === undefined ? 0 : Buffer.byteLength(encoded, "utf8");
};
