/**
 * Turning the finalized per-tag values of an attribute job into
 * dataset attributes.
 */
import * as log from "loglevel";
import { FinalValue, TaggedResult, tagId } from "./Accum";
import { AttrNeeds } from "./AttrNeeds";
import { AttrName, DivSummary, isAttrName, GlobalAttributes, ShapeAttrName } from "./attrs";
import { keyHash } from "./digest";
import { percentileTable } from "./accum/valuePool";
import { SchemaError } from "./Schema";

const badValue = (attr: string, val: FinalValue): Error =>
  new Error(`assembleAttributes: unexpected ${val.valType} value for '${attr}'`);

const setShapeAttr = (
  attrs: Partial<GlobalAttributes>,
  attr: ShapeAttrName,
  val: FinalValue
): void => {
  switch (attr) {
    case "totObjectSize":
    case "nDiv":
    case "nRow":
      if (val.valType !== "number") throw badValue(attr, val);
      attrs[attr] = val.value;
      break;
    case "keys":
      if (val.valType !== "keys") throw badValue(attr, val);
      attrs.keys = val.keys;
      break;
    case "splitSizeDistn":
    case "splitRowDistn":
      if (val.valType !== "percentiles") throw badValue(attr, val);
      attrs[attr] = val.table;
      break;
    default:
      const invalid: never = attr;
      throw new Error("assembleAttributes: unknown attribute: " + invalid);
  }
};

/**
 * Order summary entries by the dataset's declared columns, dropping any
 * column no longer declared. Without a declared order, arrival order is kept.
 */
export function orderSummary(
  summary: DivSummary,
  columnOrder: ReadonlyArray<string> | null
): DivSummary {
  if (columnOrder === null) {
    return summary;
  }
  const ret: DivSummary = {};
  for (const colId of columnOrder) {
    const entry = summary[colId];
    if (entry !== undefined) {
      ret[colId] = entry;
    }
  }
  return ret;
}

export const keyHashes = (attrs: Partial<GlobalAttributes>): string[] | null =>
  attrs.keys === undefined ? null : attrs.keys.map(keyHash);

// what a needed attribute is when no partition contributed to it
const setEmptyAttr = (attrs: Partial<GlobalAttributes>, attr: AttrName): void => {
  switch (attr) {
    case "totObjectSize":
    case "nDiv":
    case "nRow":
      attrs[attr] = 0;
      break;
    case "keys":
      attrs.keys = [];
      break;
    case "splitSizeDistn":
    case "splitRowDistn":
      attrs[attr] = percentileTable([]);
      break;
    case "summary":
      attrs.summary = {};
      break;
    default:
      const invalid: never = attr;
      throw new Error("assembleAttributes: unknown attribute: " + invalid);
  }
};

export function assembleAttributes(
  results: ReadonlyArray<TaggedResult>,
  columnOrder: ReadonlyArray<string> | null,
  needs?: AttrNeeds
): Partial<GlobalAttributes> {
  const attrs: Partial<GlobalAttributes> = {};
  let summary: DivSummary | null = null;

  for (const [tag, val] of results) {
    if (tag.tagType === "attr") {
      setShapeAttr(attrs, tag.attr, val);
      continue;
    }
    if (val.valType !== "summary") {
      throw badValue(tagId(tag), val);
    }
    const entry = val.entry;
    if (entry.summaryType === "categorical" && !entry.complete) {
      log.warn(
        `summary for column '${tag.column}' is truncated: more distinct values than could be tracked`
      );
    }
    summary = summary ?? {};
    const prev = summary[tag.column];
    if (prev !== undefined) {
      throw new SchemaError(
        `assembleAttributes: column '${tag.column}' was summarized as both ` +
          `${prev.summaryType} and ${entry.summaryType}`
      );
    }
    summary[tag.column] = entry;
  }

  if (summary !== null) {
    attrs.summary = orderSummary(summary, columnOrder);
  }

  if (needs !== undefined) {
    for (const [attr, needed] of Object.entries(needs)) {
      if (needed && isAttrName(attr) && attrs[attr] === undefined) {
        setEmptyAttr(attrs, attr);
      }
    }
  }

  const hashes = keyHashes(attrs);
  if (hashes !== null) {
    attrs.keyHashes = hashes;
  }

  return attrs;
}
