/**
 * Map side: the local contributions of a single partition.
 */
import { Accum, Contribution, SummaryFamily, attrTag, summaryTag } from "./Accum";
import { AttrNeeds } from "./AttrNeeds";
import { DivKey, PartitionRecord, Scalar, asCategory, asDate, asNumber } from "./defs";
import { TableRep } from "./TableRep";
import { calculateMoments } from "./accum/moments";
import { compareDates, compareNumbers, rangeOf } from "./accum/range";
import { tabulate } from "./accum/freqTable";

export type PartitionTransform = (key: DivKey, value: unknown) => unknown;

// estimated in-memory / on-disk size of a partition value, in bytes
export type SizeEstimator = (value: unknown) => number;

export interface LocalParams {
  needs: AttrNeeds;
  transformFn: PartitionTransform | null;
  estimateSize: SizeEstimator;
  maxCategories: number;
}

type Cells = ReadonlyArray<Scalar | undefined>;

const partitionValues = <T>(
  cells: Cells,
  view: (val: Scalar | undefined) => T | null
): [T[], number] => {
  const present: T[] = [];
  let naCount = 0;
  for (const cell of cells) {
    const v = view(cell);
    if (v === null) {
      naCount++;
    } else {
      present.push(v);
    }
  }
  return [present, naCount];
};

export function columnContribution(
  family: SummaryFamily,
  cells: Cells,
  maxCategories: number
): Accum {
  switch (family) {
    case "numeric": {
      const [nums, naCount] = partitionValues(cells, asNumber);
      return {
        accType: "quant",
        naCount,
        moments: calculateMoments(nums),
        range: rangeOf(nums, compareNumbers),
      };
    }
    case "categorical": {
      const [cats, naCount] = partitionValues(cells, asCategory);
      return {
        accType: "categ",
        naCount,
        totalRows: cells.length,
        freq: tabulate(cats, maxCategories),
      };
    }
    case "datetime": {
      const [dates, naCount] = partitionValues(cells, asDate);
      return {
        accType: "datetime",
        naCount,
        range: rangeOf(dates, compareDates),
      };
    }
    default:
      const invalid: never = family;
      throw new Error("columnContribution: unknown family: " + invalid);
  }
}

const asTable = (key: DivKey, value: unknown): TableRep => {
  if (!(value instanceof TableRep)) {
    throw new Error(
      `buildLocalContributions: partition ${JSON.stringify(key)} is not a table`
    );
  }
  return value;
};

export function buildLocalContributions(
  record: PartitionRecord,
  params: LocalParams
): Contribution[] {
  const { needs, transformFn, estimateSize, maxCategories } = params;
  const { key } = record;
  const ret: Contribution[] = [];

  // collection attributes describe physical storage, so use the raw value
  if (needs.splitSizeDistn || needs.totObjectSize) {
    const objSize = estimateSize(record.value);
    if (needs.splitSizeDistn) {
      ret.push({
        tag: attrTag("splitSizeDistn"),
        value: { accType: "pool", values: [objSize] },
      });
    }
    if (needs.totObjectSize) {
      ret.push({
        tag: attrTag("totObjectSize"),
        value: { accType: "sum", total: objSize },
      });
    }
  }
  if (needs.keys) {
    ret.push({ tag: attrTag("keys"), value: { accType: "keys", keys: [key] } });
  }
  if (needs.nDiv) {
    ret.push({ tag: attrTag("nDiv"), value: { accType: "sum", total: 1 } });
  }

  if (!(needs.nRow || needs.splitRowDistn || needs.summary)) {
    return ret;
  }

  const value =
    transformFn === null ? record.value : transformFn(key, record.value);
  const table = asTable(key, value);

  if (needs.nRow) {
    ret.push({
      tag: attrTag("nRow"),
      value: { accType: "sum", total: table.rowCount },
    });
  }
  if (needs.splitRowDistn) {
    ret.push({
      tag: attrTag("splitRowDistn"),
      value: { accType: "pool", values: [table.rowCount] },
    });
  }
  if (needs.summary) {
    for (const colId of table.schema.columns) {
      const family = table.schema.columnFamily(colId);
      if (family === "unsupported") {
        continue;
      }
      ret.push({
        tag: summaryTag(family, colId),
        value: columnContribution(family, table.getColumn(colId), maxCategories),
      });
    }
  }

  return ret;
}
