import * as _ from "lodash";
import {
  ColumnKind,
  ColumnMetaMap,
  ColumnType,
  Row,
  Scalar,
  Schema,
  SchemaError,
  TableRep,
  columnTypes,
} from "divstats";

const kindOfValue = (val: Scalar): ColumnKind => {
  if (typeof val === "number") {
    return Number.isInteger(val) ? "integer" : "real";
  }
  if (typeof val === "bigint") {
    return "integer";
  }
  if (typeof val === "string") {
    return "string";
  }
  if (typeof val === "boolean") {
    return "boolean";
  }
  if (val instanceof Date) {
    return "datetime";
  }
  return "blob";
};

const isPresent = (v: Scalar | undefined): v is Scalar =>
  !(v == null || (typeof v === "number" && Number.isNaN(v)));

// integer and real values together make a real column; null for any other mix
const mergeKinds = (kinds: ReadonlyArray<ColumnKind>): ColumnKind | null => {
  const distinct = _.uniq(kinds);
  if (distinct.length === 1) {
    return distinct[0];
  }
  if (distinct.length === 2 && distinct.includes("integer") && distinct.includes("real")) {
    return "real";
  }
  return null;
};

/**
 * Infer a column's kind from its non-missing values. A mix of kinds that
 * don't merge (or no values at all) makes a blob column, which is not
 * summarized.
 */
export function inferColumnKind(values: ReadonlyArray<Scalar | undefined>): ColumnKind {
  const kinds = values.filter(isPresent).map(kindOfValue);
  return (kinds.length === 0 ? null : mergeKinds(kinds)) ?? "blob";
}

/**
 * One schema for a set of partition tables. Each column takes the kind
 * it has in the partitions holding values for it, so a partition where
 * the column is entirely missing (or absent) doesn't decide its kind.
 */
export function unifySchemas(tables: ReadonlyArray<TableRep>): Schema {
  const columns = _.uniq(tables.flatMap((t) => t.schema.columns));
  const cmMap: ColumnMetaMap = {};
  for (const colId of columns) {
    const withCol = tables.filter((t) => t.schema.hasColumn(colId));
    const withValues = withCol.filter((t) => t.getColumn(colId).some(isPresent));
    const kinds = (withValues.length > 0 ? withValues : withCol).map(
      (t) => t.schema.columnType(colId).kind
    );
    const kind = mergeKinds(kinds);
    if (kind === null) {
      throw new SchemaError(
        `unifySchemas: column '${colId}' has conflicting kinds across partitions: ` +
          _.uniq(kinds).join(", ")
      );
    }
    cmMap[colId] = { displayName: colId, columnType: columnTypes[kind] };
  }
  return new Schema(columns, cmMap);
}

export interface FrameOptions {
  // column order; default is the order columns first appear in the rows
  columns?: string[];
  // explicit kinds, for columns whose kind can't be inferred from the values
  columnKinds?: { [colId: string]: ColumnKind };
}

export function frameFromRows(
  rows: ReadonlyArray<Row>,
  options: FrameOptions = {}
): TableRep {
  const columns = options.columns ?? _.uniq(rows.flatMap((r) => Object.keys(r)));
  const cmMap: ColumnMetaMap = {};
  for (const colId of columns) {
    const kind =
      options.columnKinds?.[colId] ?? inferColumnKind(rows.map((r) => r[colId]));
    const columnType: ColumnType = columnTypes[kind];
    cmMap[colId] = { displayName: colId, columnType };
  }
  return new TableRep(new Schema(columns, cmMap), rows);
}
