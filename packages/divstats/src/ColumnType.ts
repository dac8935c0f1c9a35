// Classification of column types:
export type ColumnKind =
  | "string"
  | "factor"
  | "integer"
  | "real"
  | "boolean"
  | "date"
  | "datetime"
  | "timestamp"
  | "blob"; // anything we have no summary for

// The closed set of column families we know how to summarize.
export type ColumnFamily = "numeric" | "categorical" | "datetime" | "unsupported";

export const familyForKind = (kind: ColumnKind): ColumnFamily => {
  switch (kind) {
    case "integer":
    case "real":
      return "numeric";
    case "string":
    case "factor":
      return "categorical";
    case "date":
    case "datetime":
    case "timestamp":
      return "datetime";
    default:
      return "unsupported";
  }
};

export class ColumnType {
  readonly typeName: string;
  readonly kind: ColumnKind;
  readonly family: ColumnFamily;

  constructor(typeName: string, kind: ColumnKind) {
    this.typeName = typeName;
    this.kind = kind;
    this.family = familyForKind(kind);
  }
}

export const columnTypes = {
  integer: new ColumnType("integer", "integer"),
  real: new ColumnType("real", "real"),
  string: new ColumnType("string", "string"),
  factor: new ColumnType("factor", "factor"),
  boolean: new ColumnType("boolean", "boolean"),
  date: new ColumnType("date", "date"),
  datetime: new ColumnType("datetime", "datetime"),
  timestamp: new ColumnType("timestamp", "timestamp"),
  blob: new ColumnType("blob", "blob"),
};
