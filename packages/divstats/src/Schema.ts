import { ColumnFamily, ColumnType } from "./ColumnType";

// metadata for a single column:
export type ColumnMetadata = {
  displayName: string;
  columnType: ColumnType;
};

export type ColumnMetaMap = {
  [colId: string]: ColumnMetadata;
};

export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

export class Schema {
  readonly columnMetadata: ColumnMetaMap;
  readonly columns: ReadonlyArray<string>;
  private readonly columnIndices: {
    [colId: string]: number;
  };

  constructor(columns: Array<string>, columnMetadata: ColumnMetaMap) {
    this.columns = columns.slice();
    this.columnMetadata = columnMetadata;
    const columnIndices: { [colId: string]: number } = {};

    for (let i = 0; i < columns.length; i++) {
      const col = columns[i];
      if (columnMetadata[col] === undefined) {
        throw new SchemaError(`Schema: no metadata for column '${col}'`);
      }
      columnIndices[col] = i;
    }

    this.columnIndices = columnIndices;
  }

  columnType(colId: string): ColumnType {
    const cmd = this.columnMetadata[colId];
    if (cmd == null) {
      throw new SchemaError(`Schema.columnType: unknown column '${colId}'`);
    }
    return cmd.columnType;
  }

  columnFamily(colId: string): ColumnFamily {
    return this.columnType(colId).family;
  }

  hasColumn(colId: string): boolean {
    return this.columnIndices[colId] !== undefined;
  }
}
