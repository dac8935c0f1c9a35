import { Schema } from "./Schema";
import { Scalar } from "./defs";

export type Row = {
  [columnId: string]: Scalar | undefined;
};

/**
 * In-memory row data for a single partition of a distributed frame.
 */
export class TableRep {
  readonly schema: Schema;
  readonly rowData: ReadonlyArray<Row>;

  constructor(schema: Schema, rowData: ReadonlyArray<Row>) {
    this.schema = schema;
    this.rowData = rowData;
  }

  get rowCount(): number {
    return this.rowData.length;
  }

  getColumn(columnId: string): Array<Scalar | undefined> {
    if (!this.schema.hasColumn(columnId)) {
      throw new Error('TableRep.getColumn: no such column "' + columnId + '"');
    }

    return this.rowData.map((r) => r[columnId]);
  }
}
