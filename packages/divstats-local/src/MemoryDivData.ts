import {
  DivData,
  DivKey,
  DivKind,
  GlobalAttributes,
  KeyIndex,
  PartitionRecord,
  PartitionTransform,
  TableRep,
  keyHash,
} from "divstats";
import { unifySchemas } from "./frame";

export interface MemoryDivDataOptions {
  attrs?: Partial<GlobalAttributes>;
  // per-partition function giving the row view of each partition
  transformFn?: PartitionTransform | null;
  // declared column order (frames only)
  columns?: string[];
  // set on views made by addTransform
  transformed?: boolean;
}

/**
 * An immutable divided dataset held in memory, with its attributes.
 */
export class MemoryDivData implements DivData<MemoryDivData> {
  readonly kind: DivKind;
  readonly partitions: ReadonlyArray<PartitionRecord>;
  private readonly options: MemoryDivDataOptions;
  private readonly attrs: Partial<GlobalAttributes>;
  private keyIndex: KeyIndex | null = null;
  private partitionIndex: Map<string, PartitionRecord> | null = null;

  constructor(
    kind: DivKind,
    partitions: ReadonlyArray<PartitionRecord>,
    options: MemoryDivDataOptions = {}
  ) {
    this.kind = kind;
    this.partitions = partitions;
    this.options = options;
    this.attrs = options.attrs ?? {};
  }

  static collection(
    partitions: ReadonlyArray<PartitionRecord>,
    options: MemoryDivDataOptions = {}
  ): MemoryDivData {
    return new MemoryDivData("collection", partitions, options);
  }

  /**
   * A divided frame whose partitions all share one schema (see
   * unifySchemas); throws SchemaError if the partitions disagree on a
   * column's kind.
   */
  static frame(
    partitions: ReadonlyArray<PartitionRecord<TableRep>>,
    options: MemoryDivDataOptions = {}
  ): MemoryDivData {
    const schema = unifySchemas(partitions.map((p) => p.value));
    return new MemoryDivData(
      "frame",
      partitions.map(({ key, value }) => ({
        key,
        value: new TableRep(schema, value.rowData),
      })),
      options
    );
  }

  get divCount(): number {
    return this.partitions.length;
  }

  isTransformed(): boolean {
    return this.options.transformed ?? false;
  }

  hasAttribute(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.attrs, name);
  }

  getAttribute<K extends keyof GlobalAttributes>(
    name: K
  ): GlobalAttributes[K] | undefined {
    return this.attrs[name];
  }

  getAttributes(): Partial<GlobalAttributes> {
    return { ...this.attrs };
  }

  setAttributes(attrs: Partial<GlobalAttributes>): MemoryDivData {
    return new MemoryDivData(this.kind, this.partitions, {
      ...this.options,
      attrs: { ...this.attrs, ...attrs },
    });
  }

  columnNames(): ReadonlyArray<string> | null {
    if (this.options.columns !== undefined) {
      return this.options.columns;
    }
    if (this.kind !== "frame" || this.partitions.length === 0) {
      return null;
    }
    const { key, value } = this.partitions[0];
    const transformFn = this.transformFn();
    const rows = transformFn === null ? value : transformFn(key, value);
    return rows instanceof TableRep ? rows.schema.columns : null;
  }

  transformFn(): PartitionTransform | null {
    return this.options.transformFn ?? null;
  }

  /**
   * A lazily transformed view of this dataset. Attributes can't be
   * computed on the view; compute them on the base data.
   */
  addTransform(fn: PartitionTransform): MemoryDivData {
    const base = this.transformFn();
    const composed: PartitionTransform =
      base === null ? fn : (key, value) => fn(key, base(key, value));
    return new MemoryDivData(this.kind, this.partitions, {
      ...this.options,
      attrs: {},
      transformFn: composed,
      transformed: true,
    });
  }

  // O(1) once keyHashes has been computed
  hasKey(key: DivKey): boolean {
    if (this.attrs.keyHashes !== undefined) {
      if (this.keyIndex === null) {
        this.keyIndex = KeyIndex.fromAttributes(this.attrs);
      }
      return this.keyIndex.has(key);
    }
    return this.getPartition(key) !== undefined;
  }

  getPartition(key: DivKey): PartitionRecord | undefined {
    if (this.partitionIndex === null) {
      this.partitionIndex = new Map<string, PartitionRecord>(
        this.partitions.map((p) => [keyHash(p.key), p])
      );
    }
    return this.partitionIndex.get(keyHash(key));
  }
}
