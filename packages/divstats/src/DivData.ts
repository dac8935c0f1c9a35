/**
 * Interfaces of the collaborators updateAttributes relies on: the
 * divided dataset (and its attribute storage), and the executor that
 * runs a map / reduce pass over its partitions.
 */
import { Contribution, TaggedResult } from "./Accum";
import { DivKind, GlobalAttributes } from "./attrs";
import { Reducer } from "./combine";
import { PartitionRecord } from "./defs";
import { LocalParams, PartitionTransform } from "./localContrib";

/**
 * A dataset physically split into independently stored partitions.
 *
 * Implementations are immutable: setAttributes returns an updated copy.
 */
export interface DivData<Self> {
  readonly kind: DivKind;

  // true for a view with a pending, not yet applied transformation
  isTransformed(): boolean;

  hasAttribute(name: string): boolean;
  getAttribute<K extends keyof GlobalAttributes>(
    name: K
  ): GlobalAttributes[K] | undefined;
  setAttributes(attrs: Partial<GlobalAttributes>): Self;

  // declared column order of a frame; null when unknown
  columnNames(): ReadonlyArray<string> | null;

  // per-partition transform giving the row view of each partition, if any
  transformFn(): PartitionTransform | null;
}

// Backend-specific knobs, passed through to the executor untouched.
export interface ExecControl {
  // number of contributions handed to each streaming combine call
  reduceBatchSize?: number;
}

export const defaultExecControl: Required<ExecControl> = {
  reduceBatchSize: 64,
};

export interface MapReduceJob {
  // run once per worker before any map call
  setup?: () => void;
  map: (record: PartitionRecord, params: LocalParams) => Contribution[];
  reduce: Reducer;
  params: LocalParams;
}

/**
 * Runs a job over every partition of a dataset. Resolves with one
 * finalized value per tag, or rejects if any part of the job failed.
 */
export interface MapReduceExecutor<D> {
  run(data: D, job: MapReduceJob, control?: ExecControl): Promise<TaggedResult[]>;
}
