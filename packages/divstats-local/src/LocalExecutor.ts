/**
 * An in-process map / reduce executor over MemoryDivData.
 */

import * as _ from "lodash";
import * as log from "loglevel";
import prettyHRTime = require("pretty-hrtime");
import {
  Accum,
  Contribution,
  ContribTag,
  ExecControl,
  MapReduceExecutor,
  MapReduceJob,
  PartitionRecord,
  Result,
  TaggedResult,
  defaultExecControl,
  deserializeError,
  serializeError,
  tagId,
} from "divstats";
import { MemoryDivData } from "./MemoryDivData";

interface TagGroup {
  tag: ContribTag;
  values: Accum[];
}

// Each map task runs in isolation; its failure travels back as data.
const runMapTask = (
  job: MapReduceJob,
  record: PartitionRecord
): Result<Contribution[]> => {
  try {
    return { status: "Ok", value: job.map(record, job.params) };
  } catch (err) {
    return { status: "Err", errVal: serializeError(err, record.key) };
  }
};

export class LocalExecutor implements MapReduceExecutor<MemoryDivData> {
  async run(
    data: MemoryDivData,
    job: MapReduceJob,
    control?: ExecControl
  ): Promise<TaggedResult[]> {
    const { reduceBatchSize } = { ...defaultExecControl, ...control };
    if (!Number.isInteger(reduceBatchSize) || reduceBatchSize < 1) {
      throw new Error(
        `LocalExecutor: reduceBatchSize must be a positive integer, got ${reduceBatchSize}`
      );
    }
    const hrstart = process.hrtime();

    if (job.setup) {
      job.setup();
    }

    // group by tag, in order of first appearance
    const groups = new Map<string, TagGroup>();
    for (const record of data.partitions) {
      const res = runMapTask(job, record);
      if (res.status === "Err") {
        log.error(
          "LocalExecutor: map task failed for partition " +
            JSON.stringify(record.key) +
            ": " +
            res.errVal.message
        );
        throw deserializeError(res.errVal);
      }
      for (const { tag, value } of res.value) {
        const id = tagId(tag);
        let group = groups.get(id);
        if (group === undefined) {
          group = { tag, values: [] };
          groups.set(id, group);
        }
        group.values.push(value);
      }
    }

    const results: TaggedResult[] = [];
    for (const { tag, values } of groups.values()) {
      let acc: Accum | undefined = undefined;
      for (const batch of _.chunk(values, reduceBatchSize)) {
        acc = job.reduce.combine(tag, batch, acc);
      }
      if (acc !== undefined) {
        results.push([tag, job.reduce.finalize(tag, acc)]);
      }
    }

    const elapsed = process.hrtime(hrstart);
    log.info(
      `LocalExecutor: ran job over ${data.divCount} partitions in`,
      prettyHRTime(elapsed)
    );
    return results;
  }
}
