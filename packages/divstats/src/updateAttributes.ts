import * as log from "loglevel";
import { AttrConfig, anyNeeded, defaultAttrConfig, neededAttrs, planAttrNeeds } from "./AttrNeeds";
import { GlobalAttributes } from "./attrs";
import { assembleAttributes } from "./assemble";
import { attrReducer } from "./combine";
import { DivData, ExecControl, MapReduceExecutor, MapReduceJob } from "./DivData";
import { SizeEstimator, buildLocalContributions } from "./localContrib";
import { estimateObjectSize } from "./objectSize";

export interface UpdateAttrsOptions {
  config?: AttrConfig;
  // passed through to the executor
  control?: ExecControl;
  estimateSize?: SizeEstimator;
  // run by the executor before mapping, e.g. to load libraries on a worker
  setup?: () => void;
}

export interface UpdateResult<D> {
  data: D;
  // false when every (implemented) attribute was already present
  computed: boolean;
  attrs: Partial<GlobalAttributes>;
}

/**
 * Compute the attributes a divided dataset is missing, in one map / reduce
 * pass, and return the dataset with them set.
 *
 * Calling this on a dataset that is missing nothing resolves with the same
 * object and `computed: false`.
 */
export async function updateAttributes<D extends DivData<D>>(
  data: D,
  executor: MapReduceExecutor<D>,
  options: UpdateAttrsOptions = {}
): Promise<UpdateResult<D>> {
  const config = options.config ?? defaultAttrConfig;
  const needs = planAttrNeeds(data, config);

  if (!anyNeeded(needs)) {
    log.info("All (implemented) attributes have already been computed.");
    return { data, computed: false, attrs: {} };
  }

  log.info("* Running map/reduce to get missing attributes...");
  log.debug("updateAttributes: computing " + neededAttrs(needs).join(", "));

  const job: MapReduceJob = {
    setup: options.setup,
    map: buildLocalContributions,
    reduce: attrReducer,
    params: {
      needs,
      transformFn: data.transformFn(),
      estimateSize: options.estimateSize ?? estimateObjectSize,
      maxCategories: config.maxCategories,
    },
  };

  const results = await executor.run(data, job, options.control);
  const attrs = assembleAttributes(results, data.columnNames(), needs);
  return { data: data.setAttributes(attrs), computed: true, attrs };
}
