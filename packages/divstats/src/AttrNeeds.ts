/**
 * Deciding which attributes of a divided dataset still have to be computed.
 */
import * as _ from "lodash";
import * as log from "loglevel";
import {
  AttrName,
  DivKind,
  allAttrNames,
  collectionAttrNames,
  frameAttrNames,
  isAttrName,
} from "./attrs";
import { DivData } from "./DivData";
import { ConfigError, PreconditionError } from "./errors";
import { defaultMaxCategories } from "./accum/freqTable";

export type AttrNeeds = Readonly<Record<AttrName, boolean>>;

export interface AttrConfig {
  // attributes every dataset of a kind should carry; may name attributes
  // this engine does not implement (yet)
  readonly requiredAttrs: Readonly<Record<DivKind, ReadonlyArray<string>>>;
  readonly implementedAttrs: ReadonlyArray<AttrName>;
  // distinct categories tracked per categorical column
  readonly maxCategories: number;
}

export const defaultAttrConfig: AttrConfig = Object.freeze({
  requiredAttrs: Object.freeze({
    collection: collectionAttrNames,
    frame: [...collectionAttrNames, ...frameAttrNames],
  }),
  implementedAttrs: allAttrNames,
  maxCategories: defaultMaxCategories,
});

export function mkAttrConfig(overrides: Partial<AttrConfig>): AttrConfig {
  const config = { ...defaultAttrConfig, ...overrides };
  if (!Number.isInteger(config.maxCategories) || config.maxCategories < 1) {
    throw new ConfigError(
      `mkAttrConfig: maxCategories must be a positive integer, got ${config.maxCategories}`
    );
  }
  const unknown = config.implementedAttrs.filter((name) => !isAttrName(name));
  if (unknown.length > 0) {
    throw new ConfigError(
      `mkAttrConfig: unknown implemented attributes: ${unknown.join(", ")}`
    );
  }
  return Object.freeze(config);
}

export const requiredObjAttrs = (
  kind: DivKind,
  config: AttrConfig = defaultAttrConfig
): ReadonlyArray<string> => config.requiredAttrs[kind];

const noNeeds = (): Record<AttrName, boolean> => ({
  totObjectSize: false,
  nDiv: false,
  keys: false,
  splitSizeDistn: false,
  nRow: false,
  splitRowDistn: false,
  summary: false,
});

/**
 * An attribute is needed iff it is required for the dataset's kind, not
 * already present, and implemented. Required attributes that are not
 * implemented are skipped.
 */
export function planAttrNeeds<D extends DivData<D>>(
  data: D,
  config: AttrConfig = defaultAttrConfig
): AttrNeeds {
  if (data.isTransformed()) {
    throw new PreconditionError(
      "Cannot compute attributes of a transformed divided dataset; " +
        "compute them on the base data"
    );
  }

  const needs = noNeeds();
  for (const name of requiredObjAttrs(data.kind, config)) {
    if (data.hasAttribute(name)) {
      continue;
    }
    if (!isAttrName(name) || !config.implementedAttrs.includes(name)) {
      log.debug(`planAttrNeeds: skipping unimplemented attribute '${name}'`);
      continue;
    }
    needs[name] = true;
  }
  return Object.freeze(needs);
}

export const anyNeeded = (needs: AttrNeeds): boolean =>
  _.some(Object.values(needs));

export const neededAttrs = (needs: AttrNeeds): AttrName[] =>
  allAttrNames.filter((name) => needs[name]);
