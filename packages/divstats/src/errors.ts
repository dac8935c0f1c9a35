/**
 * Errors raised by the attribute engine.
 *
 * Anomalies in the data itself (all-missing columns, too many distinct
 * categories) are never thrown; they show up in the computed summaries.
 */
import { DivKey } from "./defs";

// The dataset is not in a state attributes can be computed for.
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

// An attribute configuration override is invalid.
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// A map task failed; name and message are the original error's.
export class MapTaskError extends Error {
  readonly partitionKey: DivKey;

  constructor(message: string, partitionKey: DivKey) {
    super(message);
    this.name = "MapTaskError";
    this.partitionKey = partitionKey;
  }
}
