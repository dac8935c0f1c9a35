// Errors don't survive JSON encoding on their own; these carry one across
// an executor boundary.
import { DivKey } from "./defs";
import { MapTaskError } from "./errors";

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  // key of the partition whose map task failed
  partitionKey?: DivKey;
}

export function serializeError(err: unknown, partitionKey?: DivKey): SerializedError {
  const ret: SerializedError =
    err instanceof Error
      ? { name: err.name, message: err.message, stack: err.stack }
      : { name: "Error", message: String(err) };
  if (partitionKey !== undefined) {
    ret.partitionKey = partitionKey;
  }
  return ret;
}

export function deserializeError(errObj: SerializedError): Error {
  const { name, message, stack, partitionKey } = errObj;
  const ret =
    partitionKey === undefined
      ? new Error(message)
      : new MapTaskError(message, partitionKey);
  ret.name = name;
  ret.stack = stack;
  return ret;
}
