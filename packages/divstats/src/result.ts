import { SerializedError } from "./errorUtils";

export interface OkResult<T> {
  status: "Ok";
  value: T;
}

export interface ErrResult {
  status: "Err";
  errVal: SerializedError;
}

export type Result<T> = OkResult<T> | ErrResult;
