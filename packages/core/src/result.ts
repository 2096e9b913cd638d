/**
 * Value of a safe computed atom: either what the compute function returned,
 * or what it threw.
 */
export type Result<Value> =
  | { readonly status: "success"; readonly value: Value }
  | { readonly status: "failure"; readonly error: unknown; readonly trace: string };

/**
 * Value of an async computed atom. While loading, `previous` holds the data of
 * the last successful computation, if there has been one.
 */
export type AsyncValue<Value> =
  | { readonly status: "loading" }
  | { readonly status: "loading"; readonly previous: Value }
  | { readonly status: "data"; readonly data: Value }
  | { readonly status: "error"; readonly error: unknown; readonly trace: string };

export const getTrace = (error: unknown): string =>
  (error instanceof Error && error.stack) ||
  new Error(String(error)).stack ||
  String(error);

export const success = <Value>(value: Value): Result<Value> => ({
  status: "success",
  value,
});

export const failure = <Value = never>(error: unknown): Result<Value> => ({
  status: "failure",
  error,
  trace: getTrace(error),
});

export const matchResult = <Value, Output>(
  result: Result<Value>,
  handlers: {
    success: (value: Value) => Output;
    failure: (error: unknown, trace: string) => Output;
  }
): Output =>
  result.status === "success"
    ? handlers.success(result.value)
    : handlers.failure(result.error, result.trace);

/**
 * Pipeable: `pipe(result, mapResult((value) => value * 2))`. An error thrown by
 * `transform` becomes a failure.
 */
export const mapResult =
  <Value, Next>(transform: (value: Value) => Next) =>
  (result: Result<Value>): Result<Next> => {
    if (result.status === "failure") {
      return result;
    }
    try {
      return success(transform(result.value));
    } catch (error) {
      return failure(error);
    }
  };

export const getOrElse =
  <Fallback>(fallback: Fallback) =>
  <Value>(result: Result<Value>): Value | Fallback =>
    result.status === "success" ? result.value : fallback;

export const unwrapResult = <Value>(result: Result<Value>): Value => {
  if (result.status === "failure") {
    throw result.error;
  }
  return result.value;
};

export const isSameResult = <Value>(
  a: Result<Value>,
  b: Result<Value>,
  isEqual: (a: Value, b: Value) => boolean
): boolean => {
  if (a.status === "success") {
    return b.status === "success" && isEqual(a.value, b.value);
  }
  return b.status === "failure" && Object.is(a.error, b.error);
};

export const asyncLoading = <Value = never>(
  ...previous: [] | [Value]
): AsyncValue<Value> =>
  previous.length === 1
    ? { status: "loading", previous: previous[0] }
    : { status: "loading" };

export const asyncData = <Value>(data: Value): AsyncValue<Value> => ({
  status: "data",
  data,
});

export const asyncError = <Value = never>(
  error: unknown
): AsyncValue<Value> => ({
  status: "error",
  error,
  trace: getTrace(error),
});

export const matchAsync = <Value, Output>(
  value: AsyncValue<Value>,
  handlers: {
    loading: (previous: Value | undefined) => Output;
    data: (data: Value) => Output;
    error: (error: unknown, trace: string) => Output;
  }
): Output => {
  switch (value.status) {
    case "loading":
      return handlers.loading("previous" in value ? value.previous : undefined);
    case "data":
      return handlers.data(value.data);
    case "error":
      return handlers.error(value.error, value.trace);
  }
};

/**
 * The data, or while loading the data of the previous computation.
 */
export const getAsyncData = <Value>(
  value: AsyncValue<Value>
): Value | undefined => {
  if (value.status === "data") {
    return value.data;
  }
  if (value.status === "loading" && "previous" in value) {
    return value.previous;
  }
  return undefined;
};

export const isSameAsyncValue = <Value>(
  a: AsyncValue<Value>,
  b: AsyncValue<Value>,
  isEqual: (a: Value, b: Value) => boolean
): boolean => {
  switch (a.status) {
    case "loading":
      if (b.status !== "loading") {
        return false;
      }
      if ("previous" in a) {
        return "previous" in b && isEqual(a.previous, b.previous);
      }
      return !("previous" in b);
    case "data":
      return b.status === "data" && isEqual(a.data, b.data);
    case "error":
      return b.status === "error" && Object.is(a.error, b.error);
  }
};
