export { isAtom, override } from "./atom";
export type {
  AtomKind,
  AtomOptions,
  ChannelAtom,
  DeliveryStrategy,
  DisposePolicy,
  Override,
  StateAtom,
  ValueAtom,
} from "./atom";
export { createAsyncComputed } from "./asyncComputed";
export { createChannel } from "./channel";
export type { ChannelOptions } from "./channel";
export { createContainer, isContainer } from "./container";
export type { Container, ContainerOptions } from "./container";
export { createEagerComputed } from "./eager";
export {
  CircularDependencyError,
  ContainerDisposedError,
  UninitializedAccessError,
} from "./errors";
export { createComputed } from "./lazy";
export type { Log, Watch } from "./reactivity";
export {
  asyncData,
  asyncError,
  asyncLoading,
  failure,
  getAsyncData,
  getOrElse,
  mapResult,
  matchAsync,
  matchResult,
  success,
  unwrapResult,
} from "./result";
export type { AsyncValue, Result } from "./result";
export { createSafeComputed } from "./safe";
export { select, selectMany, where } from "./select";
export { createState } from "./state";
