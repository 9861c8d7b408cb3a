// Cache creation
export { type ChangeDataCache, createChangeDataCache } from "./cache.js";
export { type MappingSchema, type ModelCache, createModelCache, isModelCache } from "./model.js";
// Compaction and diff formats
export { compact } from "./compact.js";
export { type ChangeSet, type UpdateDocument, applyDiff, toChangeSet, toUpdateDocument } from "./format.js";
// Nodes and proxies
export {
  BaseNode,
  MappingNode,
  type NodeValue,
  SequenceNode,
  type TrackedNode,
  isTrackedNode,
  resolvePath,
} from "./node.js";
export { createTrackedProxy, getProxyNode, isTrackedProxy, toProxyValue } from "./proxy.js";
export { PathKey } from "./path.js";
// Errors
export {
  ChangeCacheError,
  type ChangeCacheErrorCode,
  InvalidPathError,
  isChangeCacheError,
  KeyNotFoundError,
  TypeMismatchError,
} from "./errors.js";
// Options and logging
export { type CacheOptions, type ResolvedCacheOptions, cacheOptionsSchema } from "./config.js";
export { type Logger, createLogger, getLogger } from "./logger.js";
export { cloneValue, isContainer, isMapping, isSequence, mappingSchema, valueSchema } from "./value.js";
export type {
  ChangeKind,
  ChangeRecord,
  ChangeSink,
  CompactedDiff,
  Container,
  DiffEntry,
  Mapping,
  Operation,
  PackOptions,
  PathLike,
  PendingChange,
  PushOptions,
  Scalar,
  Segment,
  Sequence,
  Value,
} from "./types.js";
export { TRACKED_NODE } from "./types.js";
// Watch functionality
export { type WatchAsyncIteratorOptions, type Watcher, type WatchHandle, watch } from "./watch.js";
