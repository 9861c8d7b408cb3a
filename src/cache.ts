import { compact } from "./compact.js";
import { type CacheOptions, resolveCacheOptions } from "./config.js";
import { TypeMismatchError } from "./errors.js";
import { createLogger } from "./logger.js";
import {
  MappingNode,
  type NodeValue,
  nodeFor,
  resolvePath,
  SequenceNode,
  type TrackedNode,
} from "./node.js";
import { PathKey } from "./path.js";
import { createTrackedProxy } from "./proxy.js";
import type {
  ChangeRecord,
  ChangeSink,
  CompactedDiff,
  Mapping,
  PackOptions,
  PathLike,
  PendingChange,
  PushOptions,
  Sequence,
} from "./types.js";
import { cloneValue, isMapping, isSequence, mappingSchema } from "./value.js";
import { notifyWatchers } from "./watch.js";

export interface ChangeDataCache {
  readonly log: readonly ChangeRecord[];
  readonly clearAfterPack: boolean;

  /** Node for a root entry; the entry must be a mapping or sequence. */
  getData(key: string): TrackedNode;
  getMapping(key: string): MappingNode;
  getSequence(key: string): SequenceNode;
  getValue(key: string): NodeValue;
  /** Plain-object view over a root entry, tracked like the node behind it. */
  getProxy(key: string): Mapping | Sequence;
  setDefaultData(key: string, defaultValue: unknown): NodeValue;
  deleteData(key: string): void;

  updateData(path: PathLike, value: unknown): boolean;
  removeData(path: PathLike): boolean;
  pushData(path: PathLike, value: unknown, options?: PushOptions): boolean;
  pullData(path: PathLike, value: unknown): boolean;

  packCache(options?: PackOptions): CompactedDiff;
  peek(): CompactedDiff;
  clearCache(): void;

  stopTracking(): void;
  startTracking(): void;
  isTracking(): boolean;
  isDirty(): boolean;
  getDirtyPaths(): string[];

  snapshot(): Mapping;
}

/**
 * Track mutations made through the returned cache's nodes and pack them
 * into a diff of non-overlapping set/delete operations.
 */
export function createChangeDataCache(initial: Mapping, options?: CacheOptions): ChangeDataCache {
  const resolved = resolveCacheOptions(options);
  const logger = createLogger("cache", resolved.logger);

  const checked = mappingSchema.safeParse(initial);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    const path = PathKey.from(issue?.path ?? []);
    throw new TypeMismatchError(path, `Initial data cannot be tracked: ${issue?.message ?? "invalid value"}`);
  }

  const root: Mapping = resolved.copyInitial ? cloneValue(initial) : initial;
  const log: ChangeRecord[] = [];
  let sequence = 0;
  let tracking = true;

  const sink: ChangeSink = {
    root,
    emit(change: PendingChange) {
      if (!tracking) return;

      const record: ChangeRecord = Object.freeze(
        change.kind === "set"
          ? {
              path: change.path,
              kind: change.kind,
              value: cloneValue(change.value),
              sequence: ++sequence,
              created: change.created,
            }
          : { path: change.path, kind: change.kind, sequence: ++sequence, created: false },
      );
      log.push(record);
      logger.trace({ path: record.path.toDotted(), kind: record.kind, sequence: record.sequence }, "recorded change");
      notifyWatchers(cache, record);
    },
  };

  // Root-level writes go through a node over the root mapping itself
  const rootNode = new MappingNode(sink, PathKey.root, root);

  function nodeAt(path: PathKey): TrackedNode | undefined {
    if (path.length === 0) return rootNode;
    const value = resolvePath(root, path);
    return isMapping(value) || isSequence(value) ? nodeFor(sink, path, value) : undefined;
  }

  function getValue(key: string): NodeValue {
    return rootNode.get(key);
  }

  function getData(key: string): TrackedNode {
    const value = getValue(key);
    if (value instanceof MappingNode || value instanceof SequenceNode) {
      return value;
    }
    throw new TypeMismatchError(PathKey.of(key), `Root entry ${key} is not a mapping or sequence`);
  }

  function getMapping(key: string): MappingNode {
    const node = getData(key);
    if (node instanceof MappingNode) return node;
    throw new TypeMismatchError(node.path, `Root entry ${key} is a sequence, not a mapping`);
  }

  function getSequence(key: string): SequenceNode {
    const node = getData(key);
    if (node instanceof SequenceNode) return node;
    throw new TypeMismatchError(node.path, `Root entry ${key} is a mapping, not a sequence`);
  }

  function peek(): CompactedDiff {
    return compact(log);
  }

  const cache: ChangeDataCache = {
    get log() {
      return log;
    },

    clearAfterPack: resolved.clearAfterPack,

    getData,
    getMapping,
    getSequence,
    getValue,

    getProxy(key) {
      return createTrackedProxy(getData(key));
    },

    setDefaultData(key, defaultValue) {
      return rootNode.setdefault(key, defaultValue);
    },

    deleteData(key) {
      rootNode.delete(key);
    },

    updateData(pathLike, value) {
      const path = PathKey.from(pathLike);
      const parentPath = path.parent;
      const last = path.last;
      if (!parentPath || last === undefined) return false;

      const parent = nodeAt(parentPath);
      if (parent instanceof MappingNode) {
        parent.set(String(last), value);
        return true;
      }
      if (parent instanceof SequenceNode) {
        const index = Number(last);
        if (index === parent.length) return parent.push(value);
        return parent.replaceAt(index, value);
      }
      return false;
    },

    removeData(pathLike) {
      const path = PathKey.from(pathLike);
      const parentPath = path.parent;
      const last = path.last;
      if (!parentPath || last === undefined) return false;

      const parent = nodeAt(parentPath);
      if (parent instanceof MappingNode) {
        if (!parent.has(String(last))) return false;
        parent.delete(String(last));
        return true;
      }
      if (parent instanceof SequenceNode) {
        const index = Number(last);
        if (!Number.isInteger(index) || index < 0 || index >= parent.length) return false;
        parent.pop(index);
        return true;
      }
      return false;
    },

    pushData(pathLike, value, pushOptions) {
      const node = nodeAt(PathKey.from(pathLike));
      return node instanceof SequenceNode ? node.push(value, pushOptions) : false;
    },

    pullData(pathLike, value) {
      const node = nodeAt(PathKey.from(pathLike));
      return node instanceof SequenceNode ? node.pull(value) : false;
    },

    packCache(packOptions = {}) {
      const clear = packOptions.clearAfterPack ?? resolved.clearAfterPack;
      const diff = peek();
      logger.debug({ records: log.length, entries: diff.size, clear }, "packed change log");
      if (clear) log.length = 0;
      return diff;
    },

    peek,

    clearCache() {
      log.length = 0;
    },

    stopTracking() {
      tracking = false;
      logger.debug("tracking stopped");
    },

    startTracking() {
      tracking = true;
      logger.debug("tracking started");
    },

    isTracking() {
      return tracking;
    },

    isDirty() {
      return peek().size > 0;
    },

    getDirtyPaths() {
      return [...peek().values()].map((entry) => entry.path.toDotted());
    },

    snapshot() {
      return root;
    },
  };

  return cache;
}
