import { InvalidPathError, KeyNotFoundError } from "./errors.js";
import type { PathKey } from "./path.js";
import type { CompactedDiff, Mapping, Value } from "./types.js";
import { cloneValue, isMapping, isSequence, RESERVED_KEY, storeKey } from "./value.js";

export interface UpdateDocument {
  $set?: Record<string, Value>;
  $unset?: Record<string, "">;
}

export interface ChangeSet {
  update?: Record<string, Value>;
  remove?: Record<string, true>;
}

// Document databases read "." as nesting and "$" as an operator prefix
function fieldName(path: PathKey): string {
  if (path.length === 0) {
    throw new InvalidPathError(path, "Cannot address the document root as a field");
  }
  for (const segment of path.segments) {
    const part = String(segment);
    if (part === "" || part === RESERVED_KEY || part.includes(".") || part.startsWith("$")) {
      throw new InvalidPathError(path, `Segment "${part}" cannot be used in a dotted field path`);
    }
  }
  return path.toDotted();
}

/**
 * `{ $set, $unset }` update operators for a document database. Operators
 * with no fields are left out.
 */
export function toUpdateDocument(diff: CompactedDiff): UpdateDocument {
  const document: UpdateDocument = {};
  for (const entry of diff.values()) {
    const field = fieldName(entry.path);
    if (entry.op === "set") {
      document.$set ??= {};
      document.$set[field] = entry.value;
    } else {
      document.$unset ??= {};
      document.$unset[field] = "";
    }
  }
  return document;
}

/**
 * `{ update, remove }` keyed by dotted path.
 */
export function toChangeSet(diff: CompactedDiff): ChangeSet {
  const changes: ChangeSet = {};
  for (const entry of diff.values()) {
    const field = fieldName(entry.path);
    if (entry.op === "set") {
      changes.update ??= {};
      changes.update[field] = entry.value;
    } else {
      changes.remove ??= {};
      changes.remove[field] = true;
    }
  }
  return changes;
}

/**
 * Apply a diff to a plain mapping in place. Sets create missing mappings
 * along their path; deletes of absent paths are ignored.
 */
export function applyDiff(target: Mapping, diff: CompactedDiff): Mapping {
  for (const entry of diff.values()) {
    const segments = entry.path.segments;
    const last = segments[segments.length - 1];
    if (last === undefined) continue;

    let container: Value | undefined = target;
    for (const segment of segments.slice(0, -1)) {
      container = descend(container, String(segment), entry.op === "set", entry.path);
      if (container === undefined) break;
    }

    if (container === undefined) {
      if (entry.op === "set") {
        throw new KeyNotFoundError(entry.path, `Cannot reach ${entry.path.toDotted()}`);
      }
      continue;
    }

    if (entry.op === "set") {
      assign(container, String(last), cloneValue(entry.value), entry.path);
    } else if (isMapping(container)) {
      delete container[String(last)];
    }
  }
  return target;
}

function descend(container: Value, key: string, create: boolean, path: PathKey): Value | undefined {
  if (isSequence(container)) {
    return container[Number(key)];
  }
  if (!isMapping(container)) {
    if (!create) return undefined;
    throw new KeyNotFoundError(path, `Cannot reach ${path.toDotted()}: ${key} sits under a scalar`);
  }
  if (!Object.prototype.hasOwnProperty.call(container, key)) {
    if (!create) return undefined;
    storeKey(container, key, {});
  }
  return container[key];
}

function assign(container: Value, key: string, value: Value, path: PathKey): void {
  if (isMapping(container)) {
    storeKey(container, key, value);
  } else if (isSequence(container)) {
    container[Number(key)] = value;
  } else {
    throw new KeyNotFoundError(path, `Cannot reach ${path.toDotted()}: parent is a scalar`);
  }
}
