import { PathKey } from "./path.js";
import type { ChangeRecord, CompactedDiff, Container, Segment, Value } from "./types.js";
import { cloneValue, isContainer, isMapping, isSequence, storeKey } from "./value.js";

type SetEntry = { path: PathKey; op: "set"; value: Value; created: boolean };

type WorkingEntry = SetEntry | { path: PathKey; op: "delete" };

/**
 * Reduce a change log to non-overlapping terminal operations.
 *
 * - Later records win at the same path.
 * - A set or delete below an existing set is folded into that set's value.
 * - A set or delete drops every earlier entry below its path.
 * - Deleting a key that was created within the log leaves no entry.
 */
export function compact(records: Iterable<ChangeRecord>): CompactedDiff {
  const working = new Map<string, WorkingEntry>();
  const ordered = [...records].sort((a, b) => a.sequence - b.sequence);

  for (const record of ordered) {
    const ancestor = findAncestor(working, record.path);

    if (ancestor?.op === "set") {
      foldInto(ancestor, record);
      continue;
    }

    if (ancestor?.op === "delete") {
      // Only reachable when parts of the tree changed untracked
      if (record.kind === "delete") continue;
      working.set(ancestor.path.key, {
        path: ancestor.path,
        op: "set",
        value: buildAlong(record.path.relativeTo(ancestor.path), cloneValue(record.value ?? null)),
        created: false,
      });
      continue;
    }

    for (const [key, entry] of working) {
      if (entry.path.isDescendantOf(record.path)) working.delete(key);
    }

    const previous = working.get(record.path.key);

    if (record.kind === "delete") {
      if (previous?.op === "set" && previous.created) {
        working.delete(record.path.key);
      } else {
        working.set(record.path.key, { path: record.path, op: "delete" });
      }
      continue;
    }

    let created = record.created;
    if (previous?.op === "set") created = previous.created;
    else if (previous?.op === "delete") created = false;

    working.set(record.path.key, {
      path: record.path,
      op: "set",
      value: cloneValue(record.value ?? null),
      created,
    });
  }

  const diff: CompactedDiff = new Map();
  for (const [key, entry] of working) {
    diff.set(key, entry.op === "set" ? { path: entry.path, op: "set", value: entry.value } : { path: entry.path, op: "delete" });
  }
  return diff;
}

// At most one ancestor can be present: entries never overlap
function findAncestor(working: Map<string, WorkingEntry>, path: PathKey): WorkingEntry | undefined {
  for (let i = 1; i < path.length; i++) {
    const entry = working.get(PathKey.of(...path.segments.slice(0, i)).key);
    if (entry) return entry;
  }
  return undefined;
}

/**
 * Write a record into the value of an ancestor set. Containers the value
 * lacks along the way (the tree changed while untracked) are created, so a
 * descendant never gets an entry of its own.
 */
function foldInto(ancestor: SetEntry, record: ChangeRecord): void {
  const relative = record.path.relativeTo(ancestor.path);
  const last = relative[relative.length - 1];
  if (last === undefined) return;

  if (!isContainer(ancestor.value)) {
    ancestor.value = emptyFor(relative[0]);
  }
  let container: Container = ancestor.value;
  for (let i = 0; i < relative.length - 1; i++) {
    const existing = childOf(container, relative[i]);
    if (existing) {
      container = existing;
      continue;
    }
    const created = emptyFor(relative[i + 1]);
    writeChild(container, relative[i], created);
    container = created;
  }

  if (record.kind === "delete") {
    removeChild(container, last);
  } else {
    writeChild(container, last, cloneValue(record.value ?? null));
  }
}

function childOf(container: Container, segment: Segment): Container | undefined {
  let child: Value | undefined;
  if (isSequence(container)) {
    child = container[Number(segment)];
  } else if (Object.prototype.hasOwnProperty.call(container, String(segment))) {
    child = container[String(segment)];
  }
  return isContainer(child) ? child : undefined;
}

function emptyFor(segment: Segment): Container {
  return typeof segment === "number" ? [] : {};
}

function writeChild(container: Container, segment: Segment, value: Value): void {
  if (isMapping(container)) {
    storeKey(container, String(segment), value);
    return;
  }
  const index = Number(segment);
  // A sequence has no element for a non-index segment
  if (!Number.isInteger(index) || index < 0) return;
  while (container.length < index) container.push(null);
  container[index] = value;
}

function removeChild(container: Container, segment: Segment): void {
  if (isMapping(container)) {
    delete container[String(segment)];
    return;
  }
  const index = Number(segment);
  if (Number.isInteger(index) && index >= 0 && index < container.length) {
    container.splice(index, 1);
  }
}

// ["a", 0] + v -> { a: [v] }
function buildAlong(relative: Segment[], leaf: Value): Value {
  let value = leaf;
  for (let i = relative.length - 1; i >= 0; i--) {
    const container = emptyFor(relative[i]);
    writeChild(container, relative[i], value);
    value = container;
  }
  return value;
}
