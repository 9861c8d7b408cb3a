import assert from "node:assert";
import {
  type ChangeRecord,
  type CompactedDiff,
  MappingNode,
  type NodeValue,
  type Operation,
  PathKey,
  SequenceNode,
  type Value,
  type Watcher,
} from "../src/index.js";

/**
 * Assert exact dirty paths (order-independent comparison)
 */
export function assertExactPaths(actual: string[], expected: string[], message?: string) {
  const sortedActual = [...actual].sort();
  const sortedExpected = [...expected].sort();
  assert.deepStrictEqual(
    sortedActual,
    sortedExpected,
    message ?? `Expected paths ${JSON.stringify(sortedExpected)}, got ${JSON.stringify(sortedActual)}`
  );
}

/**
 * Diff as { dotted path: operation }, for order-independent comparison
 */
export function diffToObject(diff: CompactedDiff): Record<string, Operation> {
  const result: Record<string, Operation> = {};
  for (const entry of diff.values()) {
    result[entry.path.toDotted()] =
      entry.op === "set" ? { op: "set", value: entry.value } : { op: "delete" };
  }
  return result;
}

export function assertDiff(diff: CompactedDiff, expected: Record<string, Operation>) {
  assert.deepStrictEqual(diffToObject(diff), expected);
}

export function set(value: Value): Operation {
  return { op: "set", value };
}

export const del: Operation = { op: "delete" };

export function asMapping(value: NodeValue): MappingNode {
  assert.ok(value instanceof MappingNode, "Expected a mapping node");
  return value;
}

export function asSequence(value: NodeValue): SequenceNode {
  assert.ok(value instanceof SequenceNode, "Expected a sequence node");
  return value;
}

export function record(
  sequence: number,
  kind: "set" | "delete",
  dotted: string,
  value?: Value,
  created = false,
): ChangeRecord {
  const path = PathKey.parse(dotted);
  return kind === "set"
    ? { path, kind, value: value ?? null, sequence, created }
    : { path, kind, sequence, created: false };
}

export async function nextBatch(watcher: Watcher): Promise<ChangeRecord[]> {
  const result = await watcher.next();
  assert.ok(!result.done, "Watcher finished unexpectedly");
  return result.value;
}
