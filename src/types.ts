import type { PathKey } from "./path.js";

// Symbol for reaching the node behind a tracked proxy
export const TRACKED_NODE = Symbol("tracked_node");

export type Scalar = string | number | boolean | null | Date;

export type Value = Scalar | Value[] | { [key: string]: Value };

export type Mapping = { [key: string]: Value };
export type Sequence = Value[];
export type Container = Mapping | Sequence;

export type Segment = string | number;

export type PathLike = PathKey | string | readonly Segment[];

export type ChangeKind = "set" | "delete";

export interface ChangeRecord {
  readonly path: PathKey;
  readonly kind: ChangeKind;
  readonly value?: Value;
  readonly sequence: number;
  // True when the set created a key that did not exist before
  readonly created: boolean;
}

export type PendingChange =
  | { kind: "set"; path: PathKey; value: Value; created: boolean }
  | { kind: "delete"; path: PathKey };

export type Operation = { op: "set"; value: Value } | { op: "delete" };

export type DiffEntry = { path: PathKey } & Operation;

// Keyed by PathKey.key, in first-touched order
export type CompactedDiff = Map<string, DiffEntry>;

/**
 * What a tracked node needs from its owning session.
 */
export interface ChangeSink {
  readonly root: Mapping;
  // Set values arrive live; the sink copies them before logging
  emit(change: PendingChange): void;
}

export interface PackOptions {
  clearAfterPack?: boolean;
}

export interface PushOptions {
  unique?: boolean;
}
