import { KeyNotFoundError, TypeMismatchError } from "./errors.js";
import { PathKey } from "./path.js";
import type {
  ChangeSink,
  Container,
  Mapping,
  PushOptions,
  Scalar,
  Sequence,
  Value,
} from "./types.js";
import {
  cloneValue,
  isMapping,
  isSequence,
  markTracked,
  RESERVED_KEY,
  valueSchema,
  valuesEqual,
} from "./value.js";

export type TrackedNode = MappingNode | SequenceNode;

// What reads hand back: scalars as they are, containers wrapped
export type NodeValue = Scalar | TrackedNode;

// Live container -> the node wrapping it at its current path
const nodeCache = new WeakMap<Container, TrackedNode>();

function hasKey(mapping: Mapping, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(mapping, key);
}

/**
 * Walk the root mapping along a path. Returns undefined when any segment
 * is missing or crosses a scalar.
 */
export function resolvePath(root: Mapping, path: PathKey): Value | undefined {
  let current: Value = root;
  for (const segment of path.segments) {
    if (isSequence(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) return undefined;
      current = current[index];
    } else if (isMapping(current)) {
      const key = String(segment);
      if (!hasKey(current, key)) return undefined;
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}

export function wrapValue(sink: ChangeSink, path: PathKey, value: Value): NodeValue {
  if (isSequence(value) || isMapping(value)) {
    return nodeFor(sink, path, value);
  }
  return value;
}

export function nodeFor(sink: ChangeSink, path: PathKey, target: Container): TrackedNode {
  const cached = nodeCache.get(target);
  if (cached && cached.sink === sink && cached.path.equals(path)) {
    return cached;
  }

  const node = isSequence(target)
    ? new SequenceNode(sink, path, target)
    : new MappingNode(sink, path, target);
  nodeCache.set(target, node);
  return node;
}

export abstract class BaseNode<C extends Container> {
  readonly sink: ChangeSink;
  readonly path: PathKey;
  protected readonly target: C;

  constructor(sink: ChangeSink, path: PathKey, target: C) {
    this.sink = sink;
    this.path = path;
    this.target = target;
    markTracked(this, target);
  }

  /**
   * False once the session snapshot no longer holds this container at
   * this path (deleted, replaced, or shifted inside a sequence).
   */
  get isAttached(): boolean {
    return resolvePath(this.sink.root, this.path) === this.target;
  }

  raw(): C {
    return this.live();
  }

  toJSON(): C {
    return this.live();
  }

  protected live(): C {
    if (!this.isAttached) {
      throw new KeyNotFoundError(this.path, `Node at ${this.path.toDotted()} is detached from the cache`);
    }
    return this.target;
  }

  protected wrap(segment: string | number, value: Value): NodeValue {
    return wrapValue(this.sink, this.path.child(segment), value);
  }

  // Copy of the caller's value, so the live tree never aliases it
  protected prepare(value: unknown, at: PathKey): Value {
    const result = valueSchema.safeParse(cloneValue(value));
    if (!result.success) {
      throw new TypeMismatchError(at, `Value at ${at.toDotted()} cannot be stored: ${result.error.issues[0]?.message ?? "invalid value"}`);
    }
    return result.data;
  }

  protected emitSet(path: PathKey, value: Value, created: boolean): void {
    this.sink.emit({ kind: "set", path, value, created });
  }

  protected emitDelete(path: PathKey): void {
    this.sink.emit({ kind: "delete", path });
  }
}

export class MappingNode extends BaseNode<Mapping> {
  readonly kind = "mapping";

  get size(): number {
    return Object.keys(this.live()).length;
  }

  has(key: string): boolean {
    return hasKey(this.live(), key);
  }

  get(key: string): NodeValue {
    const target = this.live();
    if (!hasKey(target, key)) {
      throw new KeyNotFoundError(this.path.child(key));
    }
    return this.wrap(key, target[key]);
  }

  find(key: string): NodeValue | undefined;
  find<F>(key: string, fallback: F): NodeValue | F;
  find(key: string, fallback?: unknown): unknown {
    const target = this.live();
    return hasKey(target, key) ? this.wrap(key, target[key]) : fallback;
  }

  // Untracked read of the stored value
  getRaw(key: string): Value | undefined;
  getRaw<F>(key: string, fallback: F): Value | F;
  getRaw(key: string, fallback?: unknown): unknown {
    const target = this.live();
    return hasKey(target, key) ? target[key] : fallback;
  }

  keys(): string[] {
    return Object.keys(this.live());
  }

  values(): NodeValue[] {
    const target = this.live();
    return Object.keys(target).map((key) => this.wrap(key, target[key]));
  }

  entries(): [string, NodeValue][] {
    const target = this.live();
    return Object.keys(target).map((key) => [key, this.wrap(key, target[key])]);
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.keys()[Symbol.iterator]();
  }

  set(key: string, value: unknown): void {
    const target = this.live();
    const path = this.path.child(key);
    this.checkKey(key, path);
    const created = !hasKey(target, key);
    const stored = this.prepare(value, path);
    target[key] = stored;
    this.emitSet(path, stored, created);
  }

  setdefault(key: string, defaultValue: unknown): NodeValue {
    if (!this.has(key)) {
      this.set(key, defaultValue);
    }
    return this.get(key);
  }

  delete(key: string): void {
    const target = this.live();
    const path = this.path.child(key);
    if (!hasKey(target, key)) {
      throw new KeyNotFoundError(path);
    }
    delete target[key];
    this.emitDelete(path);
  }

  /**
   * Remove a key and return its raw value. With a fallback, a missing key
   * returns the fallback and records nothing.
   */
  pop(key: string): Value;
  pop<F>(key: string, fallback: F): Value | F;
  pop(key: string, ...fallback: unknown[]): unknown {
    const target = this.live();
    if (!hasKey(target, key)) {
      if (fallback.length > 0) return fallback[0];
      throw new KeyNotFoundError(this.path.child(key));
    }
    const value = target[key];
    this.delete(key);
    return value;
  }

  popitem(): [string, Value] {
    const [first] = this.keys();
    if (first === undefined) {
      throw new KeyNotFoundError(this.path, `popitem(): mapping at ${this.path.toDotted()} is empty`);
    }
    return [first, this.pop(first)];
  }

  /**
   * Merge entries in. Recorded as one set of the whole mapping.
   */
  update(values: Mapping | MappingNode): void {
    const target = this.live();
    if (this.merge(target, values) === 0) return;
    this.emitSet(this.path, target, false);
  }

  updateUntracked(values: Mapping | MappingNode): void {
    this.merge(this.live(), values);
  }

  clear(): void {
    const target = this.live();
    for (const key of Object.keys(target)) {
      delete target[key];
    }
    this.emitSet(this.path, target, false);
  }

  // Returns the number of keys written
  private merge(target: Mapping, values: Mapping | MappingNode): number {
    const source = values instanceof MappingNode ? values.raw() : values;
    // Prepare everything first so a rejected value leaves the mapping untouched
    const prepared = Object.keys(source).map((key): [string, Value] => {
      const path = this.path.child(key);
      this.checkKey(key, path);
      return [key, this.prepare(source[key], path)];
    });
    for (const [key, value] of prepared) {
      target[key] = value;
    }
    return prepared.length;
  }

  private checkKey(key: unknown, path: PathKey): void {
    if (typeof key !== "string") {
      throw new TypeMismatchError(path, `Mapping keys must be strings, got ${typeof key}`);
    }
    if (key === RESERVED_KEY) {
      throw new TypeMismatchError(path, `"${RESERVED_KEY}" cannot be used as a mapping key`);
    }
  }
}

export class SequenceNode extends BaseNode<Sequence> {
  readonly kind = "sequence";

  get length(): number {
    return this.live().length;
  }

  get(index: number): NodeValue {
    const target = this.live();
    if (!Number.isInteger(index) || index < 0 || index >= target.length) {
      throw new KeyNotFoundError(this.path.child(index));
    }
    return this.wrap(index, target[index]);
  }

  find(index: number): NodeValue | undefined;
  find<F>(index: number, fallback: F): NodeValue | F;
  find(index: number, fallback?: unknown): unknown {
    const target = this.live();
    if (!Number.isInteger(index) || index < 0 || index >= target.length) return fallback;
    return this.wrap(index, target[index]);
  }

  values(): NodeValue[] {
    return this.live().map((value, index) => this.wrap(index, value));
  }

  [Symbol.iterator](): IterableIterator<NodeValue> {
    return this.values()[Symbol.iterator]();
  }

  includes(value: unknown): boolean {
    return this.indexOf(value) !== -1;
  }

  indexOf(value: unknown): number {
    return this.live().findIndex((item) => valuesEqual(item, value));
  }

  count(value: unknown): number {
    return this.live().filter((item) => valuesEqual(item, value)).length;
  }

  set(index: number, value: unknown): void {
    const target = this.live();
    const path = this.path.child(index);
    this.checkIndex(target, index, "set");
    const stored = this.prepare(value, path);
    target[index] = stored;
    this.emitSet(path, stored, false);
  }

  append(value: unknown): void {
    this.push(value);
  }

  /**
   * Append a value. With `unique`, an equal element already present makes
   * this a no-op returning false.
   */
  push(value: unknown, options: PushOptions = {}): boolean {
    const target = this.live();
    if (options.unique && target.some((item) => valuesEqual(item, value))) {
      return false;
    }
    const path = this.path.child(target.length);
    const stored = this.prepare(value, path);
    target.push(stored);
    this.emitSet(path, stored, true);
    return true;
  }

  extend(values: Iterable<unknown>): void {
    const target = this.live();
    const prepared = [...values].map((value, i) => this.prepare(value, this.path.child(target.length + i)));
    if (prepared.length === 0) return;
    target.push(...prepared);
    this.emitWhole(target);
  }

  insert(index: number, value: unknown): void {
    const target = this.live();
    if (!Number.isInteger(index) || index < 0 || index > target.length) {
      throw new TypeMismatchError(this.path.child(index), `insert(): index ${index} out of bounds for length ${target.length}`);
    }
    target.splice(index, 0, this.prepare(value, this.path.child(index)));
    this.emitWhole(target);
  }

  pop(index?: number): Value {
    const target = this.live();
    const at = index ?? target.length - 1;
    this.checkIndex(target, at, "pop");
    const [removed] = target.splice(at, 1);
    this.emitWhole(target);
    return removed;
  }

  remove(value: unknown): void {
    const target = this.live();
    const index = this.indexOf(value);
    if (index === -1) {
      throw new KeyNotFoundError(this.path, `remove(): value not in sequence at ${this.path.toDotted()}`);
    }
    target.splice(index, 1);
    this.emitWhole(target);
  }

  pull(value: unknown): boolean {
    if (!this.includes(value)) return false;
    this.remove(value);
    return true;
  }

  reset(values: Iterable<unknown>): void {
    const target = this.live();
    const prepared = [...values].map((value, i) => this.prepare(value, this.path.child(i)));
    target.splice(0, target.length, ...prepared);
    this.emitWhole(target);
  }

  replaceAt(index: number, value: unknown): boolean {
    const target = this.live();
    if (!Number.isInteger(index) || index < 0 || index >= target.length) return false;
    this.set(index, value);
    return true;
  }

  replaceValue(oldValue: unknown, newValue: unknown): boolean {
    const index = this.indexOf(oldValue);
    if (index === -1) return false;
    return this.replaceAt(index, newValue);
  }

  private checkIndex(target: Sequence, index: number, operation: string): void {
    if (!Number.isInteger(index) || index < 0 || index >= target.length) {
      throw new TypeMismatchError(
        this.path.child(index),
        `${operation}(): index ${index} out of bounds for length ${target.length}`,
      );
    }
  }

  // Index-shifting changes replace the whole sequence in the log
  private emitWhole(target: Sequence): void {
    this.emitSet(this.path, target, false);
  }
}

export function isTrackedNode(value: unknown): value is TrackedNode {
  return value instanceof MappingNode || value instanceof SequenceNode;
}
