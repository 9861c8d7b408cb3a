import { isDeepStrictEqual } from "node:util";
import { z } from "zod";
import type { Container, Mapping, Sequence, Value } from "./types.js";

// An own "__proto__" key cannot be written back with plain assignment
export const RESERVED_KEY = "__proto__";

export const keySchema = z.string().refine((key) => key !== RESERVED_KEY, {
  message: `"${RESERVED_KEY}" cannot be used as a key`,
});

export const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.date(),
    z.array(valueSchema),
    z.record(keySchema, valueSchema),
  ]),
);

export const mappingSchema: z.ZodType<Mapping> = z.record(keySchema, valueSchema);

/**
 * Store `key` as an own data property, whatever its name.
 */
export function storeKey(mapping: Mapping, key: string, value: Value): void {
  Object.defineProperty(mapping, key, { value, writable: true, enumerable: true, configurable: true });
}

export function isMapping(value: unknown): value is Mapping {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isSequence(value: unknown): value is Sequence {
  return Array.isArray(value);
}

export function isContainer(value: unknown): value is Container {
  return isSequence(value) || isMapping(value);
}

// Wrapper (node or proxy) -> the live container it stands for
const trackedTargets = new WeakMap<object, Container>();

export function markTracked(wrapper: object, target: Container): void {
  trackedTargets.set(wrapper, target);
}

/**
 * Replace a node or tracked proxy by the container behind it. Nested
 * wrappers are left alone; cloneValue resolves them.
 */
export function unwrapValue(value: unknown): unknown {
  if (value !== null && typeof value === "object") {
    const target = trackedTargets.get(value);
    if (target) return target;
  }
  return value;
}

/**
 * Deep copy of a storable value. Tracked wrappers are replaced by copies
 * of their containers, so nothing in the result aliases the live tree.
 */
export function cloneValue<T>(value: T): T {
  const unwrapped = unwrapValue(value);
  try {
    return structuredClone(unwrapped) as T;
  } catch {
    // structuredClone rejects proxies nested inside plain objects
    return manualDeepClone(unwrapped) as T;
  }
}

function manualDeepClone(obj: unknown, visited = new WeakMap<object, unknown>()): unknown {
  const value = unwrapValue(obj);
  if (value === null || typeof value !== "object") {
    return value;
  }

  if (visited.has(value)) {
    return visited.get(value);
  }

  if (value instanceof Date) {
    return new Date(value.getTime());
  }

  if (Array.isArray(value)) {
    const clone: unknown[] = [];
    visited.set(value, clone);
    for (let i = 0; i < value.length; i++) {
      clone[i] = manualDeepClone(value[i], visited);
    }
    return clone;
  }

  const clone: Record<string, unknown> = {};
  visited.set(value, clone);
  for (const [key, item] of Object.entries(value)) {
    Object.defineProperty(clone, key, {
      value: manualDeepClone(item, visited),
      writable: true,
      enumerable: true,
      configurable: true,
    });
  }
  return clone;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(unwrapValue(a), unwrapValue(b));
}
