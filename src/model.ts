import { z } from "zod";
import { type ChangeDataCache, createChangeDataCache } from "./cache.js";
import type { CacheOptions } from "./config.js";
import type { Mapping } from "./types.js";
import { cloneValue } from "./value.js";

export type MappingSchema<T extends Mapping = Mapping, I = unknown> = z.ZodType<T, z.ZodTypeDef, I>;

export interface ModelCache<T extends Mapping = Mapping, I = unknown> extends ChangeDataCache {
  readonly schema: MappingSchema<T, I>;
  // Parsed input as it was before any tracked change
  readonly original: T;
  /** Check the current snapshot against the schema. */
  validate(): z.SafeParseReturnType<I, T>;
}

/**
 * Parse input with a zod schema (applying its defaults) and track the
 * result.
 */
export function createModelCache<T extends Mapping, I>(
  schema: MappingSchema<T, I>,
  input?: I,
  options?: Omit<CacheOptions, "copyInitial">,
): ModelCache<T, I> {
  const parsed = schema.parse(input ?? {});
  const original = cloneValue(parsed);
  const cache = createChangeDataCache(parsed, options);

  return Object.assign(cache, {
    schema,
    original,
    validate() {
      return schema.safeParse(cache.snapshot());
    },
  });
}

// Type guard
export function isModelCache(value: unknown): value is ModelCache {
  return (
    value !== null &&
    typeof value === "object" &&
    "schema" in value &&
    value.schema instanceof z.ZodType &&
    "validate" in value
  );
}
