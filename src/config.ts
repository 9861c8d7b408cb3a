import type { Logger } from "pino";
import { z } from "zod";

function isLogger(value: unknown): value is Logger {
  return (
    value !== null &&
    typeof value === "object" &&
    "child" in value &&
    typeof value.child === "function"
  );
}

export const cacheOptionsSchema = z.object({
  // Empty the log once packCache() has produced a diff
  clearAfterPack: z.boolean().default(true),
  // Track a deep copy of the initial data instead of the object itself
  copyInitial: z.boolean().default(false),
  logger: z.custom<Logger>(isLogger, { message: "Expected a pino logger" }).optional(),
});

export type CacheOptions = z.input<typeof cacheOptionsSchema>;
export type ResolvedCacheOptions = z.output<typeof cacheOptionsSchema>;

export function resolveCacheOptions(options: CacheOptions = {}): ResolvedCacheOptions {
  return cacheOptionsSchema.parse(options);
}
