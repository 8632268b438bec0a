/**
 * Configuration file format (JSONC) and its validation.
 * Keys are snake_case as they appear in the file; `toAppConfig` in `parser.ts` converts them.
 */

import { z } from "zod";
import { DEFAULT_BATCH_SIZE, DEFAULT_INTERVAL_MINUTES, DEFAULT_MAX_RECORDS } from "@erpsync/core";

const UNRESOLVED = /\$\{[^}]+\}/;

/**
 * A required string that must not still reference an unset environment variable.
 */
const requiredString = z
  .string()
  .min(1)
  .refine((value) => !UNRESOLVED.test(value), {
    message: "references an environment variable that is not set",
  });

/**
 * An optional string; a value still referencing an unset variable counts as absent.
 */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && !UNRESOLVED.test(value) ? value : undefined));

const positiveInt = z.number().int().positive();

export const storeConfigSchema = z.discriminatedUnion("driver", [
  z.object({
    driver: z.literal("mongo"),
    url: requiredString,
    database: requiredString,
    collection: requiredString.optional(),
    timeout_ms: positiveInt.optional(),
  }),
  z.object({
    driver: z.literal("in-memory"),
  }),
]);

export const remoteConfigSchema = z.discriminatedUnion("driver", [
  z.object({
    driver: z.literal("erpnext"),
    url: optionalString,
    sid: optionalString,
    timeout_ms: positiveInt.optional(),
  }),
  z.object({
    driver: z.literal("in-memory"),
    first_sequence: positiveInt.optional(),
  }),
]);

export const outboundConfigSchema = z.object({
  interval_minutes: z.number().int().min(1).max(59).default(DEFAULT_INTERVAL_MINUTES),
  run_on_start: z.boolean().default(false),
});

export const inboundConfigSchema = z.object({
  batch_size: positiveInt.default(DEFAULT_BATCH_SIZE),
  max_records: positiveInt.default(DEFAULT_MAX_RECORDS),
});

export const configFileSchema = z.object({
  store: storeConfigSchema,
  remote: remoteConfigSchema,
  outbound: outboundConfigSchema.default({}),
  inbound: inboundConfigSchema.default({}),
});

/**
 * Record store driver configuration.
 */
export type StoreConfig = z.infer<typeof storeConfigSchema>;

/**
 * Remote endpoint driver configuration.
 */
export type RemoteConfig = z.infer<typeof remoteConfigSchema>;

export type OutboundConfigRaw = z.infer<typeof outboundConfigSchema>;

export type InboundConfigRaw = z.infer<typeof inboundConfigSchema>;

/**
 * Complete, validated configuration file.
 */
export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Runtime configuration, converted from the file's snake_case keys.
 */
export interface AppConfig {
  store: StoreConfig;
  remote: RemoteConfig;
  outbound: {
    intervalMinutes: number;
    runOnStart: boolean;
  };
  inbound: {
    batchSize: number;
    maxRecords: number;
  };
}
