/**
 * Configuration schema.
 */
import { z } from 'zod';

/**
 * Helper to create an optional object field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Answers used when a prompt is skipped or left blank. */
export const ProjectDefaultsSchema = z.object({
  group_id: z.string().optional(),
  artifact_id: z.string().optional(),
  language: z.string().optional(),
  java_version: z.string().optional(),
  boot_version: z.string().optional(),
  type: z.string().optional(),
  packaging: z.string().optional(),
  dependencies: z.array(z.string()).default([]),
});

export const ConfigSchema = z.object({
  /** Base URL of the project generator service */
  service_url: z.string().url().default('https://start.spring.io'),
  /** Request timeout in milliseconds */
  timeout_ms: z.number().int().positive().default(30000),
  defaults: withDefaults(ProjectDefaultsSchema),
});

export type ProjectDefaults = z.infer<typeof ProjectDefaultsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
