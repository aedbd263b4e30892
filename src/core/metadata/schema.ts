/**
 * Schema of the generator service's client metadata.
 */
import { z } from 'zod';

/** A selectable value. */
export const OptionValueSchema = z.object({
  id: z.string(),
  name: z.string(),
});

/** Single-select field with the service's default choice. */
export const SingleSelectSchema = z.object({
  default: z.string().optional(),
  values: z.array(OptionValueSchema).default([]),
});

/** Project types carry tags; only `format: project` ones build projects. */
export const ProjectTypeValueSchema = OptionValueSchema.extend({
  description: z.string().optional(),
  tags: z
    .object({
      build: z.string().nullish(),
      format: z.string().nullish(),
    })
    .optional(),
});

export const ProjectTypeSelectSchema = z.object({
  default: z.string().optional(),
  values: z.array(ProjectTypeValueSchema).default([]),
});

export const DependencySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  /** Interval notation, e.g. `[3.2.0,3.5.0-M1)` */
  versionRange: z.string().optional(),
});

export const DependencyGroupSchema = z.object({
  name: z.string(),
  values: z.array(DependencySchema).default([]),
});

export const TextFieldSchema = z.object({
  default: z.string().default(''),
});

export const ClientMetadataSchema = z.object({
  dependencies: z.object({
    values: z.array(DependencyGroupSchema).default([]),
  }),
  type: ProjectTypeSelectSchema,
  packaging: SingleSelectSchema,
  javaVersion: SingleSelectSchema,
  language: SingleSelectSchema,
  bootVersion: SingleSelectSchema,
  groupId: TextFieldSchema.default({ default: '' }),
  artifactId: TextFieldSchema.default({ default: '' }),
  name: TextFieldSchema.default({ default: '' }),
  description: TextFieldSchema.default({ default: '' }),
});

export type OptionValue = z.infer<typeof OptionValueSchema>;
export type SingleSelect = z.infer<typeof SingleSelectSchema>;
export type ProjectTypeSelect = z.infer<typeof ProjectTypeSelectSchema>;
export type Dependency = z.infer<typeof DependencySchema>;
export type ClientMetadata = z.infer<typeof ClientMetadataSchema>;
