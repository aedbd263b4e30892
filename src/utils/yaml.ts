/**
 * YAML loading with schema validation.
 */
import { parseDocument } from 'yaml';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content. `source` names the content in error messages.
 */
export function parseYaml(content: string, source = 'YAML'): unknown {
  const document = parseDocument(content);
  const [first] = document.errors;
  if (first) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Failed to parse ${source}: ${first.message}`, {
      source,
      line: first.linePos?.[0].line,
    });
  }
  return document.toJS();
}

export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T,
  source = 'YAML'
): z.infer<T> {
  const result = schema.safeParse(parseYaml(content, source));
  if (!result.success) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID, `${source} validation failed: ${formatZodError(result.error)}`, {
      source,
      errors: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Read a YAML file and validate it. Errors name the file.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Failed to load YAML file: ${filePath}`, {
      filePath,
      error,
    });
  }
  return parseYamlWithSchema(content, schema, filePath);
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
