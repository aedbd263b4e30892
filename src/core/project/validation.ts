/**
 * Validation of project answers.
 */
import * as path from 'node:path';
import { TargetExistsError } from '../../utils/errors.js';
import { lstatOrNull } from '../../utils/file-system.js';
import type { TargetStatus } from './types.js';

/**
 * Error message for an identifier-like value, or undefined when valid.
 * Blank values pass; they are replaced by defaults later.
 */
export function validateIdentifier(value: string): string | undefined {
  if (value.trim().includes(' ')) {
    return 'should not contain space';
  }
  return undefined;
}

/**
 * Like validateIdentifier, but blank values fail.
 */
export function validateRequiredIdentifier(value: string): string | undefined {
  if (value.trim().length === 0) {
    return 'should not be empty';
  }
  return validateIdentifier(value);
}

/**
 * Whether `<cwd>/<name>` is free for a new project directory.
 */
export async function checkTargetAvailable(name: string, cwd: string = process.cwd()): Promise<TargetStatus> {
  const stats = await lstatOrNull(path.resolve(cwd, name.trim()));
  if (!stats) {
    return { available: true };
  }
  return { available: false, existing: stats.isDirectory() ? 'directory' : 'file' };
}

/**
 * Throw TargetExistsError when `<cwd>/<name>` is taken.
 */
export async function assertTargetAvailable(name: string, cwd: string = process.cwd()): Promise<void> {
  const status = await checkTargetAvailable(name, cwd);
  if (!status.available) {
    throw new TargetExistsError(name.trim(), status.existing);
  }
}
