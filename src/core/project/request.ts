/**
 * Building and checking the project request sent to the generator.
 */
import type { ProjectDefaults } from '../config/index.js';
import { computeOfferedOptions, findUnavailable, type ComponentDescriptor } from '../components/index.js';
import {
  projectTypeOptions,
  toSelectOptions,
  type ClientMetadata,
  type SelectOption,
} from '../metadata/index.js';
import { ProjectError, ErrorCodes } from '../../utils/errors.js';
import type { ProjectAnswers, ProjectInfo } from './types.js';
import { validateIdentifier, validateRequiredIdentifier } from './validation.js';

/**
 * Fill in blank answers: config defaults first, then the service defaults.
 */
export function resolveProjectInfo(
  answers: ProjectAnswers,
  metadata: ClientMetadata,
  defaults: Partial<ProjectDefaults> = {}
): ProjectInfo {
  return {
    name: pick(answers.name, metadata.name.default),
    groupId: pick(answers.groupId, defaults.group_id, metadata.groupId.default),
    artifactId: pick(answers.artifactId, defaults.artifact_id, metadata.artifactId.default),
    description: pick(answers.description, metadata.description.default),
    type: pick(answers.type, defaults.type, metadata.type.default),
    language: pick(answers.language, defaults.language, metadata.language.default),
    bootVersion: pick(answers.bootVersion, defaults.boot_version, metadata.bootVersion.default),
    packaging: pick(answers.packaging, defaults.packaging, metadata.packaging.default),
    javaVersion: pick(answers.javaVersion, defaults.java_version, metadata.javaVersion.default),
    dependencies: normalizeIds(answers.dependencies ?? defaults.dependencies ?? []),
  };
}

/**
 * Check a resolved request against the metadata.
 * Throws ProjectError for the first problem found.
 */
export function verifyProjectInfo(
  info: ProjectInfo,
  metadata: ClientMetadata,
  components: readonly ComponentDescriptor[]
): void {
  checkIdentifier('name', info.name, validateRequiredIdentifier);
  checkIdentifier('groupId', info.groupId, validateIdentifier);
  checkIdentifier('artifactId', info.artifactId, validateIdentifier);

  checkOption('type', info.type, projectTypeOptions(metadata.type));
  checkOption('language', info.language, toSelectOptions(metadata.language));
  checkOption('bootVersion', info.bootVersion, toSelectOptions(metadata.bootVersion));
  checkOption('packaging', info.packaging, toSelectOptions(metadata.packaging));
  checkOption('javaVersion', info.javaVersion, toSelectOptions(metadata.javaVersion));

  const unknown = findUnavailable(info.dependencies, components);
  if (unknown.length > 0) {
    throw new ProjectError(ErrorCodes.UNKNOWN_OPTION, `Unknown dependencies: ${unknown.join(', ')}`, {
      dependencies: unknown,
    });
  }

  const incompatible = findUnavailable(info.dependencies, computeOfferedOptions(components, info.bootVersion));
  if (incompatible.length > 0) {
    throw new ProjectError(
      ErrorCodes.INCOMPATIBLE_DEPENDENCY,
      `Not available for Spring Boot ${info.bootVersion}: ${incompatible.join(', ')}`,
      { dependencies: incompatible, bootVersion: info.bootVersion }
    );
  }
}

/**
 * Form fields for the generator's starter endpoint.
 */
export function toFormParams(info: ProjectInfo): URLSearchParams {
  const form = new URLSearchParams();
  form.append('name', info.name);
  form.append('groupId', info.groupId);
  form.append('artifactId', info.artifactId);
  form.append('description', info.description);

  form.append('language', info.language);
  form.append('javaVersion', info.javaVersion);
  form.append('bootVersion', info.bootVersion);
  form.append('type', info.type);
  form.append('packaging', info.packaging);

  form.append('dependencies', info.dependencies.join(','));
  return form;
}

/**
 * Split, trim and de-duplicate component ids.
 */
export function normalizeIds(ids: readonly string[]): string[] {
  const result: string[] = [];
  for (const raw of ids) {
    for (const id of raw.split(',')) {
      const trimmed = id.trim();
      if (trimmed && !result.includes(trimmed)) {
        result.push(trimmed);
      }
    }
  }
  return result;
}

function pick(...candidates: Array<string | undefined>): string {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return '';
}

function checkIdentifier(field: string, value: string, validate: (value: string) => string | undefined): void {
  const problem = validate(value);
  if (problem) {
    throw new ProjectError(ErrorCodes.INVALID_FIELD, `${field} ${problem}`, { field, value });
  }
}

function checkOption(field: string, value: string, options: SelectOption[]): void {
  if (options.length === 0 || options.some((option) => option.value === value)) {
    return;
  }
  throw new ProjectError(
    ErrorCodes.UNKNOWN_OPTION,
    `Unknown ${field} '${value}'. Valid options: ${options.map((option) => option.value).join(', ')}`,
    { field, value }
  );
}
