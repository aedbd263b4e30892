/**
 * The interactive project form.
 */
import type { ProjectDefaults } from '../core/config/index.js';
import { computeOfferedOptions, type ComponentDescriptor } from '../core/components/index.js';
import {
  projectTypeOptions,
  toSelectOptions,
  type ClientMetadata,
  type SelectOption,
} from '../core/metadata/index.js';
import {
  checkTargetAvailable,
  validateIdentifier,
  type ProjectAnswers,
} from '../core/project/index.js';
import { renderVersionInterval } from '../core/version/index.js';
import type { Choice, Prompter } from './prompts.js';

export interface FormContext {
  metadata: ClientMetadata;
  components: readonly ComponentDescriptor[];
  defaults: ProjectDefaults;
  cwd: string;
}

/**
 * Ask for every answer not already given in `preset`.
 */
export async function runProjectForm(
  prompter: Prompter,
  context: FormContext,
  preset: ProjectAnswers = {}
): Promise<ProjectAnswers> {
  const { metadata, defaults } = context;
  const answers: ProjectAnswers = { ...preset };

  answers.name ??= await prompter.input({
    title: 'Name of the project',
    placeholder: metadata.name.default,
    validate: (value) => validateProjectName(value || metadata.name.default, context.cwd),
  });
  answers.groupId ??= await prompter.input({
    title: 'Group Id',
    placeholder: defaults.group_id ?? metadata.groupId.default,
    validate: validateIdentifier,
  });
  answers.artifactId ??= await prompter.input({
    title: 'Artifact Id',
    placeholder: defaults.artifact_id ?? metadata.artifactId.default,
    validate: validateIdentifier,
  });
  answers.description ??= await prompter.input({
    title: 'Write a short description',
    placeholder: metadata.description.default,
  });

  answers.language ??= await prompter.select({
    title: 'Pick a language',
    choices: toChoices(toSelectOptions(metadata.language), defaults.language),
  });
  answers.javaVersion ??= await prompter.select({
    title: 'Java version',
    choices: toChoices(toSelectOptions(metadata.javaVersion), defaults.java_version),
  });
  answers.bootVersion ??= await prompter.select({
    title: 'Spring Boot version',
    choices: toChoices(toSelectOptions(metadata.bootVersion), defaults.boot_version),
  });
  answers.type ??= await prompter.select({
    title: 'Type of the project',
    choices: toChoices(projectTypeOptions(metadata.type), defaults.type),
  });
  answers.packaging ??= await prompter.select({
    title: 'Packaging type',
    choices: toChoices(toSelectOptions(metadata.packaging), defaults.packaging),
  });

  // Only components compatible with the chosen boot version are offered.
  answers.dependencies ??= await prompter.multiSelect({
    title: 'Add dependencies',
    choices: dependencyChoices(computeOfferedOptions(context.components, answers.bootVersion)),
  });

  return answers;
}

/**
 * Name check: no spaces, and nothing on disk under that name.
 */
export async function validateProjectName(value: string, cwd: string): Promise<string | undefined> {
  const problem = validateIdentifier(value);
  if (problem) {
    return problem;
  }
  const name = value.trim();
  if (!name) {
    return 'should not be empty';
  }
  const status = await checkTargetAvailable(name, cwd);
  return status.available ? undefined : `a ${status.existing} named '${name}' already exists`;
}

/**
 * Select choices; a configured default overrides the service default.
 */
export function toChoices(options: readonly SelectOption[], preferred?: string): Choice[] {
  const hasPreferred = preferred !== undefined && options.some((option) => option.value === preferred);
  return options.map((option) => ({
    value: option.value,
    label: option.label,
    selected: hasPreferred ? option.value === preferred : option.selected,
  }));
}

export function dependencyChoices(components: readonly ComponentDescriptor[]): Choice[] {
  return components.map((component) => {
    const condition = renderVersionInterval(component.compatibility);
    return {
      value: component.id,
      label: `${component.displayName} (${component.group})`,
      hint: condition ? `[Spring Boot ${condition}]` : undefined,
    };
  });
}
