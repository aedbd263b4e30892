/**
 * Turns metadata fields into selectable options and component descriptors.
 */
import type { ComponentDescriptor } from '../components/index.js';
import { parseVersionInterval } from '../version/index.js';
import type { ClientMetadata, ProjectTypeSelect, SingleSelect } from './schema.js';
import type { SelectOption } from './types.js';

export function toSelectOptions(select: SingleSelect): SelectOption[] {
  return select.values.map((value) => ({
    value: value.id,
    label: value.name,
    selected: value.id === select.default,
  }));
}

/**
 * Project types that produce a project (build files only are left out).
 */
export function projectTypeOptions(select: ProjectTypeSelect): SelectOption[] {
  return select.values
    .filter((value) => value.tags?.format === 'project')
    .map((value) => ({
      value: value.id,
      label: value.name,
      selected: value.id === select.default,
    }));
}

/**
 * Flatten the dependency groups into descriptors.
 * Each version range is parsed here, once per component.
 */
export function toComponentDescriptors(
  metadata: ClientMetadata,
  onDegraded?: (id: string, issues: string[]) => void
): ComponentDescriptor[] {
  const descriptors: ComponentDescriptor[] = [];
  for (const group of metadata.dependencies.values) {
    for (const dependency of group.values) {
      const parsed = parseVersionInterval(dependency.versionRange);
      if (parsed.status === 'degraded') {
        onDegraded?.(dependency.id, parsed.issues);
      }
      descriptors.push({
        id: dependency.id,
        displayName: dependency.name,
        group: group.name,
        description: dependency.description,
        compatibility: parsed.interval,
        compatibilityRange: dependency.versionRange,
      });
    }
  }
  return descriptors;
}
