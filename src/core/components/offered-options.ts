/**
 * Which add-on components are offered for a chosen platform version.
 */
import { containsVersion, parseSemanticVersion } from '../version/index.js';
import type { ComponentDescriptor, ComponentGroup } from './types.js';

/**
 * Components whose compatibility interval contains `platformVersion`,
 * in their original order.
 *
 * An unparsable platform version filters nothing out, the same leniency
 * an unparsable interval bound gets.
 */
export function computeOfferedOptions(
  allComponents: readonly ComponentDescriptor[],
  platformVersion: string
): ComponentDescriptor[] {
  const version = parseSemanticVersion(platformVersion);
  if (!version) {
    return [...allComponents];
  }
  return allComponents.filter((component) => containsVersion(component.compatibility, version));
}

/**
 * Group components by their group name, keeping first-seen order.
 */
export function groupComponents(components: readonly ComponentDescriptor[]): ComponentGroup[] {
  const groups = new Map<string, ComponentDescriptor[]>();
  for (const component of components) {
    const members = groups.get(component.group);
    if (members) {
      members.push(component);
    } else {
      groups.set(component.group, [component]);
    }
  }
  return Array.from(groups, ([name, members]) => ({ name, components: members }));
}

/**
 * Ids from `requested` that are not among the offered components.
 */
export function findUnavailable(
  requested: readonly string[],
  offered: readonly ComponentDescriptor[]
): string[] {
  const offeredIds = new Set(offered.map((component) => component.id));
  return requested.filter((id) => !offeredIds.has(id));
}
