/**
 * Add-on component types.
 */
import type { VersionInterval } from '../version/index.js';

/**
 * An optional component the generator can add to a project.
 */
export interface ComponentDescriptor {
  id: string;
  displayName: string;
  /** Name of the group the service lists it under */
  group: string;
  description?: string;
  /** Platform versions the component supports */
  compatibility: VersionInterval;
  /** Interval notation as the service sent it */
  compatibilityRange?: string;
}

export interface ComponentGroup {
  name: string;
  components: ComponentDescriptor[];
}
