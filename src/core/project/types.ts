/**
 * Project request types.
 */

/**
 * Everything the generator needs to build a project.
 */
export interface ProjectInfo {
  name: string;
  groupId: string;
  artifactId: string;
  description: string;
  /** Build type, e.g. maven-project */
  type: string;
  language: string;
  bootVersion: string;
  packaging: string;
  javaVersion: string;
  /** Component ids */
  dependencies: string[];
}

/** Raw answers from prompts or flags; blanks fall back to defaults. */
export type ProjectAnswers = Partial<ProjectInfo>;

export type TargetStatus =
  | { available: true }
  | { available: false; existing: 'file' | 'directory' };
