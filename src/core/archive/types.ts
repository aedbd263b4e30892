/**
 * Archive extraction types.
 */

/**
 * One entry of the archive index, realised on disk as soon as it is read.
 */
export interface ArchiveEntry {
  /** Path relative to the archive root */
  path: string;
  isDirectory: boolean;
  /** Permission bits applied to the created node */
  mode: number;
  /** Decompressed content; directories resolve to an empty buffer */
  read: () => Promise<Buffer>;
}

export interface ExtractOptions {
  /** Directory the target is created in (default: process.cwd()) */
  cwd?: string;
}

export interface ExtractSummary {
  /** Absolute path of the created directory */
  root: string;
  files: number;
  directories: number;
}
