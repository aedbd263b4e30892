/**
 * Generates a project directory: target check, download, extraction.
 */
import type { Config } from '../config/index.js';
import { extractArchive, type ExtractSummary } from '../archive/index.js';
import { assertTargetAvailable, type ProjectInfo } from '../project/index.js';
import { downloadProjectArchive } from './client.js';

export interface GenerateOptions {
  /** Directory the project is created in (default: process.cwd()) */
  cwd?: string;
}

export interface GenerateResult extends ExtractSummary {
  /** Archive size in bytes */
  archiveSize: number;
}

export async function generateProject(
  config: Config,
  info: ProjectInfo,
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const cwd = options.cwd ?? process.cwd();

  // Checked before downloading so a taken name costs no request.
  await assertTargetAvailable(info.name, cwd);

  const archive = await downloadProjectArchive(config, info);
  const summary = await extractArchive(archive, info.name, { cwd });
  return { ...summary, archiveSize: archive.byteLength };
}
