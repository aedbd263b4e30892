/**
 * Unpacks a generated project archive into a fresh directory.
 *
 * The archive is opened before anything is written, so a corrupt payload
 * leaves the disk untouched. After that, failures are fatal but not rolled
 * back: whatever was written before the failing entry stays on disk.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import JSZip from 'jszip';
import { ExtractionError, errorMessage } from '../../utils/errors.js';
import { isErrnoException } from '../../utils/file-system.js';
import type { ArchiveEntry, ExtractOptions, ExtractSummary } from './types.js';

export const DEFAULT_FILE_MODE = 0o644;
export const DEFAULT_DIRECTORY_MODE = 0o755;

/**
 * Extract `archiveBytes` into `<cwd>/<targetDirName>`.
 * The target must not exist yet.
 */
export async function extractArchive(
  archiveBytes: Uint8Array,
  targetDirName: string,
  options: ExtractOptions = {}
): Promise<ExtractSummary> {
  const zip = await openArchive(archiveBytes);
  const root = path.resolve(options.cwd ?? process.cwd(), targetDirName);

  await createRoot(root, targetDirName);

  const summary: ExtractSummary = { root, files: 0, directories: 0 };
  for (const entry of listEntries(zip)) {
    const destination = resolveEntryPath(root, entry.path);
    if (destination === root) {
      continue;
    }

    if (entry.isDirectory) {
      await fsStep(destination, async () => {
        await fs.promises.mkdir(destination, { recursive: true, mode: DEFAULT_DIRECTORY_MODE });
        await fs.promises.chmod(destination, entry.mode);
      });
      summary.directories++;
      continue;
    }

    // Parents are created on demand; entry order is not trusted.
    const parent = path.dirname(destination);
    await fsStep(parent, () =>
      fs.promises.mkdir(parent, { recursive: true, mode: DEFAULT_DIRECTORY_MODE })
    );

    const content = await readEntry(entry);
    await fsStep(destination, async () => {
      await fs.promises.writeFile(destination, content, { mode: entry.mode, flag: 'w' });
      await fs.promises.chmod(destination, entry.mode);
    });
    summary.files++;
  }

  return summary;
}

/**
 * Entries in JSZip's name-keyed order: integer-like names first, then the
 * rest in insertion order. This is not always the stored order, so
 * extraction creates missing ancestors itself.
 */
export function listEntries(zip: JSZip): ArchiveEntry[] {
  const entries: ArchiveEntry[] = [];
  zip.forEach((relativePath, file) => {
    entries.push({
      path: relativePath,
      isDirectory: file.dir,
      mode: entryMode(file.unixPermissions, file.dir),
      read: () => file.async('nodebuffer'),
    });
  });
  return entries;
}

/**
 * Permission bits of an entry, or the default for its kind when the
 * archive carries none.
 */
export function entryMode(unixPermissions: number | string | null, isDirectory: boolean): number {
  const fallback = isDirectory ? DEFAULT_DIRECTORY_MODE : DEFAULT_FILE_MODE;
  const bits =
    typeof unixPermissions === 'number'
      ? unixPermissions
      : typeof unixPermissions === 'string'
        ? parseInt(unixPermissions, 8)
        : NaN;
  if (!Number.isInteger(bits)) {
    return fallback;
  }
  const mode = bits & 0o7777;
  return mode === 0 ? fallback : mode;
}

async function openArchive(archiveBytes: Uint8Array): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(archiveBytes, { createFolders: false });
  } catch (error) {
    throw new ExtractionError('invalid-archive', `Invalid archive: ${errorMessage(error)}`, {
      size: archiveBytes.byteLength,
    });
  }
}

async function createRoot(root: string, targetDirName: string): Promise<void> {
  try {
    await fs.promises.mkdir(root);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      const stats = await fs.promises.lstat(root);
      const existing = stats.isDirectory() ? 'directory' : 'file';
      throw new ExtractionError(
        'target-exists',
        `a ${existing} named '${targetDirName}' already exists`,
        { path: root, existing }
      );
    }
    throw new ExtractionError(
      'filesystem',
      `Cannot create directory ${root}: ${errorMessage(error)}`,
      { path: root }
    );
  }
}

function resolveEntryPath(root: string, entryPath: string): string {
  const destination = path.resolve(root, entryPath);
  const relative = path.relative(root, destination);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ExtractionError(
      'invalid-archive',
      `Archive entry '${entryPath}' points outside the target directory`,
      { entry: entryPath }
    );
  }
  return destination;
}

async function readEntry(entry: ArchiveEntry): Promise<Buffer> {
  try {
    return await entry.read();
  } catch (error) {
    throw new ExtractionError(
      'invalid-archive',
      `Cannot read archive entry '${entry.path}': ${errorMessage(error)}`,
      { entry: entry.path }
    );
  }
}

async function fsStep(target: string, step: () => Promise<unknown>): Promise<void> {
  try {
    await step();
  } catch (error) {
    throw new ExtractionError('filesystem', `${target}: ${errorMessage(error)}`, {
      path: target,
    });
  }
}
