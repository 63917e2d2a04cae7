/**
 * Filesystem helpers for staging and publishing.
 *
 * Files only appear under their final name through a rename; a failed
 * write leaves at most a temporary sibling, which is removed.
 */

import { cp, mkdir, rename, rm } from 'fs/promises';
import { dirname } from 'path';
import { v4 as uuid } from 'uuid';
import { logger } from '../logger';

const log = logger.child({ component: 'fs' });

/** Node error code of a thrown value, if it has one. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Temporary sibling of `finalPath` used while writing it. */
export function partialPath(finalPath: string): string {
  return `${finalPath}.partial-${uuid()}`;
}

/**
 * Produce `finalPath` by letting `write` fill a temporary sibling and
 * renaming it into place.
 */
export async function writeThenRename(finalPath: string, write: (tempPath: string) => Promise<void>): Promise<void> {
  await mkdir(dirname(finalPath), { recursive: true });
  const temp = partialPath(finalPath);
  try {
    await write(temp);
    await rename(temp, finalPath);
  } catch (err) {
    await removeQuietly(temp);
    throw err;
  }
}

/** Copy a file or directory tree. */
export async function copyTree(source: string, destination: string): Promise<void> {
  await cp(source, destination, { recursive: true, errorOnExist: true, force: false });
}

/**
 * Copy `source` (a file or a directory tree) to `destination` through a
 * temporary sibling. An existing entry at `destination` is replaced.
 */
export async function copyAtomically(source: string, destination: string): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  const temp = partialPath(destination);
  try {
    await copyTree(source, temp);
    await rm(destination, { recursive: true, force: true });
    await rename(temp, destination);
  } catch (err) {
    await removeQuietly(temp);
    throw err;
  }
}

/** Move a file or directory, copying and removing when source and destination are on different devices. */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (err) {
    if (errnoCode(err) !== 'EXDEV') throw err;
    await copyTree(source, destination);
    await rm(source, { recursive: true, force: true });
  }
}

/** Remove a directory tree and recreate it empty. */
export async function resetDirectory(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
  await mkdir(path, { recursive: true });
}

/** Best-effort removal of a temporary file or directory. Failures are logged. */
export async function removeQuietly(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err) {
    log.warn('Failed to remove temporary file', {
      path,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
