/**
 * Scratch directories for tests that touch a world on disk
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

const ROOT_PREFIX = "stoneward-test-";

/**
 * Make a fresh, empty directory under the OS temp folder and return its path
 */
export async function createTempRoot(prefix = ROOT_PREFIX): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/** Delete a directory tree; a missing path is not an error */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Hand `fn` a scratch directory and delete it once `fn` settles
 */
export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
  prefix = ROOT_PREFIX
): Promise<T> {
  const dir = await createTempRoot(prefix);
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
