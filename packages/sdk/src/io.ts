/**
 * File I/O for the JSON world directory and config file
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files reside in the same directory as the target and are removed on failure
 * - Reads are UTF-8 only; a missing file reads as null
 * - Listings are sorted for deterministic enumeration
 *
 * Pattern: write → fsync → rename
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { DocumentReadError, DocumentWriteError, ListFilesError } from "./errors.js";

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Atomically write content to a file using write-rename pattern
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to full sync where unsupported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await fs.rm(tmp, { force: true }).catch(() => undefined);

    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Read a file as UTF-8
 * @returns File contents, or null if the file does not exist
 * @throws DocumentReadError for other read failures
 */
export async function readOptionalDocument(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @returns Sorted filenames (not full paths); empty if the directory does not exist
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    let files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    return files.sort();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }
}

/**
 * List subdirectories, skipping hidden and underscore-prefixed ones
 * @returns Sorted directory names; empty if the directory does not exist
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .filter((name) => !name.startsWith(".") && !name.startsWith("_"))
      .sort();
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }
}
