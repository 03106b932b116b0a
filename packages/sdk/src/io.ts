/**
 * Crash-safe file operations for the filesystem document store
 *
 * Invariants:
 * - Documents are created exclusively: write temp → fsync → link, so a document file is
 *   either absent or complete, and two creators of one path never both succeed
 * - Temp files reside in the target directory and are removed on every path
 * - Reads of a concurrently removed file report absence instead of failing
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { DocumentStoreError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * errno code of a Node.js system error, if any
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DocumentStoreError("other", `Failed to create directory: ${dirPath}`, { cause: err });
  }
}

async function syncHandle(handle: fs.FileHandle): Promise<void> {
  try {
    await handle.datasync();
  } catch (err) {
    // ENOTSUP/ENOSYS: not supported on this platform; EINVAL: some CIFS/FUSE mounts
    const code = errnoCode(err);
    if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
      await handle.sync();
    } else {
      throw err;
    }
  }
}

/**
 * fsync a directory so entries created or removed in it survive a crash. Best effort.
 */
export async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("io.dir_fsync.failed", { message: `${dir}: ${String(err)}` });
    }
  }
}

async function removeTemp(tmp: string): Promise<void> {
  try {
    await fs.unlink(tmp);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      logger.warn("io.tmp_cleanup.failed", { message: `${tmp}: ${String(err)}` });
    }
  }
}

/**
 * Create a file that must not already exist
 * @param durable - fsync the directory after linking
 * @throws DocumentStoreError of kind "conflict" if the file exists, "other" on any other failure
 */
export async function createExclusive(
  filePath: string,
  content: Uint8Array,
  durable = true
): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;
  try {
    fileHandle = await fs.open(tmp, "wx", 0o600);
    await fileHandle.writeFile(content);
    await syncHandle(fileHandle);
    await fileHandle.close();
    fileHandle = null;

    try {
      // link(2) fails with EEXIST atomically when the target exists
      await fs.link(tmp, filePath);
    } catch (err) {
      const code = errnoCode(err);
      // Filesystems without hard links: fall back to an exclusive open
      if (code === "EPERM" || code === "ENOTSUP" || code === "ENOSYS") {
        await fs.writeFile(filePath, content, { flag: "wx", mode: 0o600 });
      } else {
        throw err;
      }
    }

    if (durable) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (errnoCode(err) === "EEXIST") {
      throw new DocumentStoreError("conflict", `Document already exists: ${filePath}`, { cause: err });
    }
    throw new DocumentStoreError("other", `Failed to create document: ${filePath}`, { cause: err });
  } finally {
    if (fileHandle) {
      await fileHandle.close();
    }
    await removeTemp(tmp);
  }
}

/**
 * Read a file's bytes
 * @returns null if the file does not exist
 */
export async function readPayload(filePath: string): Promise<Uint8Array | null> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new DocumentStoreError("other", `Failed to read document: ${filePath}`, { cause: err });
  }
}

/**
 * Remove a file
 * @returns false if the file was already gone
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new DocumentStoreError("other", `Failed to remove document: ${filePath}`, { cause: err });
  }
}

/**
 * List regular files in a directory with the given extension, excluding temp files
 * @returns Sorted filenames; empty if the directory does not exist
 */
export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return [];
    }
    throw new DocumentStoreError("other", `Failed to list directory: ${dirPath}`, { cause: err });
  }
}

/**
 * List subdirectories of a directory
 * @returns Sorted directory names; empty if the directory does not exist
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return [];
    }
    throw new DocumentStoreError("other", `Failed to list directory: ${dirPath}`, { cause: err });
  }
}
