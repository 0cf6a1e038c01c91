/**
 * Filesystem side of installing one component.
 *
 * Every file is written to a fresh `<dest>.tmp`, fsync'd and renamed over
 * `<dest>`, so a destination is either untouched or complete. The transaction records
 * each file it replaced (with the previous bytes) and each directory it
 * created, which is what rollback() undoes.
 */

import { createHash } from "node:crypto";
import { type FileHandle, mkdir, open, readFile, rename, rm, rmdir } from "node:fs/promises";
import { dirname } from "node:path";

import { getErrnoCode, IOError } from "@armory/errors";

interface WrittenFile {
  readonly path: string;
  /** Bytes the file held before it was replaced; undefined when it was new */
  readonly previous: Uint8Array | undefined;
}

export class FileTransaction {
  private readonly written: WrittenFile[] = [];
  private readonly createdDirs: string[] = [];
  private readonly checkpoint: () => void;

  /**
   * @param checkpoint - called right before each rename; throwing from it
   *   abandons the write and leaves the destination untouched
   */
  constructor(checkpoint: () => void = () => {}) {
    this.checkpoint = checkpoint;
  }

  /** Absolute paths written so far, in write order */
  get writtenPaths(): readonly string[] {
    return this.written.map((file) => file.path);
  }

  /**
   * @throws {IOError} when `<path>.tmp` already exists; it is left alone
   */
  async writeFile(path: string, bytes: Uint8Array): Promise<void> {
    await this.ensureDir(dirname(path));
    const previous = await readExisting(path);
    const tmpPath = tempPathFor(path);
    const handle = await openFile(tmpPath, "wx");

    try {
      await fillAndClose(handle, tmpPath, bytes);
      this.checkpoint();
      await renameOver(tmpPath, path);
    } catch (error: unknown) {
      await rm(tmpPath, { force: true });
      throw error;
    }
    this.written.push({ path, previous });
  }

  /**
   * Restores replaced files, deletes new ones and removes directories this
   * transaction created. Returns a description of every step that failed.
   */
  async rollback(): Promise<string[]> {
    const problems: string[] = [];
    for (const file of [...this.written].reverse()) {
      try {
        if (file.previous === undefined) {
          await rm(file.path, { force: true });
        } else {
          await writeDurably(file.path, file.previous);
        }
      } catch (error: unknown) {
        problems.push(`${file.path}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    this.written.length = 0;

    for (const dir of [...this.createdDirs].reverse()) {
      try {
        await rmdir(dir);
      } catch (error: unknown) {
        const code = getErrnoCode(error);
        if (code !== "ENOENT" && code !== "ENOTEMPTY") {
          problems.push(`${dir}: ${code ?? String(error)}`);
        }
      }
    }
    this.createdDirs.length = 0;
    return problems;
  }

  private async ensureDir(dir: string): Promise<void> {
    let first: string | undefined;
    try {
      first = await mkdir(dir, { recursive: true });
    } catch (error: unknown) {
      throw new IOError("mkdir", dir, error);
    }
    if (first === undefined) return;

    const created: string[] = [];
    for (let current = dir; ; current = dirname(current)) {
      created.unshift(current);
      if (current === first || dirname(current) === current) break;
    }
    this.createdDirs.push(...created);
  }
}

/**
 * Hex SHA-256 of the file at `path`, read back from disk.
 */
export async function hashFile(path: string): Promise<string> {
  try {
    return createHash("sha256").update(await readFile(path)).digest("hex");
  } catch (error: unknown) {
    throw new IOError("hash", path, error);
  }
}

async function readExisting(path: string): Promise<Uint8Array | undefined> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error: unknown) {
    if (getErrnoCode(error) === "ENOENT") return undefined;
    throw new IOError("read", path, error);
  }
}

/** Where `path` is staged before the rename */
export function tempPathFor(path: string): string {
  return `${path}.tmp`;
}

async function openFile(path: string, flags: "w" | "wx"): Promise<FileHandle> {
  try {
    return await open(path, flags);
  } catch (error: unknown) {
    throw new IOError("write", path, error);
  }
}

async function fillAndClose(handle: FileHandle, path: string, bytes: Uint8Array): Promise<void> {
  try {
    try {
      await handle.writeFile(bytes);
    } catch (error: unknown) {
      throw new IOError("write", path, error);
    }
    try {
      await handle.sync();
    } catch (error: unknown) {
      throw new IOError("fsync", path, error);
    }
  } finally {
    await handle.close();
  }
}

async function writeDurably(path: string, bytes: Uint8Array): Promise<void> {
  await fillAndClose(await openFile(path, "w"), path, bytes);
}

async function renameOver(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error: unknown) {
    throw new IOError("rename", to, error);
  }
}
