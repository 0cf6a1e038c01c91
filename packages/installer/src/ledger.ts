/**
 * Append-only install ledger: one JSON object per line.
 *
 * The ledger is read once when opened and only ever appended to; the one
 * exception is a torn final line, which the next append cuts off. Appends are
 * serialized behind a single promise chain and fsync'd, so concurrent
 * installers sharing one Ledger never interleave lines.
 */

import { type FileHandle, mkdir, open, readFile } from "node:fs/promises";
import { dirname } from "node:path";

import { type LedgerEntry, resolveWarningHandler, type WarningHandler } from "@armory/core";
import { type FileOwner, getErrnoCode, IOError, LedgerError } from "@armory/errors";
import { z } from "zod";

export const DEFAULT_LEDGER_PATH = ".component-lock/ledger.jsonl";

const NEWLINE = 0x0a;

const LedgerEntrySchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  files: z.array(
    z.object({
      path: z.string().min(1),
      checksum: z.string().regex(/^[0-9a-f]{64}$/, "Must be a hex SHA-256 digest"),
    }),
  ),
  installedAt: z.string().datetime({ offset: true }),
  requestedDirectly: z.boolean(),
});

/**
 * What the next append has to fix first: cut the file back to `length`
 * bytes, then start a new line when the last entry lacks its newline.
 */
interface TailRepair {
  readonly length: number;
  readonly needsNewline: boolean;
}

export class Ledger {
  readonly path: string;
  private readonly records: LedgerEntry[];
  private repair: TailRepair | undefined;
  private tail: Promise<void> = Promise.resolve();

  private constructor(path: string, records: LedgerEntry[], repair: TailRepair | undefined) {
    this.path = path;
    this.records = records;
    this.repair = repair;
  }

  /**
   * Reads the ledger at `path`. A missing file is an empty ledger.
   *
   * A final line without its newline is what an interrupted append leaves
   * behind: it is kept when it parses, otherwise dropped with a
   * `LEDGER_TAIL_DISCARDED` warning and cut off by the next append.
   *
   * @throws {LedgerError} naming the first malformed line
   */
  static async open(path: string, onWarning?: WarningHandler): Promise<Ledger> {
    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (error: unknown) {
      if (getErrnoCode(error) === "ENOENT") return new Ledger(path, [], undefined);
      const cause = error instanceof Error ? { cause: error } : undefined;
      throw new LedgerError(path, "cannot be read", undefined, cause);
    }

    const bodyLength = content.lastIndexOf(NEWLINE) + 1;
    const body = content.subarray(0, bodyLength).toString("utf-8");
    const records = parseLines(path, body);
    const fragment = content.subarray(bodyLength).toString("utf-8");
    if (fragment.trim() === "") {
      const repair = bodyLength < content.length ? { length: bodyLength, needsNewline: false } : undefined;
      return new Ledger(path, records, repair);
    }

    const lineNumber = body.split("\n").length;
    try {
      records.push(parseEntry(path, fragment, lineNumber));
      return new Ledger(path, records, { length: content.length, needsNewline: true });
    } catch (error: unknown) {
      if (!(error instanceof LedgerError)) throw error;
      resolveWarningHandler("armory:ledger", onWarning)({
        code: "LEDGER_TAIL_DISCARDED",
        message: `Ledger ${path} ends in an incomplete line ${lineNumber}; it will be discarded`,
      });
      return new Ledger(path, records, { length: bodyLength, needsNewline: false });
    }
  }

  /** Entries in append order */
  entries(): readonly LedgerEntry[] {
    return [...this.records];
  }

  /**
   * Appends one entry. Resolves once the line is durable.
   *
   * @throws {IOError} when the line cannot be written or synced
   */
  append(entry: LedgerEntry): Promise<void> {
    const run = this.tail.then(() => this.write(entry));
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Latest component recorded as having written `path` */
  ownerOf(path: string): FileOwner | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      const record = this.records[i];
      if (record?.files.some((file) => file.path === path)) {
        return { name: record.name, version: record.version };
      }
    }
    return undefined;
  }

  /** True when `name@version` is recorded as having written `path` with `checksum` */
  isRecorded(name: string, version: string, path: string, checksum: string): boolean {
    return this.records.some(
      (record) =>
        record.name === name &&
        record.version === version &&
        record.files.some((file) => file.path === path && file.checksum === checksum),
    );
  }

  private async write(entry: LedgerEntry): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
    } catch (error: unknown) {
      throw new IOError("mkdir", dirname(this.path), error);
    }

    let handle: FileHandle;
    try {
      handle = await open(this.path, "a");
    } catch (error: unknown) {
      throw new IOError("write", this.path, error);
    }
    try {
      const repair = this.repair;
      if (repair !== undefined) {
        await handle.truncate(repair.length);
      }
      // A failed append below leaves at most a torn line past `size`.
      const { size } = await handle.stat();
      const needsNewline = repair?.needsNewline ?? false;
      this.repair = { length: size, needsNewline };
      await handle.appendFile(`${needsNewline ? "\n" : ""}${JSON.stringify(entry)}\n`, "utf-8");
      await handle.sync();
      this.repair = undefined;
    } catch (error: unknown) {
      throw new IOError("write", this.path, error);
    } finally {
      await handle.close();
    }
    this.records.push(entry);
  }
}

function parseLines(path: string, content: string): LedgerEntry[] {
  const entries: LedgerEntry[] = [];
  for (const [index, line] of content.split("\n").entries()) {
    if (line.trim() === "") continue;
    entries.push(parseEntry(path, line, index + 1));
  }
  return entries;
}

function parseEntry(path: string, line: string, lineNumber: number): LedgerEntry {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error: unknown) {
    const cause = error instanceof Error ? { cause: error } : undefined;
    throw new LedgerError(path, "invalid JSON", lineNumber, cause);
  }
  const result = LedgerEntrySchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new LedgerError(path, `invalid entry: ${where}${issue?.message ?? "unknown"}`, lineNumber, {
      cause: result.error,
    });
  }
  return result.data;
}
