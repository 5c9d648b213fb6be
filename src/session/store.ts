import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { isValidSessionName } from "../config.js";
import type { CommandRecord } from "../types.js";

export const DEFAULT_SESSION = "default";
export const DEFAULT_HISTORY_SIZE = 5;

const StoredRecordSchema = z.object({
  command: z.string(),
  output: z.string(),
  exit_code: z.number().int(),
  timestamp: z.string(),
});

const SessionFileSchema = z.object({
  version: z.literal(1),
  current: StoredRecordSchema.nullable(),
  history: z.array(StoredRecordSchema),
});

type StoredRecord = z.infer<typeof StoredRecordSchema>;
type SessionFile = z.infer<typeof SessionFileSchema>;

export interface SessionStoreOptions {
  dir: string;
  historySize?: number;
  /** 0 disables expiry */
  ttlMs?: number;
  now?: () => Date;
  readTextFile?: (path: string) => string;
  writeTextFile?: (path: string, text: string) => void;
  removeFile?: (path: string) => void;
}

function toRecord(stored: StoredRecord): CommandRecord {
  return {
    command: stored.command,
    output: stored.output,
    exitCode: stored.exit_code,
    timestamp: stored.timestamp,
  };
}

function toStored(record: CommandRecord): StoredRecord {
  return {
    command: record.command,
    output: record.output,
    exit_code: record.exitCode,
    timestamp: record.timestamp,
  };
}

function atomicWrite(path: string, text: string): void {
  const tmpPath = `${path}.${process.pid}.tmp`;
  writeFileSync(tmpPath, text, "utf8");
  renameSync(tmpPath, path);
}

/**
 * File-backed store for the most recent command of each named session plus a
 * short FIFO of earlier ones. Output is stored exactly as given; trimming is
 * the caller's job.
 *
 * Unreadable, malformed or expired files read as an empty session.
 */
export class SessionStore {
  private readonly dir: string;
  private readonly historySize: number;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private readonly readTextFile: (path: string) => string;
  private readonly writeTextFile: (path: string, text: string) => void;
  private readonly removeFile: (path: string) => void;

  constructor(options: SessionStoreOptions) {
    this.dir = options.dir;
    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? (() => new Date());
    this.readTextFile = options.readTextFile ?? ((path) => readFileSync(path, "utf8"));
    this.writeTextFile =
      options.writeTextFile ??
      ((path, text) => {
        mkdirSync(this.dir, { recursive: true });
        atomicWrite(path, text);
      });
    this.removeFile = options.removeFile ?? ((path) => rmSync(path, { force: true }));
  }

  pathFor(sessionName: string): string {
    if (!isValidSessionName(sessionName)) {
      throw new ConfigurationError(
        `Invalid session name: "${sessionName}"`,
        "Session names may only contain letters, digits, '-' and '_' (max 64 characters)."
      );
    }
    return join(this.dir, `${sessionName}.json`);
  }

  save(sessionName: string, command: string, output: string, exitCode: number): CommandRecord {
    const path = this.pathFor(sessionName);
    const record: CommandRecord = {
      command,
      output,
      exitCode,
      timestamp: this.now().toISOString(),
    };

    const existing = this.read(sessionName);
    const history = [...(existing?.history ?? []), toStored(record)].slice(-this.historySize);

    const file: SessionFile = { version: 1, current: toStored(record), history };
    this.writeTextFile(path, JSON.stringify(file, null, 2) + "\n");
    return record;
  }

  loadCurrent(sessionName: string): CommandRecord | null {
    const file = this.read(sessionName);
    return file?.current ? toRecord(file.current) : null;
  }

  loadHistory(sessionName: string): CommandRecord[] {
    const file = this.read(sessionName);
    return (file?.history ?? []).slice(-this.historySize).map(toRecord);
  }

  clear(sessionName: string): void {
    this.removeFile(this.pathFor(sessionName));
  }

  private read(sessionName: string): SessionFile | null {
    const path = this.pathFor(sessionName);

    let raw: string;
    try {
      raw = this.readTextFile(path);
    } catch {
      return null;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = SessionFileSchema.safeParse(parsedJson);
    if (!parsed.success) {
      return null;
    }

    if (this.isExpired(parsed.data)) {
      try {
        this.removeFile(path);
      } catch {
        // An expired file that cannot be removed still reads as empty
      }
      return null;
    }

    return parsed.data;
  }

  private isExpired(file: SessionFile): boolean {
    if (this.ttlMs <= 0) return false;
    const newest = file.current?.timestamp ?? file.history[file.history.length - 1]?.timestamp;
    if (!newest) return false;
    const savedAt = Date.parse(newest);
    if (Number.isNaN(savedAt)) return true;
    return this.now().getTime() - savedAt > this.ttlMs;
  }
}
