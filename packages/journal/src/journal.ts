import { appendFile, readFile, mkdir, truncate, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { OpLogEvent, OpLogEventType } from "@bidmesh/schemas";
import { validateOpLogEventData } from "@bidmesh/schemas";

export interface JournalOptions {
  /** Process label stamped on every event. Default: "bidmesh" */
  source?: string;
  fsync?: boolean;
  /** If true, acquire an advisory lockfile to prevent multi-process corruption. Default: true */
  lock?: boolean;
}

export type JournalListener = (event: OpLogEvent) => void;

/**
 * Append-only operational log. One JSON object per line; never read back for
 * state recovery, only for inspection.
 */
export class Journal {
  private filePath: string;
  private source: string;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private nextSeq = 0;
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.source = options?.source ?? "bidmesh";
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lastNewline = content.lastIndexOf("\n");
    const tail = content.slice(lastNewline + 1);

    // A crash mid-append leaves an unterminated JSON fragment after the last newline.
    // Any other unterminated text is kept and closed off so appends start on a fresh line.
    if (tail.trim().length > 0) {
      if (tail.trimStart().startsWith("{") && parseLine(tail) === undefined) {
        await truncate(this.filePath, Buffer.byteLength(content.slice(0, lastNewline + 1), "utf-8"));
        console.error(`[bidmesh] journal: truncated incomplete last line in ${this.filePath}`);
      } else {
        await appendFile(this.filePath, "\n", "utf-8");
      }
    }

    // Lines that are not journal events (e.g. an older plain-text log) are left alone.
    let maxSeq = -1;
    for (const line of content.split("\n")) {
      const parsed = validateOpLogEventData(parseLine(line));
      if (parsed.valid && parsed.data.seq !== undefined && parsed.data.seq > maxSeq) {
        maxSeq = parsed.data.seq;
      }
    }
    this.nextSeq = maxSeq + 1;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(type: OpLogEventType, payload: Record<string, unknown>): Promise<OpLogEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: OpLogEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        source: this.source,
        type,
        payload,
        seq,
      };

      const validation = validateOpLogEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      this.nextSeq = seq + 1;

      for (const listener of this.listeners) {
        try { listener(event); } catch { /* listeners must not break the journal */ }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like {@link emit}, but a failed write is reported on stderr instead of rejecting. */
  async tryEmit(type: OpLogEventType, payload: Record<string, unknown>): Promise<OpLogEvent | null> {
    try {
      return await this.emit(type, payload);
    } catch (err) {
      console.error(`[bidmesh] journal: failed to write ${type}:`, err instanceof Error ? err.message : err);
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<OpLogEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events: OpLogEvent[] = [];
    for (const line of content.split("\n")) {
      const parsed = validateOpLogEventData(parseLine(line));
      if (parsed.valid) events.push(parsed.data);
    }
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  /** Resolves once every emit issued so far has been written. */
  async flush(): Promise<void> {
    await this.writeLock;
  }

  /**
   * Wait for any pending writes to complete. Call this before process exit
   * to ensure no events are lost.
   */
  async close(): Promise<void> {
    await this.flush();
    if (this.lockEnabled && this.locked) {
      await this.releaseLock();
    }
  }

  /**
   * Register SIGINT/SIGTERM handlers that flush pending writes before exit.
   * Returns a cleanup function to remove the handlers.
   */
  registerShutdownHandler(beforeExit?: () => Promise<void>): () => void {
    const handler = () => {
      const pending = beforeExit ? beforeExit() : Promise.resolve();
      pending
        .catch((err: unknown) => { console.error("[bidmesh] shutdown error:", err); })
        .then(() => this.close())
        .finally(() => process.exit(0));
    };
    process.on("SIGINT", handler);
    process.on("SIGTERM", handler);
    return () => {
      process.off("SIGINT", handler);
      process.off("SIGTERM", handler);
    };
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== "EEXIST") throw err;

      let pid: number;
      try {
        pid = parseInt((await readFile(this.lockPath, "utf-8")).trim(), 10);
      } catch {
        await this.removeStaleLock();
        return this.acquireLock();
      }
      if (isNaN(pid)) {
        await this.removeStaleLock();
        return this.acquireLock();
      }

      try {
        process.kill(pid, 0);
      } catch (killErr: unknown) {
        if (isErrnoException(killErr) && killErr.code === "ESRCH") {
          // Owner is gone
          await this.removeStaleLock();
          return this.acquireLock();
        }
        throw killErr;
      }
      throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
  }

  private async releaseLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch {
      // Lockfile may already be gone
    }
    this.locked = false;
  }

  private async removeStaleLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch {
      // May have been cleaned up by another process
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function parseLine(line: string): unknown {
  if (line.trim().length === 0) return undefined;
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
