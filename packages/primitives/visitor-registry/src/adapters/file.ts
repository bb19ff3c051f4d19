import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z, type ZodTypeAny } from "zod";
import { StorageError } from "../errors";
import { lockFor, type ReadWriteLock } from "../lock";
import { storedFeedbackSchema, storedVisitorSchema, toStoredFeedback, toStoredVisitor } from "../schema";
import type { StorageAdapter, VisitorTransaction } from "../storage/types";
import { VisitorSet } from "../storage/visitor-set";
import type { FeedbackRecord, Logger, VisitorRecord } from "../types";
import { byTimeDesc, evictOldest } from "../utils";

export interface FileAdapterOptions {
  /** Directory holding the documents. Defaults to `data`. */
  directory?: string;
  visitorsFile?: string;
  feedbackFile?: string;
  logger?: Logger;
}

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

const submissionTimeOf = (record: FeedbackRecord) => record.submissionTime;

/**
 * Stores each collection as one JSON array on disk. Reads hold a shared lock,
 * and every write holds the exclusive lock across a full read-modify-write of
 * the document, which is replaced through a temp file and rename.
 *
 * All writers in the process serialize on the document lock, whatever the
 * transaction scope; this is sized for a few thousand records at most.
 */
export class FileAdapter implements StorageAdapter {
  readonly visitorsPath: string;
  readonly feedbackPath: string;
  private readonly visitorsLock: ReadWriteLock;
  private readonly feedbackLock: ReadWriteLock;
  private readonly logger?: Logger;

  constructor(options: FileAdapterOptions = {}) {
    const directory = options.directory ?? "data";
    this.visitorsPath = resolve(directory, options.visitorsFile ?? "visitors.json");
    this.feedbackPath = resolve(directory, options.feedbackFile ?? "feedback.json");
    this.visitorsLock = lockFor(this.visitorsPath);
    this.feedbackLock = lockFor(this.feedbackPath);
    this.logger = options.logger;
  }

  async init(): Promise<void> {
    await this.visitorsLock.write(() => this.ensureDocument(this.visitorsPath));
    await this.feedbackLock.write(() => this.ensureDocument(this.feedbackPath));
  }

  async findByIdentity(name: string, agentType: string | null): Promise<VisitorRecord | null> {
    return this.visitorsLock.read(async () => (await this.loadVisitors()).findByIdentity(name, agentType));
  }

  async findByNameSince(name: string, since: number): Promise<VisitorRecord[]> {
    return this.visitorsLock.read(async () => (await this.loadVisitors()).findByNameSince(name, since));
  }

  async findById(id: string): Promise<VisitorRecord | null> {
    return this.visitorsLock.read(async () => (await this.loadVisitors()).findById(id));
  }

  async upsert(record: VisitorRecord): Promise<void> {
    await this.transaction(record.name, (tx) => tx.upsert(record));
  }

  async listRecent(limit: number): Promise<VisitorRecord[]> {
    return this.visitorsLock.read(async () => (await this.loadVisitors()).listRecent(limit));
  }

  async listAllVisitors(): Promise<VisitorRecord[]> {
    return this.visitorsLock.read(async () => (await this.loadVisitors()).records());
  }

  async trimToCapacity(maxRecords: number): Promise<number> {
    return this.visitorsLock.write(async () => {
      const visitors = await this.loadVisitors();
      const removed = visitors.trim(maxRecords);
      if (removed > 0) {
        await this.saveVisitors(visitors);
        this.logger?.("visitors_trimmed", { removed, maxRecords });
      }
      return removed;
    });
  }

  async transaction<T>(_scope: string, work: (tx: VisitorTransaction) => Promise<T>): Promise<T> {
    return this.visitorsLock.write(async () => {
      const visitors = await this.loadVisitors();
      const result = await work(visitors);
      if (visitors.changed) {
        await this.saveVisitors(visitors);
      }
      return result;
    });
  }

  async insertFeedback(record: FeedbackRecord): Promise<void> {
    await this.feedbackLock.write(async () => {
      const feedback = await this.loadFeedback();
      feedback.push({ ...record });
      await this.saveFeedback(feedback);
    });
  }

  async listRecentFeedback(limit: number): Promise<FeedbackRecord[]> {
    return this.feedbackLock.read(async () =>
      (await this.loadFeedback()).sort(byTimeDesc(submissionTimeOf)).slice(0, Math.max(0, limit))
    );
  }

  async listAllFeedback(): Promise<FeedbackRecord[]> {
    return this.feedbackLock.read(() => this.loadFeedback());
  }

  async trimFeedbackToCapacity(maxRecords: number): Promise<number> {
    return this.feedbackLock.write(async () => {
      const { kept, removed } = evictOldest(await this.loadFeedback(), maxRecords, submissionTimeOf);
      if (removed > 0) {
        await this.saveFeedback(kept);
        this.logger?.("feedback_trimmed", { removed, maxRecords });
      }
      return removed;
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.visitorsLock.read(() => this.loadVisitors());
      return true;
    } catch (err) {
      this.logger?.("health_check_failed", { path: this.visitorsPath, error: String(err) });
      return false;
    }
  }

  async close(): Promise<void> {}

  private async loadVisitors(): Promise<VisitorSet> {
    return new VisitorSet(await this.readDocument(this.visitorsPath, storedVisitorSchema));
  }

  private async saveVisitors(visitors: VisitorSet): Promise<void> {
    await this.writeDocument(this.visitorsPath, visitors.records().map(toStoredVisitor));
  }

  private async loadFeedback(): Promise<FeedbackRecord[]> {
    return this.readDocument(this.feedbackPath, storedFeedbackSchema);
  }

  private async saveFeedback(feedback: FeedbackRecord[]): Promise<void> {
    await this.writeDocument(this.feedbackPath, feedback.map(toStoredFeedback));
  }

  private async ensureDocument(path: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, "[]", { encoding: "utf-8", flag: "wx" });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") return;
      throw new StorageError(`Failed to initialize ${path}`, "init", err);
    }
  }

  private async readDocument<TSchema extends ZodTypeAny>(
    path: string,
    itemSchema: TSchema
  ): Promise<Array<z.output<TSchema>>> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new StorageError(`Failed to read ${path}`, "read", err);
    }

    let json: unknown;
    try {
      json = raw.trim() === "" ? [] : JSON.parse(raw);
    } catch (err) {
      throw new StorageError(`Document ${path} is not valid JSON`, "read", err);
    }

    const parsed = z.array(itemSchema).safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Document ${path} does not match the expected shape`, "read", parsed.error);
    }
    return parsed.data;
  }

  private async writeDocument(path: string, items: unknown[]): Promise<void> {
    const tmpPath = join(dirname(path), `.${randomUUID()}.tmp`);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(items, null, 2), "utf-8");
      await rename(tmpPath, path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw new StorageError(`Failed to write ${path}`, "write", err);
    }
  }
}
