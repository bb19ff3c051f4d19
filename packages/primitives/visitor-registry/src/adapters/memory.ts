import { ReadWriteLock } from "../lock";
import type { StorageAdapter, VisitorTransaction } from "../storage/types";
import { VisitorSet } from "../storage/visitor-set";
import type { FeedbackRecord, VisitorRecord } from "../types";
import { byTimeDesc, evictOldest } from "../utils";

interface MemoryOptions {
  visitors?: VisitorRecord[];
  feedback?: FeedbackRecord[];
}

const submissionTimeOf = (record: FeedbackRecord) => record.submissionTime;

/**
 * Process-local adapter. Transactions serialize on a single lock regardless
 * of scope.
 */
export class MemoryAdapter implements StorageAdapter {
  private visitors: VisitorSet;
  private feedback: FeedbackRecord[];
  private readonly lock = new ReadWriteLock();

  constructor(options?: MemoryOptions) {
    this.visitors = new VisitorSet(options?.visitors);
    this.feedback = (options?.feedback ?? []).map((record) => ({ ...record }));
  }

  async init(): Promise<void> {}

  async findByIdentity(name: string, agentType: string | null): Promise<VisitorRecord | null> {
    return this.lock.read(() => this.visitors.findByIdentity(name, agentType));
  }

  async findByNameSince(name: string, since: number): Promise<VisitorRecord[]> {
    return this.lock.read(() => this.visitors.findByNameSince(name, since));
  }

  async findById(id: string): Promise<VisitorRecord | null> {
    return this.lock.read(async () => this.visitors.findById(id));
  }

  async upsert(record: VisitorRecord): Promise<void> {
    await this.lock.write(() => this.visitors.upsert(record));
  }

  async listRecent(limit: number): Promise<VisitorRecord[]> {
    return this.lock.read(async () => this.visitors.listRecent(limit));
  }

  async listAllVisitors(): Promise<VisitorRecord[]> {
    return this.lock.read(async () => this.visitors.records());
  }

  async trimToCapacity(maxRecords: number): Promise<number> {
    return this.lock.write(async () => this.visitors.trim(maxRecords));
  }

  async transaction<T>(_scope: string, work: (tx: VisitorTransaction) => Promise<T>): Promise<T> {
    return this.lock.write(async () => {
      const staged = this.visitors.fork();
      const result = await work(staged);
      if (staged.changed) {
        this.visitors = staged;
      }
      return result;
    });
  }

  async insertFeedback(record: FeedbackRecord): Promise<void> {
    await this.lock.write(async () => {
      this.feedback.push({ ...record });
    });
  }

  async listRecentFeedback(limit: number): Promise<FeedbackRecord[]> {
    return this.lock.read(async () =>
      [...this.feedback]
        .sort(byTimeDesc(submissionTimeOf))
        .slice(0, Math.max(0, limit))
        .map((record) => ({ ...record }))
    );
  }

  async listAllFeedback(): Promise<FeedbackRecord[]> {
    return this.lock.read(async () => this.feedback.map((record) => ({ ...record })));
  }

  async trimFeedbackToCapacity(maxRecords: number): Promise<number> {
    return this.lock.write(async () => {
      const { kept, removed } = evictOldest(this.feedback, maxRecords, submissionTimeOf);
      this.feedback = kept;
      return removed;
    });
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {}
}
