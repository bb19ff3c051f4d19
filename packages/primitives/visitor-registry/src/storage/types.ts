import type { FeedbackRecord, VisitorRecord } from "../types";

/**
 * Operations available inside {@link StorageAdapter.transaction}. Calls made
 * through a transaction observe each other's writes.
 */
export interface VisitorTransaction {
  findByIdentity(name: string, agentType: string | null): Promise<VisitorRecord | null>;
  /** Records with this exact name (any agent type) visited strictly after `since` (Unix ms). */
  findByNameSince(name: string, since: number): Promise<VisitorRecord[]>;
  upsert(record: VisitorRecord): Promise<void>;
}

export interface StorageAdapter extends VisitorTransaction {
  init(): Promise<void>;
  findById(id: string): Promise<VisitorRecord | null>;
  listRecent(limit: number): Promise<VisitorRecord[]>;
  listAllVisitors(): Promise<VisitorRecord[]>;
  /** Evicts the oldest visits until at most `maxRecords` remain; resolves to the number removed. */
  trimToCapacity(maxRecords: number): Promise<number>;
  /**
   * Runs `work` atomically with respect to every other transaction sharing
   * `scope`. Writes made by `work` are discarded if it throws.
   */
  transaction<T>(scope: string, work: (tx: VisitorTransaction) => Promise<T>): Promise<T>;

  insertFeedback(record: FeedbackRecord): Promise<void>;
  listRecentFeedback(limit: number): Promise<FeedbackRecord[]>;
  listAllFeedback(): Promise<FeedbackRecord[]>;
  trimFeedbackToCapacity(maxRecords: number): Promise<number>;

  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
