import { randomUUID } from "node:crypto";
import { StorageError, isDomainError } from "./errors";
import { feedbackRequestSchema, validationErrorFrom } from "./schema";
import type { StorageAdapter } from "./storage/types";
import type { FeedbackPolicy, FeedbackRecord, FeedbackRegistryConfig, FeedbackRequest, Logger } from "./types";
import { clampLimit, now, sanitizeOptional, sanitizeText } from "./utils";

export const DEFAULT_FEEDBACK_POLICY: FeedbackPolicy = {
  maxNameLength: 100,
  maxTextLength: 2000,
  minRating: 1,
  maxRating: 10,
  maxRecords: 1000,
};

/**
 * Append-only feedback log. Same storage and sanitization as visitors, with
 * no identity dedup and no rate limit.
 */
export class FeedbackRegistry {
  private readonly storage: StorageAdapter;
  private readonly policy: FeedbackPolicy;
  private readonly logger?: Logger;
  private readonly clock: () => number;
  private readonly generateId: () => string;

  constructor(config: FeedbackRegistryConfig) {
    this.storage = config.storage;
    this.policy = { ...DEFAULT_FEEDBACK_POLICY, ...(config.policy ?? {}) };
    this.logger = config.logger;
    this.clock = config.now ?? now;
    this.generateId = config.generateId ?? randomUUID;
  }

  /**
   * @throws {ValidationError} Input is malformed or oversized; nothing was written.
   * @throws {StorageError} The backend failed.
   */
  async submitFeedback(request: FeedbackRequest): Promise<FeedbackRecord> {
    const parsed = feedbackRequestSchema(this.policy).safeParse(request);
    if (!parsed.success) {
      throw validationErrorFrom("feedback", parsed.error);
    }

    const { maxNameLength, maxTextLength } = this.policy;
    const record: FeedbackRecord = {
      id: this.generateId(),
      agentName: sanitizeText(parsed.data.agentName, maxNameLength),
      agentType: sanitizeOptional(parsed.data.agentType, maxNameLength),
      submissionTime: this.clock(),
      issues: sanitizeOptional(parsed.data.issues, maxTextLength),
      featureRequests: sanitizeOptional(parsed.data.featureRequests, maxTextLength),
      usabilityRating: parsed.data.usabilityRating ?? null,
      additionalComments: sanitizeOptional(parsed.data.additionalComments, maxTextLength),
    };

    await this.guard("submit_feedback", () => this.storage.insertFeedback(record));

    try {
      await this.storage.trimFeedbackToCapacity(this.policy.maxRecords);
    } catch (err) {
      this.logger?.("trim_failed", { error: String(err) });
    }

    this.logger?.("feedback_recorded", { id: record.id });
    return record;
  }

  /** Newest first; `limit` defaults to 10 and is clamped into [1, 100]. */
  async listFeedback(limit?: number): Promise<FeedbackRecord[]> {
    return this.guard("list_feedback", () => this.storage.listRecentFeedback(clampLimit(limit, 10, 100)));
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      this.logger?.("storage_failure", { operation, error: String(err) });
      if (isDomainError(err)) throw err;
      throw new StorageError(`Storage failure during ${operation}`, undefined, err);
    }
  }
}
