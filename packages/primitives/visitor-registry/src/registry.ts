import { randomUUID } from "node:crypto";
import { EventEmitter } from "./events";
import { RateLimitError, StorageError, isDomainError } from "./errors";
import { validationErrorFrom, visitRequestSchema } from "./schema";
import type { StorageAdapter } from "./storage/types";
import type {
  AnswerMap,
  AnswerValue,
  Logger,
  VisitRequest,
  VisitorPolicy,
  VisitorRecord,
  VisitorRegistryConfig,
  VisitorRegistryEvents,
} from "./types";
import { clampLimit, now, sanitizeOptional, sanitizeText } from "./utils";

export const DEFAULT_VISITOR_POLICY: VisitorPolicy = {
  maxNameLength: 100,
  maxFieldLength: 500,
  maxAnswerKeyLength: 50,
  maxAnswerValueLength: 500,
  maxAnswersSize: 2000,
  rateLimitWindowMs: 60 * 60 * 1000,
  maxRecords: 1000,
};

const DEFAULT_LIST_LIMIT = 10;
const MAX_LIST_LIMIT = 100;

export const RATE_LIMIT_MESSAGE = "Rate limit exceeded. Please wait at least one hour between visits.";

/**
 * VisitorRegistry records visits to the guestbook. A visitor is identified by
 * the exact `(name, agentType)` pair; repeat visits bump `visitCount` on the
 * same record. Admission is rate-limited per name alone, so switching agent
 * type inside the window does not get a caller through.
 *
 * Rate-limit and identity state is always read from storage, never cached,
 * so every worker sharing a backend sees the same answer.
 *
 * @example
 * ```typescript
 * const registry = new VisitorRegistry({ storage: new FileAdapter({ directory: "data" }) });
 * const record = await registry.registerVisit({ name: "Ada", agentType: "GPT", answers: { q: "x" } });
 * ```
 */
export class VisitorRegistry {
  private readonly storage: StorageAdapter;
  private readonly policy: VisitorPolicy;
  private readonly logger?: Logger;
  private readonly clock: () => number;
  private readonly generateId: () => string;
  private readonly events: EventEmitter<VisitorRegistryEvents>;

  constructor(config: VisitorRegistryConfig) {
    this.storage = config.storage;
    this.policy = { ...DEFAULT_VISITOR_POLICY, ...(config.policy ?? {}) };
    this.logger = config.logger;
    this.clock = config.now ?? now;
    this.generateId = config.generateId ?? randomUUID;
    this.events = new EventEmitter(config.logger);
  }

  /**
   * Subscribes to registry events.
   *
   * @returns Unsubscribe function
   */
  on<K extends keyof VisitorRegistryEvents>(
    event: K,
    handler: (payload: VisitorRegistryEvents[K]) => void
  ): () => void {
    return this.events.on(event, handler);
  }

  /**
   * Validates, sanitizes and records one visit.
   *
   * The rate-limit check, identity lookup and write run inside one storage
   * transaction scoped to the sanitized name. Retention trimming runs after
   * the visit is durable; a failed trim is logged, not raised.
   *
   * @throws {ValidationError} Input is malformed or oversized; nothing was written.
   * @throws {RateLimitError} The name was admitted within the rate-limit window.
   * @throws {StorageError} The backend failed.
   */
  async registerVisit(request: VisitRequest): Promise<VisitorRecord> {
    const parsed = visitRequestSchema(this.policy).safeParse(request);
    if (!parsed.success) {
      throw validationErrorFrom("visitor", parsed.error);
    }

    const name = sanitizeText(parsed.data.name, this.policy.maxNameLength);
    const agentType = sanitizeOptional(parsed.data.agentType, this.policy.maxFieldLength);
    const purpose = sanitizeOptional(parsed.data.purpose, this.policy.maxFieldLength);
    const answers = this.sanitizeAnswers(parsed.data.answers);

    const { record, isNew } = await this.guard("register_visit", () =>
      this.storage.transaction(name, async (tx) => {
        const visitTime = this.clock();

        const recent = await tx.findByNameSince(name, visitTime - this.policy.rateLimitWindowMs);
        if (recent.length > 0) {
          throw new RateLimitError(RATE_LIMIT_MESSAGE, this.policy.rateLimitWindowMs);
        }

        const existing = await tx.findByIdentity(name, agentType);
        const next: VisitorRecord = existing
          ? {
              ...existing,
              purpose,
              visitTime,
              visitCount: existing.visitCount + 1,
              answers,
            }
          : {
              id: this.generateId(),
              name,
              agentType,
              purpose,
              visitTime,
              visitCount: 1,
              answers,
            };

        await tx.upsert(next);
        return { record: next, isNew: !existing };
      })
    ).catch((err: unknown) => {
      if (err instanceof RateLimitError) {
        this.logger?.("visit_rate_limited", { name, agentType });
        this.events.emit("rate_limited", { name, agentType });
      }
      throw err;
    });

    await this.trim();

    this.logger?.("visit_recorded", { id: record.id, visitCount: record.visitCount, isNew });
    this.events.emit("visit", { record, isNew });
    return record;
  }

  /**
   * Most recent visitors first. `limit` defaults to 10 and is clamped into [1, 100].
   */
  async listVisitors(limit?: number): Promise<VisitorRecord[]> {
    const clamped = clampLimit(limit, DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
    return this.guard("list_visitors", () => this.storage.listRecent(clamped));
  }

  async getVisitor(id: string): Promise<VisitorRecord | null> {
    return this.guard("get_visitor", () => this.storage.findById(id));
  }

  private sanitizeAnswers(raw: Record<string, AnswerValue> | null | undefined): AnswerMap {
    const answers: AnswerMap = {};
    for (const [key, value] of Object.entries(raw ?? {})) {
      const sanitizedKey = sanitizeText(key, this.policy.maxAnswerKeyLength);
      answers[sanitizedKey] = sanitizeText(String(value), this.policy.maxAnswerValueLength);
    }
    return answers;
  }

  private async trim() {
    try {
      await this.storage.trimToCapacity(this.policy.maxRecords);
    } catch (err) {
      this.logError("trim_failed", err);
    }
  }

  /**
   * Domain errors pass through; anything else from the backend is logged and
   * surfaced as a StorageError carrying the original as `cause`.
   */
  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (isDomainError(err)) {
        if (err instanceof StorageError) this.logError("storage_failure", err, operation);
        throw err;
      }
      this.logError("storage_failure", err, operation);
      throw new StorageError(`Storage failure during ${operation}`, undefined, err);
    }
  }

  private logError(message: string, error: unknown, operation?: string) {
    if (!this.logger) return;
    const errorInfo: Record<string, unknown> = {};
    if (error instanceof Error) {
      errorInfo.message = error.message;
      errorInfo.name = error.name;
      errorInfo.stack = error.stack;
      if (error.cause !== undefined) errorInfo.cause = String(error.cause);
    } else if (error !== undefined) {
      errorInfo.value = error;
    }
    this.logger(message, operation ? { operation, error: errorInfo } : { error: errorInfo });
  }
}
