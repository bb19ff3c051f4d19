import { Pool, type QueryResult } from "pg";
import format from "pg-format";
import { z } from "zod";
import { StorageError } from "../errors";
import type { StorageAdapter, VisitorTransaction } from "../storage/types";
import type { AnswerMap, FeedbackRecord, Logger, VisitorRecord } from "../types";

/** The slice of `pg.PoolClient` the adapter uses. */
export interface PgClient {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  release(): void;
}

/** The slice of `pg.Pool` the adapter uses. */
export interface PgPool {
  connect(): Promise<PgClient>;
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  end(): Promise<void>;
}

export interface PostgresAdapterOptions {
  connectionString?: string;
  pool?: PgPool;
  tableName?: string;
  answersTableName?: string;
  feedbackTableName?: string;
  logger?: Logger;
}

type Operation = "read" | "write" | "delete" | "init";

/**
 * Validates table names to ensure they only contain safe characters.
 * pg-format's %I escapes them again when the SQL is built.
 */
const assertSafeName = (name: string) => {
  if (!/^[a-zA-Z0-9_]+$/.test(name)) {
    throw new Error("Table names must be alphanumeric/underscore");
  }
};

const visitorRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  agent_type: z.string().nullable(),
  purpose: z.string().nullable(),
  visit_time: z.coerce.date(),
  visit_count: z.coerce.number().int(),
});

const answerRowSchema = z.object({
  visitor_id: z.string(),
  key: z.string(),
  value: z.string(),
});

const feedbackRowSchema = z.object({
  id: z.string(),
  agent_name: z.string(),
  agent_type: z.string().nullable(),
  submission_time: z.coerce.date(),
  issues: z.string().nullable(),
  feature_requests: z.string().nullable(),
  usability_rating: z.coerce.number().int().nullable(),
  additional_comments: z.string().nullable(),
});

const VISITOR_COLUMNS = "id, name, agent_type, purpose, visit_time, visit_count";
const FEEDBACK_COLUMNS =
  "id, agent_name, agent_type, submission_time, issues, feature_requests, usability_rating, additional_comments";

/**
 * Normalized relational storage: one `visitors` row per identity and a child
 * `answers` table (cascading delete) replaced wholesale on every write.
 *
 * Transactions take a transaction-scoped advisory lock on their scope, so two
 * registrations for the same name cannot both see "no record" and insert.
 */
export class PostgresAdapter implements StorageAdapter {
  private readonly pool: PgPool;
  private readonly ownsPool: boolean;
  private readonly table: string;
  private readonly answersTable: string;
  private readonly feedbackTable: string;
  private readonly logger?: Logger;

  constructor(options: PostgresAdapterOptions) {
    if (!options.pool && !options.connectionString) {
      throw new Error("PostgresAdapter requires either a pool or connectionString");
    }
    this.pool = options.pool ?? new Pool({ connectionString: options.connectionString });
    this.ownsPool = !options.pool;
    this.table = options.tableName ?? "visitors";
    this.answersTable = options.answersTableName ?? "answers";
    this.feedbackTable = options.feedbackTableName ?? "feedback";
    this.logger = options.logger;
    assertSafeName(this.table);
    assertSafeName(this.answersTable);
    assertSafeName(this.feedbackTable);
  }

  async init(): Promise<void> {
    // Use pg-format's %I for safe identifier escaping
    await this.run(
      this.pool,
      "init",
      format(
        `
        CREATE TABLE IF NOT EXISTS %I (
          id TEXT PRIMARY KEY,
          name TEXT NOT NULL CHECK (char_length(name) <= 100),
          agent_type TEXT CHECK (char_length(agent_type) <= 500),
          purpose TEXT CHECK (char_length(purpose) <= 500),
          visit_time TIMESTAMPTZ NOT NULL DEFAULT now(),
          visit_count INT NOT NULL DEFAULT 1 CHECK (visit_count >= 1)
        );
        CREATE INDEX IF NOT EXISTS %I ON %I (name, visit_time);
        CREATE INDEX IF NOT EXISTS %I ON %I (visit_time);
        CREATE TABLE IF NOT EXISTS %I (
          id BIGSERIAL PRIMARY KEY,
          visitor_id TEXT NOT NULL REFERENCES %I (id) ON DELETE CASCADE,
          key TEXT NOT NULL CHECK (char_length(key) <= 50),
          value TEXT NOT NULL CHECK (char_length(value) <= 500)
        );
        CREATE INDEX IF NOT EXISTS %I ON %I (visitor_id);
        CREATE TABLE IF NOT EXISTS %I (
          id TEXT PRIMARY KEY,
          agent_name TEXT NOT NULL CHECK (char_length(agent_name) <= 100),
          agent_type TEXT,
          submission_time TIMESTAMPTZ NOT NULL DEFAULT now(),
          issues TEXT,
          feature_requests TEXT,
          usability_rating INT CHECK (usability_rating BETWEEN 1 AND 10),
          additional_comments TEXT
        );
        CREATE INDEX IF NOT EXISTS %I ON %I (submission_time);
      `,
        this.table,
        `${this.table}_name_time_idx`,
        this.table,
        `${this.table}_time_idx`,
        this.table,
        this.answersTable,
        this.table,
        `${this.answersTable}_visitor_idx`,
        this.answersTable,
        this.feedbackTable,
        `${this.feedbackTable}_time_idx`,
        this.feedbackTable
      )
    );
  }

  async findByIdentity(name: string, agentType: string | null): Promise<VisitorRecord | null> {
    return this.selectByIdentity(this.pool, name, agentType);
  }

  async findByNameSince(name: string, since: number): Promise<VisitorRecord[]> {
    return this.selectByNameSince(this.pool, name, since);
  }

  async findById(id: string): Promise<VisitorRecord | null> {
    const res = await this.run(
      this.pool,
      "read",
      format(`SELECT ${VISITOR_COLUMNS} FROM %I WHERE id = $1`, this.table),
      [id]
    );
    const [record] = await this.hydrate(this.pool, res.rows);
    return record ?? null;
  }

  async upsert(record: VisitorRecord): Promise<void> {
    await this.withClient(async (client) => {
      await this.writeVisitor(client, record);
    });
  }

  async listRecent(limit: number): Promise<VisitorRecord[]> {
    const res = await this.run(
      this.pool,
      "read",
      format(`SELECT ${VISITOR_COLUMNS} FROM %I ORDER BY visit_time DESC, id ASC LIMIT $1`, this.table),
      [Math.max(0, limit)]
    );
    return this.hydrate(this.pool, res.rows);
  }

  async listAllVisitors(): Promise<VisitorRecord[]> {
    const res = await this.run(
      this.pool,
      "read",
      format(`SELECT ${VISITOR_COLUMNS} FROM %I ORDER BY visit_time ASC, id ASC`, this.table)
    );
    return this.hydrate(this.pool, res.rows);
  }

  async trimToCapacity(maxRecords: number): Promise<number> {
    // Answers go with their visitor through ON DELETE CASCADE.
    const res = await this.run(
      this.pool,
      "delete",
      format(
        `DELETE FROM %I WHERE id IN (
           SELECT id FROM %I ORDER BY visit_time DESC, id ASC OFFSET $1
         )`,
        this.table,
        this.table
      ),
      [Math.max(0, maxRecords)]
    );
    const removed = res.rowCount ?? 0;
    if (removed > 0) this.logger?.("visitors_trimmed", { removed, maxRecords });
    return removed;
  }

  async transaction<T>(scope: string, work: (tx: VisitorTransaction) => Promise<T>): Promise<T> {
    return this.withClient(async (client) => {
      await this.run(client, "write", "SELECT pg_advisory_xact_lock(hashtext($1))", [`${this.table}:${scope}`]);
      return work({
        findByIdentity: (name, agentType) => this.selectByIdentity(client, name, agentType),
        findByNameSince: (name, since) => this.selectByNameSince(client, name, since),
        upsert: (record) => this.writeVisitor(client, record),
      });
    });
  }

  async insertFeedback(record: FeedbackRecord): Promise<void> {
    await this.run(
      this.pool,
      "write",
      format(`INSERT INTO %I (${FEEDBACK_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`, this.feedbackTable),
      [
        record.id,
        record.agentName,
        record.agentType,
        new Date(record.submissionTime),
        record.issues,
        record.featureRequests,
        record.usabilityRating,
        record.additionalComments,
      ]
    );
  }

  async listRecentFeedback(limit: number): Promise<FeedbackRecord[]> {
    const res = await this.run(
      this.pool,
      "read",
      format(
        `SELECT ${FEEDBACK_COLUMNS} FROM %I ORDER BY submission_time DESC, id ASC LIMIT $1`,
        this.feedbackTable
      ),
      [Math.max(0, limit)]
    );
    return res.rows.map(toFeedbackRecord);
  }

  async listAllFeedback(): Promise<FeedbackRecord[]> {
    const res = await this.run(
      this.pool,
      "read",
      format(`SELECT ${FEEDBACK_COLUMNS} FROM %I ORDER BY submission_time ASC, id ASC`, this.feedbackTable)
    );
    return res.rows.map(toFeedbackRecord);
  }

  async trimFeedbackToCapacity(maxRecords: number): Promise<number> {
    const res = await this.run(
      this.pool,
      "delete",
      format(
        `DELETE FROM %I WHERE id IN (
           SELECT id FROM %I ORDER BY submission_time DESC, id ASC OFFSET $1
         )`,
        this.feedbackTable,
        this.feedbackTable
      ),
      [Math.max(0, maxRecords)]
    );
    return res.rowCount ?? 0;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await this.pool.query("SELECT 1");
      return res.rowCount === 1;
    } catch (err) {
      this.logger?.("health_check_failed", { error: String(err) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end();
    }
  }

  private async selectByIdentity(
    db: PgClient | PgPool,
    name: string,
    agentType: string | null
  ): Promise<VisitorRecord | null> {
    const res = await this.run(
      db,
      "read",
      format(
        `SELECT ${VISITOR_COLUMNS} FROM %I
         WHERE name = $1 AND agent_type IS NOT DISTINCT FROM $2
         ORDER BY visit_time DESC, id ASC
         LIMIT 1`,
        this.table
      ),
      [name, agentType]
    );
    const [record] = await this.hydrate(db, res.rows);
    return record ?? null;
  }

  private async selectByNameSince(db: PgClient | PgPool, name: string, since: number): Promise<VisitorRecord[]> {
    const res = await this.run(
      db,
      "read",
      format(
        `SELECT ${VISITOR_COLUMNS} FROM %I WHERE name = $1 AND visit_time > $2 ORDER BY visit_time DESC, id ASC`,
        this.table
      ),
      [name, new Date(since)]
    );
    return this.hydrate(db, res.rows);
  }

  /** Record and answers in one statement sequence; callers supply the transaction. */
  private async writeVisitor(client: PgClient, record: VisitorRecord): Promise<void> {
    await this.run(
      client,
      "write",
      format(
        `INSERT INTO %I (${VISITOR_COLUMNS})
           VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (id) DO UPDATE
           SET name = EXCLUDED.name,
               agent_type = EXCLUDED.agent_type,
               purpose = EXCLUDED.purpose,
               visit_time = EXCLUDED.visit_time,
               visit_count = EXCLUDED.visit_count`,
        this.table
      ),
      [record.id, record.name, record.agentType, record.purpose, new Date(record.visitTime), record.visitCount]
    );
    await this.run(client, "write", format(`DELETE FROM %I WHERE visitor_id = $1`, this.answersTable), [record.id]);
    for (const [key, value] of Object.entries(record.answers)) {
      await this.run(
        client,
        "write",
        format(`INSERT INTO %I (visitor_id, key, value) VALUES ($1, $2, $3)`, this.answersTable),
        [record.id, key, value]
      );
    }
  }

  private async hydrate(db: PgClient | PgPool, rows: unknown[]): Promise<VisitorRecord[]> {
    const visitors = rows.map((row) => visitorRowSchema.parse(row));
    if (visitors.length === 0) return [];

    const res = await this.run(
      db,
      "read",
      format(`SELECT visitor_id, key, value FROM %I WHERE visitor_id = ANY($1) ORDER BY id ASC`, this.answersTable),
      [visitors.map((v) => v.id)]
    );
    const answersById = new Map<string, AnswerMap>();
    for (const row of res.rows) {
      const answer = answerRowSchema.parse(row);
      const answers = answersById.get(answer.visitor_id) ?? {};
      answers[answer.key] = answer.value;
      answersById.set(answer.visitor_id, answers);
    }

    return visitors.map((v) => ({
      id: v.id,
      name: v.name,
      agentType: v.agent_type,
      purpose: v.purpose,
      visitTime: v.visit_time.getTime(),
      visitCount: v.visit_count,
      answers: answersById.get(v.id) ?? {},
    }));
  }

  private async withClient<T>(work: (client: PgClient) => Promise<T>): Promise<T> {
    let client: PgClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StorageError("Failed to acquire a database connection", "read", err);
    }

    try {
      await this.run(client, "write", "BEGIN");
      const result = await work(client);
      await this.run(client, "write", "COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        this.logger?.("rollback_failed", { error: String(rollbackErr) });
      }
      throw err;
    } finally {
      client.release();
    }
  }

  private async run(
    db: PgClient | PgPool,
    operation: Operation,
    sql: string,
    values?: unknown[]
  ): Promise<QueryResult> {
    try {
      return await db.query(sql, values);
    } catch (err) {
      throw new StorageError(`Database ${operation} failed`, operation, err);
    }
  }
}

function toFeedbackRecord(row: unknown): FeedbackRecord {
  const parsed = feedbackRowSchema.parse(row);
  return {
    id: parsed.id,
    agentName: parsed.agent_name,
    agentType: parsed.agent_type,
    submissionTime: parsed.submission_time.getTime(),
    issues: parsed.issues,
    featureRequests: parsed.feature_requests,
    usabilityRating: parsed.usability_rating,
    additionalComments: parsed.additional_comments,
  };
}
