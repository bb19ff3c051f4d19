import type { QueryResult } from "pg";
import { describe, expect, it, vi } from "vitest";
import { PostgresAdapter, type PgClient, type PgPool } from "../adapters/postgres";
import { RateLimitError, StorageError } from "../errors";
import type { VisitorRecord } from "../types";

interface Call {
  sql: string;
  values: unknown[];
}

type Reply = { rows?: unknown[]; rowCount?: number } | Error | undefined;

/** Records every statement and answers from a scripted responder. */
class FakePool implements PgPool {
  readonly calls: Call[] = [];
  released = 0;
  ended = false;

  constructor(private readonly responder: (sql: string, values: unknown[]) => Reply = () => undefined) {}

  async connect(): Promise<PgClient> {
    return {
      query: async (text, values) => this.handle(text, values),
      release: () => {
        this.released += 1;
      },
    };
  }

  async query(text: string, values?: unknown[]): Promise<QueryResult> {
    return this.handle(text, values);
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  get statements(): string[] {
    return this.calls.map((call) => call.sql);
  }

  private handle(text: string, values: unknown[] = []): QueryResult {
    const sql = text.replace(/\s+/g, " ").trim();
    this.calls.push({ sql, values });
    const reply = this.responder(sql, values);
    if (reply instanceof Error) throw reply;
    const rows = reply?.rows ?? [];
    return { command: "", oid: 0, fields: [], rows, rowCount: reply?.rowCount ?? rows.length };
  }
}

const START = Date.parse("2026-01-01T00:00:00.000Z");

const record: VisitorRecord = {
  id: "v1",
  name: "Ada",
  agentType: "GPT",
  purpose: null,
  visitTime: START,
  visitCount: 2,
  answers: { q: "x", r: "y" },
};

describe("PostgresAdapter", () => {
  it("rejects unsafe table names", () => {
    expect(() => new PostgresAdapter({ pool: new FakePool(), tableName: "visitors; drop table x" })).toThrow(
      "Table names must be alphanumeric/underscore"
    );
  });

  it("requires a pool or a connection string", () => {
    expect(() => new PostgresAdapter({})).toThrow("PostgresAdapter requires either a pool or connectionString");
  });

  it("creates tables with cascading answers on init", async () => {
    const pool = new FakePool();
    await new PostgresAdapter({ pool }).init();

    expect(pool.statements).toHaveLength(1);
    expect(pool.statements[0]).toContain("CREATE TABLE IF NOT EXISTS visitors");
    expect(pool.statements[0]).toContain("REFERENCES visitors (id) ON DELETE CASCADE");
    expect(pool.statements[0]).toContain("CREATE TABLE IF NOT EXISTS feedback");
  });

  describe("upsert", () => {
    it("writes the record and replaces its answers in one transaction", async () => {
      const pool = new FakePool();
      await new PostgresAdapter({ pool }).upsert(record);

      expect(pool.statements[0]).toBe("BEGIN");
      expect(pool.statements[1]).toMatch(/^INSERT INTO visitors \(.*\) VALUES .* ON CONFLICT \(id\) DO UPDATE/);
      expect(pool.calls[1]?.values).toEqual(["v1", "Ada", "GPT", null, new Date(START), 2]);
      expect(pool.calls[2]).toEqual({ sql: "DELETE FROM answers WHERE visitor_id = $1", values: ["v1"] });
      expect(pool.calls.slice(3, 5)).toEqual([
        { sql: "INSERT INTO answers (visitor_id, key, value) VALUES ($1, $2, $3)", values: ["v1", "q", "x"] },
        { sql: "INSERT INTO answers (visitor_id, key, value) VALUES ($1, $2, $3)", values: ["v1", "r", "y"] },
      ]);
      expect(pool.statements[5]).toBe("COMMIT");
      expect(pool.statements).toHaveLength(6);
      expect(pool.released).toBe(1);
    });

    it("rolls back when an answer insert fails", async () => {
      const pool = new FakePool((sql) =>
        sql.startsWith("INSERT INTO answers") ? new Error("value too long") : undefined
      );

      const err = await new PostgresAdapter({ pool }).upsert(record).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StorageError);
      expect(err).toMatchObject({ message: "Database write failed", operation: "write" });
      expect(pool.statements).toContain("ROLLBACK");
      expect(pool.statements).not.toContain("COMMIT");
      expect(pool.released).toBe(1);
    });

    it("reports a connection failure as StorageError", async () => {
      const pool = new FakePool();
      pool.connect = async () => {
        throw new Error("ECONNREFUSED");
      };

      await expect(new PostgresAdapter({ pool }).upsert(record)).rejects.toThrow(
        "Failed to acquire a database connection"
      );
    });
  });

  describe("transaction", () => {
    it("takes an advisory lock on the scope before running the work", async () => {
      const pool = new FakePool();
      const adapter = new PostgresAdapter({ pool });

      const result = await adapter.transaction("Bob", async (tx) => {
        await tx.findByNameSince("Bob", START);
        return "done";
      });

      expect(result).toBe("done");
      expect(pool.calls[0]?.sql).toBe("BEGIN");
      expect(pool.calls[1]).toEqual({
        sql: "SELECT pg_advisory_xact_lock(hashtext($1))",
        values: ["visitors:Bob"],
      });
      expect(pool.calls[2]?.values).toEqual(["Bob", new Date(START)]);
      expect(pool.statements.at(-1)).toBe("COMMIT");
    });

    it("rethrows the work's error unchanged after rolling back", async () => {
      const pool = new FakePool();
      const limited = new RateLimitError("slow down", 1000);

      const err = await new PostgresAdapter({ pool })
        .transaction("Bob", async () => {
          throw limited;
        })
        .catch((e: unknown) => e);

      expect(err).toBe(limited);
      expect(pool.statements.at(-1)).toBe("ROLLBACK");
    });

    it("logs a failed rollback and keeps the original error", async () => {
      const logger = vi.fn();
      const pool = new FakePool((sql) => (sql === "ROLLBACK" ? new Error("connection lost") : undefined));

      await expect(
        new PostgresAdapter({ pool, logger }).transaction("Bob", async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");
      expect(logger).toHaveBeenCalledWith("rollback_failed", { error: "Error: connection lost" });
    });
  });

  describe("reads", () => {
    const visitorRow = {
      id: "v1",
      name: "Ada",
      agent_type: null,
      purpose: "explore",
      visit_time: new Date(START),
      visit_count: 3,
    };

    it("matches a null agent type with IS NOT DISTINCT FROM and hydrates answers", async () => {
      const pool = new FakePool((sql) => {
        if (sql.startsWith("SELECT id, name")) return { rows: [visitorRow] };
        if (sql.startsWith("SELECT visitor_id")) {
          return { rows: [{ visitor_id: "v1", key: "q", value: "x" }] };
        }
        return undefined;
      });

      const found = await new PostgresAdapter({ pool }).findByIdentity("Ada", null);

      expect(pool.calls[0]?.sql).toContain("agent_type IS NOT DISTINCT FROM $2");
      expect(pool.calls[0]?.values).toEqual(["Ada", null]);
      expect(pool.calls[1]?.values).toEqual([["v1"]]);
      expect(found).toEqual({
        id: "v1",
        name: "Ada",
        agentType: null,
        purpose: "explore",
        visitTime: START,
        visitCount: 3,
        answers: { q: "x" },
      });
    });

    it("skips the answers query when nothing matches", async () => {
      const pool = new FakePool();

      expect(await new PostgresAdapter({ pool }).findByIdentity("Nobody", "GPT")).toBeNull();
      expect(pool.calls).toHaveLength(1);
    });

    it("groups answers by visitor when listing", async () => {
      const pool = new FakePool((sql) => {
        if (sql.startsWith("SELECT id, name")) {
          return {
            rows: [
              { ...visitorRow, id: "v2", visit_time: "2026-01-01T01:00:00.000Z", visit_count: "1" },
              visitorRow,
            ],
          };
        }
        if (sql.startsWith("SELECT visitor_id")) {
          return {
            rows: [
              { visitor_id: "v1", key: "a", value: "1" },
              { visitor_id: "v2", key: "b", value: "2" },
            ],
          };
        }
        return undefined;
      });

      const listed = await new PostgresAdapter({ pool }).listRecent(10);

      expect(pool.calls[0]?.sql).toContain("ORDER BY visit_time DESC, id ASC LIMIT $1");
      expect(listed.map((r) => [r.id, r.visitTime, r.visitCount, r.answers])).toEqual([
        ["v2", START + 60 * 60 * 1000, 1, { b: "2" }],
        ["v1", START, 3, { a: "1" }],
      ]);
    });
  });

  it("trims past the ceiling and reports the number removed", async () => {
    const pool = new FakePool((sql) => (sql.startsWith("DELETE FROM visitors") ? { rowCount: 3 } : undefined));

    expect(await new PostgresAdapter({ pool }).trimToCapacity(1000)).toBe(3);
    expect(pool.calls[0]?.values).toEqual([1000]);
    expect(pool.calls[0]?.sql).toContain("OFFSET $1");
  });

  it("maps feedback rows", async () => {
    const pool = new FakePool(() => ({
      rows: [
        {
          id: "f1",
          agent_name: "Ada",
          agent_type: "GPT",
          submission_time: new Date(START),
          issues: "none",
          feature_requests: null,
          usability_rating: 8,
          additional_comments: null,
        },
      ],
    }));

    expect(await new PostgresAdapter({ pool }).listRecentFeedback(5)).toEqual([
      {
        id: "f1",
        agentName: "Ada",
        agentType: "GPT",
        submissionTime: START,
        issues: "none",
        featureRequests: null,
        usabilityRating: 8,
        additionalComments: null,
      },
    ]);
  });

  it("reports health and closes only pools it created", async () => {
    const pool = new FakePool(() => ({ rows: [{ "?column?": 1 }] }));
    const adapter = new PostgresAdapter({ pool });

    expect(await adapter.healthCheck()).toBe(true);
    await adapter.close();
    expect(pool.ended).toBe(false);
  });

  it("reports unhealthy when the database is unreachable", async () => {
    const pool = new FakePool(() => new Error("ECONNREFUSED"));

    expect(await new PostgresAdapter({ pool }).healthCheck()).toBe(false);
  });
});
