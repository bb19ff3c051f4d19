import type { StorageAdapter } from "./storage/types";
import type { Logger } from "./types";

export interface MigrationOptions {
  from: StorageAdapter;
  to: StorageAdapter;
  logger?: Logger;
}

export interface MigrationResult {
  visitors: number;
  feedback: number;
  failed: number;
}

/**
 * Copies every visitor and feedback entry from one adapter into another,
 * keeping ids, counts, timestamps and answers. Visitors are upserted, so
 * re-running is safe; feedback already present in the target is skipped.
 * A record that fails to copy is logged and counted in `failed`.
 */
export async function migrateStorage({ from, to, logger }: MigrationOptions): Promise<MigrationResult> {
  await to.init();
  const result: MigrationResult = { visitors: 0, feedback: 0, failed: 0 };

  for (const visitor of await from.listAllVisitors()) {
    try {
      await to.upsert(visitor);
      result.visitors += 1;
    } catch (err) {
      result.failed += 1;
      logger?.("migration_visitor_failed", { id: visitor.id, error: String(err) });
    }
  }

  const existingFeedback = new Set((await to.listAllFeedback()).map((entry) => entry.id));
  for (const entry of await from.listAllFeedback()) {
    if (existingFeedback.has(entry.id)) continue;
    try {
      await to.insertFeedback(entry);
      result.feedback += 1;
    } catch (err) {
      result.failed += 1;
      logger?.("migration_feedback_failed", { id: entry.id, error: String(err) });
    }
  }

  logger?.("migration_complete", { ...result });
  return result;
}
