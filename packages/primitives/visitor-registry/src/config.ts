import { z } from "zod";
import { FileAdapter } from "./adapters/file";
import { MemoryAdapter } from "./adapters/memory";
import { PostgresAdapter } from "./adapters/postgres";
import { ValidationError } from "./errors";
import { FeedbackRegistry } from "./feedback";
import { createHandlers, type Handlers } from "./handlers";
import { VisitorRegistry } from "./registry";
import { toFieldIssues } from "./schema";
import type { StorageAdapter } from "./storage/types";
import type { FeedbackPolicy, Logger, VisitorPolicy } from "./types";

export type StorageConfig =
  | { kind: "file"; directory: string }
  | { kind: "postgres"; connectionString: string }
  | { kind: "memory" };

export interface GuestbookConfig {
  storage: StorageConfig;
  visitorPolicy: Partial<VisitorPolicy>;
  feedbackPolicy: Partial<FeedbackPolicy>;
}

const envSchema = z
  .object({
    STORAGE_BACKEND: z.enum(["file", "postgres", "memory"]).default("file"),
    DATA_DIR: z.string().min(1).default("data"),
    DATABASE_URL: z.string().min(1).optional(),
    VISITOR_MAX_RECORDS: z.coerce.number().int().positive().default(1000),
    FEEDBACK_MAX_RECORDS: z.coerce.number().int().positive().default(1000),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORAGE_BACKEND=postgres",
      });
    }
  });

/**
 * Reads configuration from environment variables.
 *
 * @throws {ValidationError} When a variable is present but invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GuestbookConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = toFieldIssues(parsed.error);
    throw new ValidationError(
      `Invalid configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues[0]?.field,
      { issues }
    );
  }

  const { STORAGE_BACKEND, DATA_DIR, DATABASE_URL } = parsed.data;
  let storage: StorageConfig;
  if (STORAGE_BACKEND === "postgres" && DATABASE_URL) {
    storage = { kind: "postgres", connectionString: DATABASE_URL };
  } else if (STORAGE_BACKEND === "memory") {
    storage = { kind: "memory" };
  } else {
    storage = { kind: "file", directory: DATA_DIR };
  }

  return {
    storage,
    visitorPolicy: {
      maxRecords: parsed.data.VISITOR_MAX_RECORDS,
      rateLimitWindowMs: parsed.data.RATE_LIMIT_WINDOW_MS,
    },
    feedbackPolicy: { maxRecords: parsed.data.FEEDBACK_MAX_RECORDS },
  };
}

export function createStorage(config: StorageConfig, logger?: Logger): StorageAdapter {
  switch (config.kind) {
    case "file":
      return new FileAdapter({ directory: config.directory, logger });
    case "postgres":
      return new PostgresAdapter({ connectionString: config.connectionString, logger });
    case "memory":
      return new MemoryAdapter();
  }
}

export interface Guestbook {
  storage: StorageAdapter;
  visitors: VisitorRegistry;
  feedback: FeedbackRegistry;
  handlers: Handlers;
}

/**
 * Wires the selected adapter, both registries and the request handlers, and
 * initializes storage.
 */
export async function createGuestbook(config: GuestbookConfig, logger?: Logger): Promise<Guestbook> {
  const storage = createStorage(config.storage, logger);
  await storage.init();
  const visitors = new VisitorRegistry({ storage, policy: config.visitorPolicy, logger });
  const feedback = new FeedbackRegistry({ storage, policy: config.feedbackPolicy, logger });
  return { storage, visitors, feedback, handlers: createHandlers({ visitors, feedback, logger }) };
}
