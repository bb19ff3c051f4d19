import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryAdapter } from "../adapters/memory";
import { StorageError, ValidationError } from "../errors";
import { FeedbackRegistry } from "../feedback";

const START = Date.parse("2026-02-01T00:00:00.000Z");

describe("FeedbackRegistry", () => {
  let clock: { now: number };
  let storage: MemoryAdapter;
  let registry: FeedbackRegistry;

  beforeEach(() => {
    clock = { now: START };
    storage = new MemoryAdapter();
    registry = new FeedbackRegistry({ storage, now: () => clock.now });
  });

  it("stores sanitized feedback", async () => {
    const record = await registry.submitFeedback({
      agentName: "<Ada>",
      agentType: "GPT",
      issues: "",
      featureRequests: "dark mode & more",
      usabilityRating: 8,
    });

    expect(record).toMatchObject({
      agentName: "&lt;Ada&gt;",
      agentType: "GPT",
      submissionTime: START,
      issues: null,
      featureRequests: "dark mode &amp; more",
      usabilityRating: 8,
      additionalComments: null,
    });
    expect(await storage.listAllFeedback()).toEqual([record]);
  });

  it("is neither deduplicated nor rate-limited", async () => {
    await registry.submitFeedback({ agentName: "Ada" });
    await registry.submitFeedback({ agentName: "Ada" });

    expect(await storage.listAllFeedback()).toHaveLength(2);
  });

  it("rejects a rating outside the scale", async () => {
    await expect(registry.submitFeedback({ agentName: "Ada", usabilityRating: 11 })).rejects.toThrow(
      "Invalid feedback data: usabilityRating: Usability rating must be between 1 and 10"
    );
    await expect(registry.submitFeedback({ agentName: "Ada", usabilityRating: 7.5 })).rejects.toThrow(
      "Invalid feedback data: usabilityRating: Usability rating must be an integer"
    );
    expect(await storage.listAllFeedback()).toEqual([]);
  });

  it("requires an agent name", async () => {
    const err = await registry.submitFeedback({ agentName: "" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ field: "agentName", message: "Invalid feedback data: agentName: Agent name is required" });
  });

  it("lists newest first with a clamped limit", async () => {
    for (let i = 0; i < 3; i++) {
      clock.now = START + i * 1000;
      await registry.submitFeedback({ agentName: `agent-${i}` });
    }

    expect((await registry.listFeedback()).map((f) => f.agentName)).toEqual(["agent-2", "agent-1", "agent-0"]);
    expect(await registry.listFeedback(0)).toHaveLength(1);
  });

  it("evicts the oldest entries past the retention ceiling", async () => {
    registry = new FeedbackRegistry({ storage, now: () => clock.now, policy: { maxRecords: 2 } });

    for (let i = 0; i < 3; i++) {
      clock.now = START + i * 1000;
      await registry.submitFeedback({ agentName: `agent-${i}` });
    }

    expect((await storage.listAllFeedback()).map((f) => f.agentName)).toEqual(["agent-1", "agent-2"]);
  });

  it("wraps backend errors in StorageError", async () => {
    class BrokenInsert extends MemoryAdapter {
      async insertFeedback(): Promise<void> {
        throw new Error("disk full");
      }
    }
    const logger = vi.fn();
    registry = new FeedbackRegistry({ storage: new BrokenInsert(), logger });

    const err = await registry.submitFeedback({ agentName: "Ada" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ message: "Storage failure during submit_feedback" });
    expect(logger).toHaveBeenCalledWith("storage_failure", {
      operation: "submit_feedback",
      error: "Error: disk full",
    });
  });
});
