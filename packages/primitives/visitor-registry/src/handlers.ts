import { z } from "zod";
import { RateLimitError, ValidationError } from "./errors";
import type { FeedbackRegistry } from "./feedback";
import type { VisitorRegistry } from "./registry";
import { toStoredFeedback, toStoredVisitor, validationErrorFrom } from "./schema";
import type { Logger } from "./types";

export type ApiErrorCode = "bad_request" | "rate_limited" | "internal";

export type ApiErrorBody = {
  error: ApiErrorCode;
  message: string;
  details?: unknown;
};

export interface HandlerResponse {
  status: number;
  body: unknown;
}

export interface Handlers {
  registerVisit(body: unknown): Promise<HandlerResponse>;
  listVisitors(query: unknown): Promise<HandlerResponse>;
  submitFeedback(body: unknown): Promise<HandlerResponse>;
  listFeedback(query: unknown): Promise<HandlerResponse>;
}

export interface HandlersConfig {
  visitors: VisitorRegistry;
  feedback: FeedbackRegistry;
  logger?: Logger;
}

const answerValue = z.union([z.string(), z.number(), z.boolean()]);

const visitBodySchema = z.object(
  {
    name: z.string({ required_error: "Name is required", invalid_type_error: "Name must be a string" }),
    agent_type: z.string().nullish(),
    purpose: z.string().nullish(),
    answers: z.record(answerValue).nullish(),
  },
  { invalid_type_error: "Request body must be a JSON object" }
);

const feedbackBodySchema = z.object(
  {
    agent_name: z.string({
      required_error: "Agent name is required",
      invalid_type_error: "Agent name must be a string",
    }),
    agent_type: z.string().nullish(),
    issues: z.string().nullish(),
    feature_requests: z.string().nullish(),
    usability_rating: z.number().nullish(),
    additional_comments: z.string().nullish(),
  },
  { invalid_type_error: "Request body must be a JSON object" }
);

const listQuerySchema = z
  .object({
    limit: z.coerce
      .number({ invalid_type_error: "limit must be a number" })
      .int("limit must be an integer")
      .min(1, "limit must be between 1 and 100")
      .max(100, "limit must be between 1 and 100")
      .optional(),
  })
  .default({});

const badRequest = (err: ValidationError): HandlerResponse => ({
  status: 400,
  body: { error: "bad_request", message: err.message, details: err.details } satisfies ApiErrorBody,
});

/**
 * Framework-neutral request handlers: snake_case bodies in, `{ status, body }`
 * out. Validation and rate-limit rejections answer 400; anything else answers
 * 500 with a fixed message while the cause goes to the logger.
 */
export function createHandlers({ visitors, feedback, logger }: HandlersConfig): Handlers {
  const respond = async (
    failureMessage: string,
    work: () => Promise<unknown>
  ): Promise<HandlerResponse> => {
    try {
      return { status: 200, body: await work() };
    } catch (err) {
      if (err instanceof ValidationError) {
        logger?.("request_invalid", { message: err.message });
        return badRequest(err);
      }
      if (err instanceof RateLimitError) {
        return {
          status: 400,
          body: { error: "rate_limited", message: err.message } satisfies ApiErrorBody,
        };
      }
      logger?.("request_failed", { message: failureMessage, error: String(err) });
      return { status: 500, body: { error: "internal", message: failureMessage } satisfies ApiErrorBody };
    }
  };

  return {
    registerVisit: (body) =>
      respond("Failed to register visit", async () => {
        const parsed = visitBodySchema.safeParse(body);
        if (!parsed.success) throw validationErrorFrom("visitor", parsed.error);
        const record = await visitors.registerVisit({
          name: parsed.data.name,
          agentType: parsed.data.agent_type,
          purpose: parsed.data.purpose,
          answers: parsed.data.answers,
        });
        return toStoredVisitor(record);
      }),

    listVisitors: (query) =>
      respond("Failed to retrieve visitors", async () => {
        const parsed = listQuerySchema.safeParse(query ?? {});
        if (!parsed.success) throw validationErrorFrom("query", parsed.error);
        const records = await visitors.listVisitors(parsed.data.limit);
        return records.map(toStoredVisitor);
      }),

    submitFeedback: (body) =>
      respond("Failed to submit feedback", async () => {
        const parsed = feedbackBodySchema.safeParse(body);
        if (!parsed.success) throw validationErrorFrom("feedback", parsed.error);
        const record = await feedback.submitFeedback({
          agentName: parsed.data.agent_name,
          agentType: parsed.data.agent_type,
          issues: parsed.data.issues,
          featureRequests: parsed.data.feature_requests,
          usabilityRating: parsed.data.usability_rating,
          additionalComments: parsed.data.additional_comments,
        });
        return toStoredFeedback(record);
      }),

    listFeedback: (query) =>
      respond("Failed to retrieve feedback", async () => {
        const parsed = listQuerySchema.safeParse(query ?? {});
        if (!parsed.success) throw validationErrorFrom("query", parsed.error);
        const records = await feedback.listFeedback(parsed.data.limit);
        return records.map(toStoredFeedback);
      }),
  };
}
