import { z, type ZodError } from "zod";
import { ValidationError } from "./errors";
import type { FeedbackPolicy, FeedbackRecord, VisitorPolicy, VisitorRecord } from "./types";
import { answersSize, charLength } from "./utils";

const isoTimestamp = z.string().transform((value, ctx) => {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${value}"` });
    return z.NEVER;
  }
  return ms;
});

const answerValue = z.union([z.string(), z.number(), z.boolean()]);

// ---------------------------------------------------------------------------
// Persisted JSON documents (snake_case, ISO-8601 timestamps)
// ---------------------------------------------------------------------------

export const storedVisitorSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    agent_type: z.string().nullish(),
    purpose: z.string().nullish(),
    visit_time: isoTimestamp,
    visit_count: z.number().int().min(1).default(1),
    answers: z.record(answerValue.nullable()).nullish(),
  })
  .transform(
    (doc): VisitorRecord => ({
      id: doc.id,
      name: doc.name,
      agentType: doc.agent_type ?? null,
      purpose: doc.purpose ?? null,
      visitTime: doc.visit_time,
      visitCount: doc.visit_count,
      answers: Object.fromEntries(
        Object.entries(doc.answers ?? {}).map(([key, value]) => [key, value === null ? "" : String(value)])
      ),
    })
  );

export const storedFeedbackSchema = z
  .object({
    id: z.string().min(1),
    agent_name: z.string(),
    agent_type: z.string().nullish(),
    submission_time: isoTimestamp,
    issues: z.string().nullish(),
    feature_requests: z.string().nullish(),
    usability_rating: z.number().int().nullish(),
    additional_comments: z.string().nullish(),
  })
  .transform(
    (doc): FeedbackRecord => ({
      id: doc.id,
      agentName: doc.agent_name,
      agentType: doc.agent_type ?? null,
      submissionTime: doc.submission_time,
      issues: doc.issues ?? null,
      featureRequests: doc.feature_requests ?? null,
      usabilityRating: doc.usability_rating ?? null,
      additionalComments: doc.additional_comments ?? null,
    })
  );

export const toStoredVisitor = (record: VisitorRecord) => ({
  id: record.id,
  name: record.name,
  agent_type: record.agentType,
  purpose: record.purpose,
  visit_time: new Date(record.visitTime).toISOString(),
  visit_count: record.visitCount,
  answers: { ...record.answers },
});

export const toStoredFeedback = (record: FeedbackRecord) => ({
  id: record.id,
  agent_name: record.agentName,
  agent_type: record.agentType,
  submission_time: new Date(record.submissionTime).toISOString(),
  issues: record.issues,
  feature_requests: record.featureRequests,
  usability_rating: record.usabilityRating,
  additional_comments: record.additionalComments,
});

// ---------------------------------------------------------------------------
// Registry input
// ---------------------------------------------------------------------------

const requiredName = (label: string, maxLength: number) =>
  z.string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` }).superRefine((value, ctx) => {
    if (value.trim().length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} is required` });
    } else if (charLength(value) > maxLength) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be ${maxLength} characters or less` });
    }
  });

const withinLength = (maxLength: number, message: string) =>
  z.string().refine((value) => charLength(value) <= maxLength, message);

const optionalText = (label: string, maxLength: number) =>
  withinLength(maxLength, `${label} must be ${maxLength} characters or less`).nullish();

export const visitRequestSchema = (policy: VisitorPolicy) =>
  z.object({
    name: requiredName("Name", policy.maxNameLength),
    agentType: optionalText("Agent type", policy.maxFieldLength),
    purpose: optionalText("Purpose", policy.maxFieldLength),
    answers: z
      .record(
        withinLength(policy.maxAnswerKeyLength, `Answer keys must be ${policy.maxAnswerKeyLength} characters or less`),
        answerValue
      )
      .nullish()
      .refine(
        (answers) => !answers || answersSize(answers) <= policy.maxAnswersSize,
        "Answers exceeded maximum allowed size"
      ),
  });

export const feedbackRequestSchema = (policy: FeedbackPolicy) =>
  z.object({
    agentName: requiredName("Agent name", policy.maxNameLength),
    agentType: optionalText("Agent type", policy.maxNameLength),
    issues: optionalText("Issues", policy.maxTextLength),
    featureRequests: optionalText("Feature requests", policy.maxTextLength),
    usabilityRating: z
      .number()
      .int("Usability rating must be an integer")
      .min(policy.minRating, `Usability rating must be between ${policy.minRating} and ${policy.maxRating}`)
      .max(policy.maxRating, `Usability rating must be between ${policy.minRating} and ${policy.maxRating}`)
      .nullish(),
    additionalComments: optionalText("Additional comments", policy.maxTextLength),
  });

export interface FieldIssue {
  field: string;
  message: string;
}

export const toFieldIssues = (error: ZodError): FieldIssue[] =>
  error.issues.map((issue) => ({
    field: issue.path.length > 0 ? String(issue.path[0]) : "body",
    message: issue.message,
  }));

/**
 * Builds a ValidationError whose message names every offending field, e.g.
 * `Invalid visitor data: name: Name is required`.
 */
export const validationErrorFrom = (subject: string, error: ZodError): ValidationError => {
  const issues = toFieldIssues(error);
  const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
  return new ValidationError(`Invalid ${subject} data: ${summary}`, issues[0]?.field, { issues });
};
