import type { StorageAdapter } from "./storage/types";

export type Logger = (message: string, meta?: Record<string, unknown>) => void;

export type AnswerMap = Record<string, string>;

export interface VisitorRecord {
  id: string;
  name: string;
  agentType: string | null;
  purpose: string | null;
  visitTime: number; // Unix ms
  visitCount: number;
  answers: AnswerMap;
}

export interface FeedbackRecord {
  id: string;
  agentName: string;
  agentType: string | null;
  submissionTime: number; // Unix ms
  issues: string | null;
  featureRequests: string | null;
  usabilityRating: number | null;
  additionalComments: string | null;
}

export type AnswerValue = string | number | boolean;

export interface VisitRequest {
  name: string;
  agentType?: string | null;
  purpose?: string | null;
  answers?: Record<string, AnswerValue> | null;
}

export interface FeedbackRequest {
  agentName: string;
  agentType?: string | null;
  issues?: string | null;
  featureRequests?: string | null;
  usabilityRating?: number | null;
  additionalComments?: string | null;
}

export interface VisitorPolicy {
  maxNameLength: number;
  maxFieldLength: number;
  maxAnswerKeyLength: number;
  maxAnswerValueLength: number;
  /** Ceiling on `answersSize(answers)` before sanitization. */
  maxAnswersSize: number;
  rateLimitWindowMs: number;
  /** Retention ceiling; oldest visits are evicted past this count. */
  maxRecords: number;
}

export interface FeedbackPolicy {
  maxNameLength: number;
  maxTextLength: number;
  minRating: number;
  maxRating: number;
  maxRecords: number;
}

export interface VisitorRegistryConfig {
  storage: StorageAdapter;
  policy?: Partial<VisitorPolicy>;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

export interface FeedbackRegistryConfig {
  storage: StorageAdapter;
  policy?: Partial<FeedbackPolicy>;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

export type VisitorRegistryEvents = {
  visit: {
    record: VisitorRecord;
    isNew: boolean;
  };
  rate_limited: {
    name: string;
    agentType: string | null;
  };
};
