/**
 * Runtime configuration, read from environment variables.
 * Every value has a default except the Supabase credentials, which only the
 * production container requires.
 */

import type { LogLevel } from './providers/ILogProvider.js';

export type ChoiceSimilarityMode = 'table' | 'equality';

export interface JourneyPolicy {
  /** How long the counterpart has to answer a proposal. */
  proposalTtlHours: number;
  /** Idle limit for the guided conversation before a meeting is proposed. */
  conversationTtlHours: number;
  /** Upper bound on the time a meeting request waits for an answer. */
  meetingResponseTtlHours: number;
  /** Grace after the proposed meeting time before a confirmed meeting lapses. */
  meetingCompletionGraceHours: number;
  feedbackWindowHours: number;
  /** Failed meeting attempts tolerated before the journey expires. */
  maxMeetingRetries: number;
}

export interface AppConfig {
  supabase: { url: string; serviceRoleKey: string } | null;
  journey: JourneyPolicy;
  declineCooldownDays: number;
  choiceSimilarity: ChoiceSimilarityMode;
  catalogRefreshSeconds: number;
  sweepBatchSize: number;
  logLevel: LogLevel;
  notificationWebhookUrl: string | null;
  notificationWebhookToken: string | null;
}

export const DEFAULT_JOURNEY_POLICY: JourneyPolicy = {
  proposalTtlHours: 72,
  conversationTtlHours: 30 * 24,
  meetingResponseTtlHours: 48,
  meetingCompletionGraceHours: 72,
  feedbackWindowHours: 7 * 24,
  maxMeetingRetries: 2,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const CHOICE_MODES: readonly ChoiceSimilarityMode[] = ['table', 'equality'];

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const url = env.SUPABASE_URL;
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY;

  return {
    supabase: url && serviceRoleKey ? { url, serviceRoleKey } : null,
    journey: {
      proposalTtlHours: positive(env, 'JOURNEY_PROPOSAL_TTL_HOURS', DEFAULT_JOURNEY_POLICY.proposalTtlHours),
      conversationTtlHours: positive(env, 'JOURNEY_CONVERSATION_TTL_HOURS', DEFAULT_JOURNEY_POLICY.conversationTtlHours),
      meetingResponseTtlHours: positive(env, 'MEETING_RESPONSE_TTL_HOURS', DEFAULT_JOURNEY_POLICY.meetingResponseTtlHours),
      meetingCompletionGraceHours: positive(env, 'MEETING_COMPLETION_GRACE_HOURS', DEFAULT_JOURNEY_POLICY.meetingCompletionGraceHours),
      feedbackWindowHours: positive(env, 'FEEDBACK_WINDOW_HOURS', DEFAULT_JOURNEY_POLICY.feedbackWindowHours),
      maxMeetingRetries: nonNegativeInteger(env, 'MAX_MEETING_RETRIES', DEFAULT_JOURNEY_POLICY.maxMeetingRetries),
    },
    declineCooldownDays: nonNegativeInteger(env, 'DECLINE_COOLDOWN_DAYS', 90),
    choiceSimilarity: oneOf(env, 'CHOICE_SIMILARITY', CHOICE_MODES, 'table'),
    catalogRefreshSeconds: nonNegativeInteger(env, 'CATALOG_REFRESH_SECONDS', 300),
    sweepBatchSize: positiveInteger(env, 'SWEEP_BATCH_SIZE', 200),
    logLevel: oneOf(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    notificationWebhookUrl: env.NOTIFICATION_WEBHOOK_URL || null,
    notificationWebhookToken: env.NOTIFICATION_WEBHOOK_TOKEN || null,
  };
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function positive(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (value <= 0) throw new Error(`${name} must be greater than 0`);
  return value;
}

function nonNegativeInteger(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return value;
}

function positiveInteger(env: Env, name: string, fallback: number): number {
  const value = nonNegativeInteger(env, name, fallback);
  if (value === 0) throw new Error(`${name} must be greater than 0`);
  return value;
}

function oneOf<T extends string>(
  env: Env,
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    throw new Error(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}
