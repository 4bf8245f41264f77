/**
 * Database row types — mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

// ── Questionnaire ──

export interface QuestionnaireFieldRow {
  id: string;
  category: string;
  label: string;
  weight: number;
  answer_kind: string;
  comparison_rule: string;
  scale_min: number | null;
  scale_max: number | null;
  options: string[] | null;
  compatibility: Record<string, Record<string, number>> | null;
  deal_breaker: boolean;
  created_at: string;
}

export interface ResponseRow {
  user_id: string;
  field_id: string;
  value: number | string | boolean;
  updated_at: string;
}

// ── Profiles ──

export interface ProfileRow {
  user_id: string;
  verified: boolean;
  birth_date: string;
  gender: string;
  pref_age_min: number;
  pref_age_max: number;
  pref_max_distance_km: number;
  pref_genders: string[];
  latitude: number | null;
  longitude: number | null;
}

// ── Journeys ──

export interface StageHistoryJson {
  stage: string;
  actor: string | null;
  at: string;
  note?: string;
}

export interface MeetingRequestJson {
  id: string;
  proposed_by: string;
  proposed_time: string;
  location: string;
  status: string;
  respond_by: string;
  responded_at: string | null;
  completed_at: string | null;
  created_at: string;
}

/**
 * One row per journey. History, consent and meeting requests live in jsonb
 * columns so a single versioned update covers the whole aggregate.
 */
export interface JourneyRow {
  id: string;
  participant_a: string;
  participant_b: string;
  /** "<a>:<b>" — target of the partial unique index on active journeys. */
  pair_key: string;
  initiator_id: string;
  stage: string;
  is_terminal: boolean;
  stage_history: StageHistoryJson[];
  consent: Record<string, string[]>;
  deadline: string | null;
  meetings: MeetingRequestJson[];
  failed_meeting_attempts: number;
  ended_by: string | null;
  end_reason: string | null;
  version: number;
  created_at: string;
  updated_at: string;
}

// ── Feedback ──

export interface FeedbackRow {
  id: string;
  journey_id: string;
  meeting_request_id: string;
  submitted_by: string;
  subject_id: string;
  rating: number;
  comment: string | null;
  wants_to_continue: boolean | null;
  created_at: string;
}

// ── Rate Limiting ──

export interface RateLimitRow {
  key: string;
  window_start: number;
  count: number;
}
