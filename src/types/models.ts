/**
 * Domain models — core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Questionnaire ──

export type AnswerKind = 'scale' | 'single_choice' | 'boolean';
export type ComparisonRule = 'similarity' | 'exact_match';

/** Symmetric option-to-option similarity for single_choice fields. */
export type CompatibilityTable = Record<string, Record<string, number>>;

export interface ScaleRange {
  min: number;
  max: number;
}

export interface QuestionnaireField {
  id: string;
  category: string;
  label: string;
  weight: number;
  answerKind: AnswerKind;
  comparisonRule: ComparisonRule;
  /** Required for scale fields. */
  scale: ScaleRange | null;
  /** Required for single_choice fields. */
  options: string[] | null;
  compatibility: CompatibilityTable | null;
  /** A zero similarity on this field is reported as a deal breaker. */
  dealBreaker: boolean;
  createdAt: Date;
}

export type AnswerValue = number | string | boolean;

export interface Response {
  userId: string;
  fieldId: string;
  value: AnswerValue;
  updatedAt: Date;
}

// ── Profiles (external collaborator) ──

export type Gender = 'man' | 'woman' | 'nonbinary';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface PartnerPreferences {
  ageMin: number;
  ageMax: number;
  maxDistanceKm: number;
  genders: Gender[];
}

export interface UserProfile {
  userId: string;
  verified: boolean;
  birthDate: Date;
  gender: Gender;
  preferences: PartnerPreferences;
  location: GeoPoint | null;
}

// ── Journeys ──

export type JourneyStage =
  | 'proposed'
  | 'mutual_match'
  | 'guided_conversation'
  | 'meeting_proposed'
  | 'meeting_confirmed'
  | 'post_meeting_feedback'
  | 'ongoing'
  | 'declined'
  | 'expired';

export interface StageHistoryEntry {
  stage: JourneyStage;
  /** Null when the system (sweep, scheduler) caused the transition. */
  actor: string | null;
  at: Date;
  note?: string;
}

/** Participants who consented, per stage. */
export type ConsentLedger = Partial<Record<JourneyStage, string[]>>;

export type MeetingStatus = 'pending' | 'accepted' | 'declined' | 'completed' | 'expired';

export interface MeetingRequest {
  id: string;
  proposedBy: string;
  proposedTime: Date;
  location: string;
  status: MeetingStatus;
  respondBy: Date;
  respondedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

export interface Journey {
  id: string;
  /** Sorted ascending, so the pair is unordered by construction. */
  participants: [string, string];
  initiatorId: string;
  stage: JourneyStage;
  stageHistory: StageHistoryEntry[];
  consent: ConsentLedger;
  deadline: Date | null;
  meetings: MeetingRequest[];
  failedMeetingAttempts: number;
  endedBy: string | null;
  endReason: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

// ── Feedback ──

export interface Feedback {
  id: string;
  journeyId: string;
  meetingRequestId: string;
  submittedBy: string;
  /** The other participant, the person the feedback is about. */
  subjectId: string;
  rating: number;
  comment: string | null;
  wantsToContinue: boolean | null;
  createdAt: Date;
}
