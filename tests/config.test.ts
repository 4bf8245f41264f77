import { describe, it, expect } from 'vitest';
import { DEFAULT_JOURNEY_POLICY, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      supabase: null,
      journey: DEFAULT_JOURNEY_POLICY,
      declineCooldownDays: 90,
      choiceSimilarity: 'table',
      catalogRefreshSeconds: 300,
      sweepBatchSize: 200,
      logLevel: 'info',
      notificationWebhookUrl: null,
      notificationWebhookToken: null,
    });
  });

  it('should only configure Supabase when both credentials are present', () => {
    expect(loadConfig({ SUPABASE_URL: 'http://db.test' }).supabase).toBeNull();
    expect(
      loadConfig({ SUPABASE_URL: 'http://db.test', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }).supabase
    ).toEqual({ url: 'http://db.test', serviceRoleKey: 'test-secret' });
  });

  it('should read journey timings from the environment', () => {
    const config = loadConfig({
      JOURNEY_PROPOSAL_TTL_HOURS: '24',
      MEETING_RESPONSE_TTL_HOURS: '12.5',
      MAX_MEETING_RETRIES: '0',
    });

    expect(config.journey).toEqual({
      ...DEFAULT_JOURNEY_POLICY,
      proposalTtlHours: 24,
      meetingResponseTtlHours: 12.5,
      maxMeetingRetries: 0,
    });
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ DECLINE_COOLDOWN_DAYS: '  ', LOG_LEVEL: '' })).toMatchObject({
      declineCooldownDays: 90,
      logLevel: 'info',
    });
  });

  it('should accept the listed choices', () => {
    expect(loadConfig({ CHOICE_SIMILARITY: 'equality', LOG_LEVEL: 'debug' })).toMatchObject({
      choiceSimilarity: 'equality',
      logLevel: 'debug',
    });
  });

  it('should pass the webhook settings through', () => {
    expect(
      loadConfig({
        NOTIFICATION_WEBHOOK_URL: 'https://hooks.test/journeys',
        NOTIFICATION_WEBHOOK_TOKEN: 'test-secret',
      })
    ).toMatchObject({
      notificationWebhookUrl: 'https://hooks.test/journeys',
      notificationWebhookToken: 'test-secret',
    });
  });

  // --- invalid values ---

  it('should reject values that are not numbers', () => {
    expect(() => loadConfig({ FEEDBACK_WINDOW_HOURS: 'a week' })).toThrow(
      'FEEDBACK_WINDOW_HOURS must be a number, got "a week"'
    );
  });

  it('should reject non-positive durations', () => {
    expect(() => loadConfig({ JOURNEY_CONVERSATION_TTL_HOURS: '0' })).toThrow(
      'JOURNEY_CONVERSATION_TTL_HOURS must be greater than 0'
    );
  });

  it('should reject fractional or negative counts', () => {
    expect(() => loadConfig({ MAX_MEETING_RETRIES: '1.5' })).toThrow(
      'MAX_MEETING_RETRIES must be a non-negative integer'
    );
    expect(() => loadConfig({ DECLINE_COOLDOWN_DAYS: '-1' })).toThrow(
      'DECLINE_COOLDOWN_DAYS must be a non-negative integer'
    );
  });

  it('should reject a zero sweep batch', () => {
    expect(() => loadConfig({ SWEEP_BATCH_SIZE: '0' })).toThrow('SWEEP_BATCH_SIZE must be greater than 0');
  });

  it('should reject unknown choices', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'trace' })).toThrow(
      'LOG_LEVEL must be one of: debug, info, warn, error'
    );
    expect(() => loadConfig({ CHOICE_SIMILARITY: 'fuzzy' })).toThrow(
      'CHOICE_SIMILARITY must be one of: table, equality'
    );
  });
});
