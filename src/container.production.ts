/**
 * Production container — Supabase repositories and identity, JSON console
 * logging, webhook notifications when configured.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { LogNotificationProvider } from './providers/LogNotificationProvider.js';
import { WebhookNotificationProvider } from './providers/WebhookNotificationProvider.js';
import { SupabaseIdentityProvider } from './providers/SupabaseIdentityProvider.js';
import { SupabaseProfileProvider } from './providers/SupabaseProfileProvider.js';
import { SupabaseQuestionnaireRepository } from './repositories/SupabaseQuestionnaireRepository.js';
import { SupabaseResponseRepository } from './repositories/SupabaseResponseRepository.js';
import { SupabaseJourneyRepository } from './repositories/SupabaseJourneyRepository.js';
import { SupabaseFeedbackRepository } from './repositories/SupabaseFeedbackRepository.js';
import { SupabaseRateLimitStore } from './stores/SupabaseRateLimitStore.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig();
  const db = getSupabaseClient(config);

  const logProvider = new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: config.logLevel,
    baseFields: { service: 'pairpath' },
  });

  const notificationProvider = config.notificationWebhookUrl
    ? new WebhookNotificationProvider({
        url: config.notificationWebhookUrl,
        ...(config.notificationWebhookToken ? { token: config.notificationWebhookToken } : {}),
      })
    : new LogNotificationProvider(logProvider);

  cached = createContainer({
    config,
    questionnaireRepo: new SupabaseQuestionnaireRepository(db),
    responseRepo: new SupabaseResponseRepository(db),
    journeyRepo: new SupabaseJourneyRepository(db),
    feedbackRepo: new SupabaseFeedbackRepository(db),
    profileProvider: new SupabaseProfileProvider(db),
    identityProvider: new SupabaseIdentityProvider(db),
    notificationProvider,
    logProvider,
    rateLimitStore: new SupabaseRateLimitStore(db),
  });

  return cached;
}
