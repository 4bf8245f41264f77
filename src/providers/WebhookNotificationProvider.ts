/**
 * Webhook notification provider.
 * POSTs each stage transition as JSON to the messaging collaborator.
 * Rejects on network errors and non-2xx responses; the caller decides
 * what to do with the failure.
 */

import type { INotificationProvider, StageTransitionSignal } from './INotificationProvider.js';

export interface WebhookNotificationProviderOptions {
  url: string;
  /** Sent as a Bearer token when set. */
  token?: string;
  /** Request timeout in ms. Default: 5_000. */
  timeoutMs?: number;
}

export class WebhookNotificationProvider implements INotificationProvider {
  private readonly url: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: WebhookNotificationProviderOptions) {
    this.url = options.url;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  async notify(signal: StageTransitionSignal): Promise<void> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await fetch(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({ type: 'journey.stage_changed', ...signal }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Notification webhook responded ${response.status}`);
    }
  }
}
