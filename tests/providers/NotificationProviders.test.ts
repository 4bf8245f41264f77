import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { LogNotificationProvider } from '../../src/providers/LogNotificationProvider.js';
import { WebhookNotificationProvider } from '../../src/providers/WebhookNotificationProvider.js';
import type { StageTransitionSignal } from '../../src/providers/INotificationProvider.js';

const signal: StageTransitionSignal = {
  journeyId: 'j-1',
  participants: ['user-a', 'user-b'],
  from: 'proposed',
  to: 'mutual_match',
  actor: 'user-b',
  at: '2026-02-01T10:00:00.000Z',
  version: 2,
};

describe('LogNotificationProvider', () => {
  it('should log the transition at info level', async () => {
    const log = new ConsoleLogProvider();
    const provider = new LogNotificationProvider(log);

    await provider.notify(signal);

    expect(log.eventsAt('info')).toHaveLength(1);
    expect(log.events[0]).toMatchObject({
      message: 'journey j-1: proposed → mutual_match',
      fields: { journeyId: 'j-1', from: 'proposed', to: 'mutual_match', actor: 'user-b', version: 2 },
    });
  });
});

describe('WebhookNotificationProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should POST the signal as JSON', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);
    const provider = new WebhookNotificationProvider({ url: 'https://hooks.test/journeys' });

    await provider.notify(signal);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://hooks.test/journeys',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ type: 'journey.stage_changed', ...signal }),
      })
    );
  });

  it('should send the token as a bearer credential', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const provider = new WebhookNotificationProvider({
      url: 'https://hooks.test/journeys',
      token: 'test-secret',
    });

    await provider.notify(signal);

    expect(fetchMock).toHaveBeenCalledWith(
      'https://hooks.test/journeys',
      expect.objectContaining({
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      })
    );
  });

  it('should reject on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 503 })));
    const provider = new WebhookNotificationProvider({ url: 'https://hooks.test/journeys' });

    await expect(provider.notify(signal)).rejects.toThrow('Notification webhook responded 503');
  });

  it('should reject when the request fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    const provider = new WebhookNotificationProvider({ url: 'https://hooks.test/journeys' });

    await expect(provider.notify(signal)).rejects.toThrow('fetch failed');
  });
});
