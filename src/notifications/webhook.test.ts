import { describe, it, expect, vi, beforeEach } from 'vitest';
import { discordProviderFactory, webhookProviderFactory } from './webhook';
import type { NotificationConfig } from '../types';

function config(provider: string, settings: Record<string, unknown>): NotificationConfig {
  return { id: 1, name: 'ops', provider, enabled: true, settings };
}

function fakeFetch(status = 204) {
  return vi.fn<typeof fetch>(async () => new Response(null, { status }));
}

function sentBody(fetchMock: ReturnType<typeof fakeFetch>): unknown {
  const init = fetchMock.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

describe('WebhookNotificationProvider', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('posts the notification as JSON with the bearer token', async () => {
    const fetchMock = fakeFetch();
    const provider = webhookProviderFactory(fetchMock)(
      config('webhook', { url: 'https://hooks.example.test/backup', bearer_token: 'test-secret' })
    );

    const sent = await provider.send('Nightly done', 'All good', 'success', 'normal');

    expect(sent).toBe(true);
    expect(fetchMock).toHaveBeenCalledWith('https://hooks.example.test/backup', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      body: JSON.stringify({ title: 'Nightly done', body: 'All good', severity: 'success', priority: 'normal' }),
    });
  });

  it('reports a rejected delivery', async () => {
    const provider = webhookProviderFactory(fakeFetch(500))(config('webhook', { url: 'https://hooks.example.test/x' }));

    expect(await provider.send('t', 'b', 'info', 'low')).toBe(false);
  });

  it('reports a network error without throwing', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new Error('getaddrinfo ENOTFOUND hooks.example.test');
    });
    const provider = webhookProviderFactory(fetchMock)(config('webhook', { url: 'https://hooks.example.test/x' }));

    expect(await provider.send('t', 'b', 'info', 'low')).toBe(false);
    expect(console.error).toHaveBeenCalledWith(
      '[notify] Error sending notification:',
      'getaddrinfo ENOTFOUND hooks.example.test'
    );
  });

  it('rejects settings without a url', () => {
    expect(() => webhookProviderFactory(fakeFetch())(config('webhook', {}))).toThrow(
      "Invalid webhook settings for 'ops': url: Required"
    );
  });
});

describe('DiscordNotificationProvider', () => {
  it('sends an embed coloured by severity and pings on high priority', async () => {
    const fetchMock = fakeFetch();
    const provider = discordProviderFactory(fetchMock)(
      config('discord', { webhook_url: 'https://discord.example.test/api/webhooks/1', username: 'backups' })
    );

    await provider.send('Backup Job Failed - Backup Error', 'details', 'error', 'high');

    expect(fetchMock.mock.calls[0][0]).toBe('https://discord.example.test/api/webhooks/1');
    expect(sentBody(fetchMock)).toEqual({
      username: 'backups',
      content: '@here',
      embeds: [{ title: 'Backup Job Failed - Backup Error', description: 'details', color: 0xe74c3c }],
    });
  });

  it('leaves out the ping at normal priority', async () => {
    const fetchMock = fakeFetch();
    const provider = discordProviderFactory(fetchMock)(
      config('discord', { webhook_url: 'https://discord.example.test/api/webhooks/1' })
    );

    await provider.send('Backup Job Completed Successfully', 'details', 'success', 'normal');

    expect(sentBody(fetchMock)).toEqual({
      embeds: [{ title: 'Backup Job Completed Successfully', description: 'details', color: 0x2ecc71 }],
    });
  });
});
