import { z } from 'zod';
import type { NotificationConfig, NotificationPriority, NotificationSeverity } from '../types';
import type { NotificationProvider, NotificationProviderFactory } from './provider';

type Fetch = typeof fetch;

const webhookSettings = z.object({
  url: z.string().url(),
  bearer_token: z.string().min(1).optional(),
});

const discordSettings = z.object({
  webhook_url: z.string().url(),
  username: z.string().min(1).optional(),
});

const SEVERITY_COLORS: Record<NotificationSeverity, number> = {
  success: 0x2ecc71,
  info: 0x3498db,
  warning: 0xf1c40f,
  error: 0xe74c3c,
};

function parseSettings<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, config: NotificationConfig): T {
  const parsed = schema.safeParse(config.settings);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid ${config.provider} settings for '${config.name}': ${detail}`);
  }
  return parsed.data;
}

/**
 * POSTs JSON and reports whether the endpoint accepted it. Logs errors but
 * never throws.
 */
async function postJson(
  fetchImpl: Fetch,
  url: string,
  payload: unknown,
  headers: Record<string, string> = {}
): Promise<boolean> {
  try {
    const resp = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(payload),
    });
    if (!resp.ok) {
      console.error(`[notify] Webhook rejected notification: ${resp.status} ${resp.statusText}`);
    }
    return resp.ok;
  } catch (err) {
    console.error('[notify] Error sending notification:', err instanceof Error ? err.message : String(err));
    return false;
  }
}

/** Generic JSON webhook, optionally authenticated with a bearer token. */
export class WebhookNotificationProvider implements NotificationProvider {
  constructor(
    private readonly settings: z.infer<typeof webhookSettings>,
    private readonly fetchImpl: Fetch = fetch
  ) {}

  async send(
    title: string,
    body: string,
    severity: NotificationSeverity,
    priority: NotificationPriority
  ): Promise<boolean> {
    const headers: Record<string, string> = {};
    if (this.settings.bearer_token) {
      headers.Authorization = `Bearer ${this.settings.bearer_token}`;
    }
    return postJson(this.fetchImpl, this.settings.url, { title, body, severity, priority }, headers);
  }
}

export class DiscordNotificationProvider implements NotificationProvider {
  constructor(
    private readonly settings: z.infer<typeof discordSettings>,
    private readonly fetchImpl: Fetch = fetch
  ) {}

  async send(
    title: string,
    body: string,
    severity: NotificationSeverity,
    priority: NotificationPriority
  ): Promise<boolean> {
    return postJson(this.fetchImpl, this.settings.webhook_url, {
      username: this.settings.username,
      content: priority === 'high' ? '@here' : undefined,
      embeds: [{ title, description: body, color: SEVERITY_COLORS[severity] }],
    });
  }
}

export function webhookProviderFactory(fetchImpl: Fetch = fetch): NotificationProviderFactory {
  return (config) => new WebhookNotificationProvider(parseSettings(webhookSettings, config), fetchImpl);
}

export function discordProviderFactory(fetchImpl: Fetch = fetch): NotificationProviderFactory {
  return (config) => new DiscordNotificationProvider(parseSettings(discordSettings, config), fetchImpl);
}
