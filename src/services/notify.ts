/**
 * Notification service — posts fleet alerts to a Discord-style webhook.
 */

import type { Config } from '../config.js';
import { describeError, log } from '../logger.js';

export type Notifier = (message: string) => Promise<void>;

export async function notify(config: Pick<Config, 'webhookUrl'>, message: string): Promise<void> {
  log(`[NOTIFY] ${message}`);

  if (!config.webhookUrl) return;

  try {
    const res = await fetch(config.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ content: `🛰️ **Fleet Supervisor**: ${message}` }),
      signal: AbortSignal.timeout(5_000),
    });
    if (!res.ok) {
      log(`[NOTIFY] Webhook answered ${res.status}`);
    }
  } catch (err) {
    log(`[NOTIFY] Failed to send webhook: ${describeError(err)}`);
  }
}

export function webhookNotifier(config: Pick<Config, 'webhookUrl'>): Notifier {
  return (message) => notify(config, message);
}
