// Webhook Client - single HTTP POST, no retries
// Any HTTP status resolves; only transport errors reject

import axios from 'axios';
import { DeliveryResult, WebhookPayload } from '../../../domain/ports/notificationTransport';
import { logVerbose, logPerformance } from '../../adapters/logging/logger';

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10000;

export async function postWebhook(
  url: string,
  payload: WebhookPayload,
  timeoutMs: number = DEFAULT_WEBHOOK_TIMEOUT_MS
): Promise<DeliveryResult> {
  const startTime = Date.now();
  logVerbose('WebhookClient', 'Posting webhook payload', {
    embeds: payload.embeds.length,
    timeout_ms: timeoutMs,
  });

  const response = await axios.post(url, payload, {
    timeout: timeoutMs,
    headers: { 'Content-Type': 'application/json' },
    validateStatus: () => true,
  });

  logPerformance('[WebhookClient] POST', Date.now() - startTime, { status: response.status });
  return {
    status: response.status,
    delivered: response.status >= 200 && response.status < 300,
  };
}
