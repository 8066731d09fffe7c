import { NotificationTransportPort, DeliveryResult, WebhookPayload } from '../../../domain/ports/notificationTransport';
import { postWebhook, DEFAULT_WEBHOOK_TIMEOUT_MS } from '../../connectors/http/webhookClient';

export class WebhookTransportAdapter implements NotificationTransportPort {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number = DEFAULT_WEBHOOK_TIMEOUT_MS
  ) {}

  async deliver(payload: WebhookPayload): Promise<DeliveryResult> {
    return postWebhook(this.url, payload, this.timeoutMs);
  }
}
