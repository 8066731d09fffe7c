// Notifier - change event to webhook delivery
// Fire-and-forget from the caller's perspective: never throws

import { ChangeEvent, EntityKind, SnapshotElement } from '../../domain/types/types';
import { NotificationTransportPort, WebhookPayload } from '../../domain/ports/notificationTransport';
import { LoggerPort } from '../../domain/ports/logger';
import { buildAlertEmbed } from '../../domain/notifications/alertFormatter';

export interface NotifierOptions {
  username: string;
  // Display identifier per kind: the target host for ports, the subnet for hosts
  subjects: Record<EntityKind, string>;
  clock?: () => Date;
}

export class Notifier {
  private readonly clock: () => Date;

  constructor(
    // null when no webhook endpoint is configured
    private readonly transport: NotificationTransportPort | null,
    private readonly options: NotifierOptions,
    private readonly logger: LoggerPort
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  buildPayload<T extends SnapshotElement>(event: ChangeEvent<T>): WebhookPayload {
    return {
      username: this.options.username,
      embeds: [buildAlertEmbed(event, this.options.subjects[event.kind], this.clock())],
    };
  }

  /**
   * Resolves true when the endpoint answered 2xx, false otherwise
   */
  async notify<T extends SnapshotElement>(event: ChangeEvent<T>): Promise<boolean> {
    const payload = this.buildPayload(event);
    const title = payload.embeds[0].title;

    if (!this.transport) {
      this.logger.logError('Notifier', `Webhook not set, dropping alert "${title}"`, { kind: event.kind, type: event.type });
      return false;
    }

    try {
      const result = await this.transport.deliver(payload);
      if (!result.delivered) {
        this.logger.logError('Notifier', `Webhook rejected alert "${title}"`, { kind: event.kind, type: event.type, status: result.status });
        return false;
      }
      this.logger.log('Notifier', `Webhook status ${result.status}`, { kind: event.kind, type: event.type });
      return true;
    } catch (error) {
      this.logger.logError('Notifier', `Webhook error for alert "${title}"`, error);
      return false;
    }
  }
}
