// Port: Notification Transport
// Delivers a prepared webhook payload

export interface WebhookField {
  name: string;
  value: string;
  inline: boolean;
}

export interface WebhookEmbed {
  title: string;
  description: string;
  color: number;
  fields: WebhookField[];
}

export interface WebhookPayload {
  username: string;
  embeds: WebhookEmbed[];
}

export interface DeliveryResult {
  status: number;
  delivered: boolean; // 2xx
}

export interface NotificationTransportPort {
  /**
   * POST the payload. Network errors reject; any HTTP status resolves.
   */
  deliver(payload: WebhookPayload): Promise<DeliveryResult>;
}
