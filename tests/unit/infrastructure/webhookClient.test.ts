import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { postWebhook } from '../../../src/infrastructure/connectors/http/webhookClient';
import { WebhookTransportAdapter } from '../../../src/infrastructure/adapters/notifications/webhookTransportAdapter';
import { WebhookPayload } from '../../../src/domain/ports/notificationTransport';

jest.mock('axios');

const mockedAxios = axios as jest.Mocked<typeof axios>;

const response = (status: number): AxiosResponse => ({
  status,
  statusText: '',
  data: '',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

const payload: WebhookPayload = {
  username: 'Webhooks BOT',
  embeds: [{ title: '🔰 First scan (ports)', description: 'Target 192.168.1.10 open ports: 22', color: 5814783, fields: [] }],
};

describe('WebhookClient', () => {
  beforeEach(() => {
    mockedAxios.post.mockReset();
  });

  it('should POST the payload as JSON with the timeout', async () => {
    mockedAxios.post.mockResolvedValue(response(204));

    const result = await postWebhook('https://hooks.example.test/webhook', payload, 2500);

    expect(result).toEqual({ status: 204, delivered: true });
    expect(mockedAxios.post).toHaveBeenCalledWith(
      'https://hooks.example.test/webhook',
      payload,
      expect.objectContaining({ timeout: 2500, headers: { 'Content-Type': 'application/json' } })
    );
  });

  it('should resolve non-2xx responses as undelivered', async () => {
    mockedAxios.post.mockResolvedValue(response(429));
    await expect(postWebhook('https://hooks.example.test/webhook', payload)).resolves.toEqual({ status: 429, delivered: false });
  });

  it('should accept every status so that HTTP errors never throw', async () => {
    mockedAxios.post.mockResolvedValue(response(500));
    await postWebhook('https://hooks.example.test/webhook', payload);

    const options = mockedAxios.post.mock.calls[0][2];
    expect(options?.validateStatus?.(500)).toBe(true);
  });

  it('should reject on transport errors', async () => {
    mockedAxios.post.mockRejectedValue(new Error('getaddrinfo ENOTFOUND hooks.example.test'));
    await expect(postWebhook('https://hooks.example.test/webhook', payload)).rejects.toThrow('getaddrinfo ENOTFOUND hooks.example.test');
  });

  it('should deliver through the adapter with its configured url and timeout', async () => {
    mockedAxios.post.mockResolvedValue(response(200));
    const adapter = new WebhookTransportAdapter('https://hooks.example.test/other', 1234);

    await expect(adapter.deliver(payload)).resolves.toEqual({ status: 200, delivered: true });
    expect(mockedAxios.post).toHaveBeenCalledWith(
      'https://hooks.example.test/other',
      payload,
      expect.objectContaining({ timeout: 1234 })
    );
  });
});
