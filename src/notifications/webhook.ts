/**
 * Chat webhook notifier.
 *
 * Posts MessageCard JSON to an incoming chat webhook. Includes an HMAC
 * signature for payload verification when a signing secret is configured.
 */

import { createHmac } from 'crypto';
import { v4 as uuid } from 'uuid';
import { describeNotification } from './messages';
import { NotificationKind, NotificationPayload, Notifier } from './notifier';

/** MessageCard body accepted by chat incoming webhooks. */
export interface MessageCard {
  '@type': 'MessageCard';
  '@context': 'http://schema.org/extensions';
  themeColor: string;
  summary: string;
  sections: Array<{
    activityTitle: string;
    text: string;
    facts: Array<{ name: string; value: string }>;
  }>;
  potentialAction: Array<{
    '@type': 'OpenUri';
    name: string;
    targets: Array<{ os: 'default'; uri: string }>;
  }>;
}

/** Webhook delivery function type (injectable for testing). */
export type WebhookDeliveryFn = (
  url: string,
  body: string,
  headers: Record<string, string>,
) => Promise<{ statusCode: number }>;

export interface ChatWebhookOptions {
  url: string;
  signingSecret?: string;
  deliveryFn?: WebhookDeliveryFn;
}

/**
 * Validate that a webhook URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 *
 * Blocks non-HTTP(S) protocols, localhost, cloud metadata endpoints and
 * private IPv4 ranges.
 */
export function validateWebhookUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid webhook URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Webhook URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();

  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]') {
    return `Webhook URL must not point to localhost: ${hostname}`;
  }

  if (hostname === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `Webhook URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4Match) {
    const a = Number(ipv4Match[1]);
    const b = Number(ipv4Match[2]);
    if (a === 10) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 172 && b >= 16 && b <= 31) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 192 && b === 168) return `Webhook URL must not point to private IP range: ${hostname}`;
    if (a === 169 && b === 254) return `Webhook URL must not point to link-local range: ${hostname}`;
    if (a === 127) return `Webhook URL must not point to localhost: ${hostname}`;
    if (a === 0) return `Webhook URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

/** Sign a body the way receivers verify it: `sha256=<hex hmac>`. */
export function signWebhookBody(body: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

export function renderMessageCard(kind: NotificationKind, payload: NotificationPayload): MessageCard {
  const content = describeNotification(kind, payload);
  return {
    '@type': 'MessageCard',
    '@context': 'http://schema.org/extensions',
    themeColor: content.accent,
    summary: content.title,
    sections: [{ activityTitle: content.title, text: content.text, facts: content.facts }],
    potentialAction: [
      {
        '@type': 'OpenUri',
        name: content.action.label,
        targets: [{ os: 'default', uri: content.action.url }],
      },
    ],
  };
}

// Retries network errors and 5xx up to 3 times with 1s, 2s, 4s backoff.
// 4xx responses are returned immediately.
const WEBHOOK_MAX_RETRIES = 3;
const WEBHOOK_BACKOFF_BASE_MS = 1000;

function webhookSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** HTTP webhook delivery using native fetch with retry. */
const httpDelivery: WebhookDeliveryFn = async (url, body, headers) => {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= WEBHOOK_MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      await webhookSleep(WEBHOOK_BACKOFF_BASE_MS * Math.pow(2, attempt - 1));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), 10_000);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      if (response.status < 500) {
        return { statusCode: response.status };
      }
      lastError = new Error(`Webhook returned HTTP ${response.status}`);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error('Unknown webhook error');
    } finally {
      clearTimeout(timeout);
    }
  }

  throw lastError ?? new Error('Webhook delivery failed after retries');
};

export class ChatWebhookNotifier implements Notifier {
  readonly channel = 'chat';
  private deliveryFn: WebhookDeliveryFn;

  constructor(private options: ChatWebhookOptions) {
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
  }

  async send(kind: NotificationKind, payload: NotificationPayload): Promise<void> {
    // Checked before any request is made
    const urlError = validateWebhookUrl(this.options.url);
    if (urlError) {
      throw new Error(urlError);
    }

    const body = JSON.stringify(renderMessageCard(kind, payload));
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': 'request-lifecycle-webhook/1.0',
      'X-Webhook-Id': `whk_${uuid()}`,
      'X-Webhook-Event': kind,
    };
    if (this.options.signingSecret) {
      headers['X-Webhook-Signature'] = signWebhookBody(body, this.options.signingSecret);
    }

    const response = await this.deliveryFn(this.options.url, body, headers);
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new Error(`Chat webhook returned HTTP ${response.statusCode}`);
    }
  }
}
