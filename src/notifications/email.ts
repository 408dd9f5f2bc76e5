/**
 * Email notifier.
 *
 * Renders subject, plain-text and HTML bodies. Delivery goes through an
 * injected transport; SMTP itself is outside this package.
 */

import { logger } from '../logger';
import { describeNotification } from './messages';
import { NotificationKind, NotificationPayload, Notifier } from './notifier';

export interface EmailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

export interface EmailTransport {
  send(message: EmailMessage): Promise<void>;
}

/** Transport for hosts without SMTP: logs the message instead of sending it. */
export class LogEmailTransport implements EmailTransport {
  private log = logger.child({ module: 'email' });

  async send(message: EmailMessage): Promise<void> {
    this.log.info('Email transport not configured; message not sent', {
      to: message.to,
      subject: message.subject,
    });
  }
}

export interface EmailNotifierOptions {
  transport: EmailTransport;
  from: string;
  /** Prefix for every subject line. */
  subjectPrefix?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderEmail(
  kind: NotificationKind,
  payload: NotificationPayload,
  options: { from: string; subjectPrefix?: string },
): EmailMessage {
  const content = describeNotification(kind, payload);
  const prefix = options.subjectPrefix ?? '[Self-Service]';

  const text = [
    content.text,
    '',
    ...content.facts.map((f) => `${f.name}: ${f.value}`),
    '',
    `${content.action.label}: ${content.action.url}`,
  ].join('\n');

  const rows = content.facts
    .map((f) => `<tr><th align="left">${escapeHtml(f.name)}</th><td>${escapeHtml(f.value)}</td></tr>`)
    .join('');
  const html =
    `<h2 style="color:#${content.accent}">${escapeHtml(content.title)}</h2>` +
    `<p>${escapeHtml(content.text)}</p>` +
    `<table>${rows}</table>` +
    `<p><a href="${escapeHtml(content.action.url)}">${escapeHtml(content.action.label)}</a></p>`;

  return {
    from: options.from,
    to: [...payload.recipients],
    subject: `${prefix} ${content.title}: ${payload.templateName}`,
    text,
    html,
  };
}

export class EmailNotifier implements Notifier {
  readonly channel = 'email';

  constructor(private options: EmailNotifierOptions) {}

  async send(kind: NotificationKind, payload: NotificationPayload): Promise<void> {
    if (payload.recipients.length === 0) return;
    await this.options.transport.send(renderEmail(kind, payload, this.options));
  }
}
