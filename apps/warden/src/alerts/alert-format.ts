import type { AlertInput, AlertMessage } from './alert.types';

const EMPTY_SUBJECT = '(no subject)';
const EMPTY_BODY = '(no details)';

export function toAlertMessage(input: AlertInput, timestamp: Date, host: string): AlertMessage {
  return {
    subject: input.subject.trim() || EMPTY_SUBJECT,
    body: input.body.trim() || EMPTY_BODY,
    severity: input.severity,
    timestamp,
    host,
  };
}

/** `2026-10-19 16:30:00 UTC` */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function buildSlackPayload(msg: AlertMessage, prefix: string) {
  const icon = msg.severity === 'Urgent' ? '🚨' : '🤖';
  return {
    text: `${prefix} Alert: ${msg.subject}`,
    blocks: [
      {
        type: 'header',
        text: { type: 'plain_text', text: `${icon} ${prefix} Alert: ${msg.subject}`, emoji: true },
      },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: msg.body },
      },
      {
        type: 'context',
        elements: [
          { type: 'mrkdwn', text: `📅 ${formatTimestamp(msg.timestamp)} | 🖥️ ${msg.host}` },
        ],
      },
    ],
  };
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function buildTelegramText(msg: AlertMessage, prefix: string): string {
  const icon = msg.severity === 'Urgent' ? '🚨' : '🤖';
  return (
    `${icon} <b>${escapeHtml(`${prefix} Alert: ${msg.subject}`)}</b>\n\n` +
    `${escapeHtml(msg.body)}\n\n` +
    `<i>${escapeHtml(`${formatTimestamp(msg.timestamp)} | ${msg.host}`)}</i>`
  );
}

export function buildPlainText(msg: AlertMessage): string {
  return `${msg.body}\n\n${formatTimestamp(msg.timestamp)} | ${msg.host} | ${msg.severity}`;
}

/** One line per alert; newlines in the body are folded so the log stays line-oriented. */
export function formatFallbackLine(msg: AlertMessage): string {
  const fold = (s: string) => s.replace(/\s*\r?\n\s*/g, ' | ');
  return (
    `[${formatTimestamp(msg.timestamp)}] ${msg.severity.toUpperCase()} host=${msg.host} ` +
    `ALERT: ${fold(msg.subject)} - ${fold(msg.body)}\n`
  );
}
