/**
 * Transition message formatting
 */

import { SIGNAL_COLOR } from '../types';
import type { TransitionEvent } from '../types';

export interface TransitionMessage {
  subject: string;
  text: string;
  html: string;
}

/**
 * "$NYSI" -> "NYSI"
 */
export function displaySymbol(ticker: string): string {
  return ticker.replace(/^\$/, '');
}

/**
 * Local "YYYY-MM-DD HH:MM:SS" of an instant
 */
export function formatTimestamp(instant: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${instant.getFullYear()}-${pad(instant.getMonth() + 1)}-${pad(instant.getDate())} ` +
    `${pad(instant.getHours())}:${pad(instant.getMinutes())}:${pad(instant.getSeconds())}`
  );
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function formatSubject(event: TransitionEvent): string {
  const from = SIGNAL_COLOR[event.fromSignal];
  const to = SIGNAL_COLOR[event.toSignal];
  return `${displaySymbol(event.ticker)} Alert: Color Changed from ${from} to ${to}`;
}

export function formatTransition(event: TransitionEvent, sentAt: Date = new Date()): TransitionMessage {
  const from = SIGNAL_COLOR[event.fromSignal];
  const to = SIGNAL_COLOR[event.toSignal];
  const symbol = displaySymbol(event.ticker);

  const fields: Array<[string, string]> = [
    ['Time', formatTimestamp(sentAt)],
    ['Symbol', event.ticker],
    ['Change', `${from} → ${to} (${event.fromSignal} → ${event.toSignal})`],
  ];
  if (event.value !== undefined) {
    fields.push([`Current ${symbol} Value`, String(event.value)]);
  }
  fields.push(['Data Date', event.date]);

  const text = [
    `${symbol} Color Change Alert`,
    '',
    ...fields.map(([label, value]) => `${label}: ${value}`),
    '',
    'This is an automated alert from nysi-watch.',
  ].join('\n');

  const html = [
    '<html>',
    '<body>',
    `<h2>${escapeHtml(symbol)} Color Change Alert</h2>`,
    ...fields.map(
      ([label, value]) => `<p><strong>${escapeHtml(label)}:</strong> ${escapeHtml(value)}</p>`
    ),
    '<br>',
    '<p>This is an automated alert from nysi-watch.</p>',
    '</body>',
    '</html>',
  ].join('\n');

  return { subject: formatSubject(event), text, html };
}
