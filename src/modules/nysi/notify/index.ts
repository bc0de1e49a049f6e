/**
 * Notification exports
 */

export { EmailNotifier, NoopNotifier, createNotifier, createSmtpTransport } from './email';
export type { EmailConfig, Logger, MailMessage, MailTransport, Notifier } from './email';
export { formatTransition, formatSubject, displaySymbol } from './format';
export type { TransitionMessage } from './format';
