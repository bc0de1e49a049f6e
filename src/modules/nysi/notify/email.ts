/**
 * Email notifier
 *
 * Sends transition alerts over SMTP with nodemailer. Without credentials the
 * notifier is a no-op that logs what it would have sent.
 */

import { createTransport } from 'nodemailer';
import { MonitorError, toError } from '../errors';
import type { TransitionEvent } from '../types';
import { formatTransition } from './format';

export interface EmailConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  from: string;
  recipients: string[];
}

export interface Notifier {
  readonly enabled: boolean;
  /**
   * @throws MonitorError DELIVERY_FAILURE
   */
  notify(event: TransitionEvent): Promise<void>;
  /**
   * Check credentials without sending anything
   */
  verify(): Promise<boolean>;
}

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  html: string;
}

// The slice of a nodemailer Transporter the notifier uses
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
  verify(): Promise<unknown>;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export function createSmtpTransport(config: EmailConfig): MailTransport {
  return createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: { user: config.user, pass: config.pass },
  });
}

export class EmailNotifier implements Notifier {
  readonly enabled = true;

  constructor(
    private readonly config: EmailConfig,
    private readonly transport: MailTransport = createSmtpTransport(config),
    private readonly logger: Logger = console,
    private readonly now: () => Date = () => new Date()
  ) {}

  async notify(event: TransitionEvent): Promise<void> {
    const message = formatTransition(event, this.now());
    const to = this.config.recipients.join(', ');

    try {
      await this.transport.sendMail({
        from: this.config.from,
        to,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    } catch (error) {
      throw new MonitorError(
        `Failed to send email to ${to}: ${toError(error).message}`,
        'DELIVERY_FAILURE',
        event.ticker,
        toError(error)
      );
    }
    this.logger.log(`📧 Email notification sent to ${to}`);
  }

  async verify(): Promise<boolean> {
    try {
      await this.transport.verify();
      this.logger.log('✅ Email credentials validated successfully');
      return true;
    } catch (error) {
      this.logger.error(`❌ Email validation failed: ${toError(error).message}`);
      return false;
    }
  }
}

export class NoopNotifier implements Notifier {
  readonly enabled = false;

  constructor(private readonly logger: Logger = console) {}

  async notify(event: TransitionEvent): Promise<void> {
    this.logger.warn(
      `⚠️  Email notifications disabled; not sending ${event.ticker} ${event.fromSignal} -> ${event.toSignal} (${event.date})`
    );
  }

  async verify(): Promise<boolean> {
    this.logger.warn('⚠️  Email validation skipped: SMTP_USER/SMTP_PASS not configured');
    return false;
  }
}

/**
 * Email notifier when configured, otherwise a no-op with a warning
 */
export function createNotifier(config: EmailConfig | null, logger: Logger = console): Notifier {
  if (!config) {
    logger.warn('⚠️  No SMTP credentials found. Email notifications will be disabled.');
    return new NoopNotifier(logger);
  }
  return new EmailNotifier(config, createSmtpTransport(config), logger);
}
