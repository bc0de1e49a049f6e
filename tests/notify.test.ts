import { describe, expect, it, vi } from 'vitest';
import { EmailNotifier, NoopNotifier, createNotifier } from '../src/modules/nysi/notify/email';
import type { EmailConfig, MailMessage, MailTransport } from '../src/modules/nysi/notify/email';
import { displaySymbol, formatSubject, formatTransition } from '../src/modules/nysi/notify/format';
import type { TransitionEvent } from '../src/modules/nysi/types';
import { captureLogger } from './fakes';

const EVENT: TransitionEvent = {
  ticker: '$NYSI',
  fromSignal: 'Declining',
  toSignal: 'Rising',
  date: '2024-01-11',
  value: 250.5,
};

const SENT_AT = new Date(2024, 0, 11, 9, 31, 5);

const CONFIG: EmailConfig = {
  host: 'smtp.example.com',
  port: 587,
  secure: false,
  user: 'alerts@example.com',
  pass: 'test-secret',
  from: 'alerts@example.com',
  recipients: ['a@example.com', 'b@example.com'],
};

class FakeTransport implements MailTransport {
  readonly sent: MailMessage[] = [];
  sendError: Error | null = null;
  verifyError: Error | null = null;

  async sendMail(message: MailMessage): Promise<unknown> {
    if (this.sendError) throw this.sendError;
    this.sent.push(message);
    return { messageId: 'test' };
  }

  async verify(): Promise<unknown> {
    if (this.verifyError) throw this.verifyError;
    return true;
  }
}

describe('formatTransition', () => {
  it('names the symbol and both colours in the subject', () => {
    expect(displaySymbol('$NYSI')).toBe('NYSI');
    expect(formatSubject(EVENT)).toBe('NYSI Alert: Color Changed from Red to Black');
  });

  it('writes a plain-text body', () => {
    expect(formatTransition(EVENT, SENT_AT).text).toBe(
      [
        'NYSI Color Change Alert',
        '',
        'Time: 2024-01-11 09:31:05',
        'Symbol: $NYSI',
        'Change: Red → Black (Declining → Rising)',
        'Current NYSI Value: 250.5',
        'Data Date: 2024-01-11',
        '',
        'This is an automated alert from nysi-watch.',
      ].join('\n')
    );
  });

  it('leaves out the value line when there is no value', () => {
    const { text } = formatTransition({ ...EVENT, value: undefined }, SENT_AT);
    expect(text).not.toContain('Value:');
  });

  it('escapes the HTML body', () => {
    const { html } = formatTransition({ ...EVENT, ticker: '<b>X' }, SENT_AT);
    expect(html).toContain('<h2>&lt;b&gt;X Color Change Alert</h2>');
    expect(html).toContain('<p><strong>Symbol:</strong> &lt;b&gt;X</p>');
  });
});

describe('EmailNotifier', () => {
  it('sends one message to every recipient', async () => {
    const transport = new FakeTransport();
    const logger = captureLogger();
    await new EmailNotifier(CONFIG, transport, logger, () => SENT_AT).notify(EVENT);

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0]).toMatchObject({
      from: 'alerts@example.com',
      to: 'a@example.com, b@example.com',
      subject: 'NYSI Alert: Color Changed from Red to Black',
    });
    expect(logger.lines).toEqual(['📧 Email notification sent to a@example.com, b@example.com']);
  });

  it('raises a delivery failure when sending fails', async () => {
    const transport = new FakeTransport();
    transport.sendError = new Error('auth failed');

    await expect(new EmailNotifier(CONFIG, transport, captureLogger()).notify(EVENT)).rejects.toMatchObject({
      code: 'DELIVERY_FAILURE',
      ticker: '$NYSI',
      message: 'Failed to send email to a@example.com, b@example.com: auth failed',
    });
  });

  it('verifies credentials without sending', async () => {
    const transport = new FakeTransport();
    const logger = captureLogger();
    const notifier = new EmailNotifier(CONFIG, transport, logger);

    expect(await notifier.verify()).toBe(true);
    transport.verifyError = new Error('535 bad credentials');
    expect(await notifier.verify()).toBe(false);
    expect(transport.sent).toHaveLength(0);
    expect(logger.lines).toEqual([
      '✅ Email credentials validated successfully',
      '❌ Email validation failed: 535 bad credentials',
    ]);
  });
});

describe('createNotifier', () => {
  it('falls back to a no-op notifier without credentials', async () => {
    const logger = captureLogger();
    const notifier = createNotifier(null, logger);

    expect(notifier).toBeInstanceOf(NoopNotifier);
    expect(notifier.enabled).toBe(false);
    await notifier.notify(EVENT);
    expect(await notifier.verify()).toBe(false);
    expect(logger.lines[0]).toBe('⚠️  No SMTP credentials found. Email notifications will be disabled.');
  });

  it('builds an SMTP notifier from a config', () => {
    const warn = vi.fn();
    const notifier = createNotifier(CONFIG, { log: vi.fn(), warn, error: vi.fn() });
    expect(notifier).toBeInstanceOf(EmailNotifier);
    expect(warn).not.toHaveBeenCalled();
  });
});
