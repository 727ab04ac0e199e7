import nodemailer, { type Transporter } from 'nodemailer';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EnrichedSubscription } from '../../src/domain/types.js';
import type { SmtpConfig } from '../src/config.js';
import { openDatabase, type Db } from '../src/db.js';
import { ReminderService, formatReminderHtml, formatReminderText } from '../src/notifications.js';

const SMTP: SmtpConfig = {
  host: 'smtp.example.com',
  port: 587,
  username: 'test-user',
  password: 'test-secret',
  sender: 'reminders@example.com',
  recipient: 'me@example.com',
};

function makeEnriched(overrides: Partial<EnrichedSubscription> = {}): EnrichedSubscription {
  return {
    id: 'a1',
    name: 'Chatbot Pro',
    vendor: 'Bots Ltd',
    category: 'AI',
    cycle: 'monthly',
    amount: 20,
    currency: 'USD',
    nextPayment: '2025-03-01',
    autoRenew: true,
    daysRemaining: 0,
    amountInBase: 710,
    monthlyCost: 710,
    ...overrides,
  };
}

const CHATBOT = makeEnriched();
const TUNE_BOX = makeEnriched({
  id: 'b1',
  name: 'Tune Box',
  category: 'Music',
  amount: 129,
  currency: 'THB',
  amountInBase: 129,
  monthlyCost: 129,
  nextPayment: '2025-03-03',
  daysRemaining: 2,
  autoRenew: false,
});
const LATER = makeEnriched({ id: 'c1', name: 'Later', daysRemaining: 5 });
const LAPSED = makeEnriched({ id: 'd1', name: 'Lapsed', daysRemaining: -1 });

describe('reminder messages', () => {
  const now = new Date(2025, 2, 1, 9, 0);

  it('splits the text body into auto-renewing and manual sections', () => {
    const rule = '='.repeat(40);
    expect(formatReminderText([CHATBOT, TUNE_BOX], 'THB', now)).toBe(
      [
        'Subscription renewal reminder',
        rule,
        '2 subscription(s) are due soon:',
        '',
        '[Auto-renewing] These will be charged:',
        '',
        '* Chatbot Pro (AI)',
        '  Amount: $20.00',
        '  Due: today',
        '',
        '[Manual renewal] These will lapse unless renewed:',
        '',
        '* Tune Box (Music)',
        '  Amount: ฿129.00',
        '  Due: in 2 days',
        '',
        rule,
        'Total: ฿839.00',
        '',
        'Cancel any auto-renewing subscription you no longer need before it charges.',
        'Renew manual subscriptions in time or they will expire.',
        'Sent: 2025-03-01 09:00',
      ].join('\n'),
    );
  });

  it('omits an empty section', () => {
    const text = formatReminderText([TUNE_BOX], 'THB', now);
    expect(text).not.toContain('[Auto-renewing]');
    expect(text).toContain('Total: ฿129.00');
  });

  it('escapes record values in the HTML body', () => {
    const html = formatReminderHtml([makeEnriched({ name: '<b>Evil</b> & Co', category: 'A"I' })], 'THB');
    expect(html).toContain('<td>&lt;b&gt;Evil&lt;/b&gt; &amp; Co</td>');
    expect(html).toContain('<td>A&quot;I</td>');
    expect(html).toContain('<td class="amount">$20.00</td>');
    expect(html).not.toContain('<b>Evil</b>');
  });

  it('has a short body for an empty list', () => {
    expect(formatReminderText([], 'THB')).toBe('No subscriptions need attention right now.');
    expect(formatReminderHtml([], 'THB')).toBe('<p>No subscriptions need attention right now.</p>');
  });
});

describe('ReminderService', () => {
  let db: Db;
  let now: Date;
  let transport: Transporter;

  beforeEach(() => {
    db = openDatabase(':memory:');
    now = new Date(2025, 2, 1, 9, 0);
    transport = nodemailer.createTransport({ jsonTransport: true });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  function service(smtp: SmtpConfig = SMTP) {
    return new ReminderService(db, { smtp, baseCurrency: 'THB', transport, now: () => now });
  }

  function logCount(): number {
    return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM notification_log').get()?.n ?? 0;
  }

  it('picks subscriptions due within the window, soonest first', () => {
    expect(service().upcoming([LATER, TUNE_BOX, LAPSED, CHATBOT], 3).map((s) => s.id)).toEqual(['a1', 'b1']);
  });

  it('sends through the transport and logs each subscription', async () => {
    const sendMail = vi.spyOn(transport, 'sendMail');
    const result = await service().checkAndRemind([CHATBOT, TUNE_BOX, LATER]);

    expect(result).toMatchObject({
      success: true,
      message: 'Reminder sent to me@example.com',
      sent: ['Chatbot Pro', 'Tune Box'],
      skipped: [],
    });
    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail.mock.calls[0][0]).toMatchObject({
      from: 'reminders@example.com',
      to: 'me@example.com',
      subject: 'Subscription reminder: 2 renewal(s) due soon',
    });
    expect(logCount()).toBe(2);
  });

  it('reminds each subscription once per day unless forced', async () => {
    const reminders = service();
    await reminders.checkAndRemind([CHATBOT, TUNE_BOX]);

    const again = await reminders.checkAndRemind([CHATBOT, TUNE_BOX]);
    expect(again).toEqual({
      success: true,
      message: 'All due subscriptions were already reminded today',
      sent: [],
      skipped: ['Chatbot Pro', 'Tune Box'],
    });

    const forced = await reminders.checkAndRemind([CHATBOT], { force: true });
    expect(forced.sent).toEqual(['Chatbot Pro']);

    now = new Date(2025, 2, 2, 9, 0);
    const nextDay = await reminders.checkAndRemind([CHATBOT]);
    expect(nextDay.sent).toEqual(['Chatbot Pro']);
  });

  it('sends and records nothing on a dry run', async () => {
    const sendMail = vi.spyOn(transport, 'sendMail');
    const result = await service().checkAndRemind([CHATBOT], { dryRun: true });

    expect(result.message).toBe('Dry run: 1 reminder(s) would be sent');
    expect(result.preview).toContain('* Chatbot Pro (AI)');
    expect(sendMail).not.toHaveBeenCalled();
    expect(logCount()).toBe(0);
  });

  it('reports when nothing is due', async () => {
    expect(await service().checkAndRemind([LATER, LAPSED], { days: 3 })).toEqual({
      success: true,
      message: 'No subscriptions due within 3 days',
      sent: [],
      skipped: [],
    });
  });

  it('fails without SMTP credentials or a recipient', async () => {
    expect(await service({ ...SMTP, password: '' }).send([CHATBOT])).toEqual({
      success: false,
      message: 'SMTP is not configured (set SMTP_USERNAME and SMTP_PASSWORD)',
    });
    expect(await service({ ...SMTP, recipient: '' }).send([CHATBOT])).toEqual({
      success: false,
      message: 'No recipient (set RECIPIENT_EMAIL or pass one)',
    });
    expect(await service({ ...SMTP, recipient: '' }).send([CHATBOT], 'other@example.com')).toEqual({
      success: true,
      message: 'Reminder sent to other@example.com',
    });
  });

  it('treats an empty list as sent', async () => {
    expect(await service({ ...SMTP, username: '' }).send([])).toEqual({ success: true, message: 'Nothing to send' });
  });

  it('does not count a failed send as reminded', async () => {
    vi.spyOn(transport, 'sendMail').mockRejectedValueOnce(new Error('connection refused'));
    const reminders = service();

    const failed = await reminders.checkAndRemind([CHATBOT]);
    expect(failed).toMatchObject({ success: false, message: 'Failed to send reminder: connection refused', sent: [] });

    const retried = await reminders.checkAndRemind([CHATBOT]);
    expect(retried.sent).toEqual(['Chatbot Pro']);
  });

  it('drops log entries older than thirty days after sending', async () => {
    db.prepare("INSERT INTO notification_log (subscription_name, sent_date, days_remaining) VALUES ('Old', '2025-01-15', 1)").run();
    db.prepare("INSERT INTO notification_log (subscription_name, sent_date, days_remaining) VALUES ('Recent', '2025-02-10', 1)").run();

    await service().checkAndRemind([CHATBOT]);

    const names = db
      .prepare<[], { subscription_name: string }>('SELECT subscription_name FROM notification_log ORDER BY id')
      .all()
      .map((r) => r.subscription_name);
    expect(names).toEqual(['Recent', 'Chatbot Pro']);
  });
});
