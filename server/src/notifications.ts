import nodemailer, { type Transporter } from 'nodemailer';
import { toDateKey, upcomingRenewals } from '../../src/domain/computations.js';
import { formatCurrency } from '../../src/domain/currency.js';
import type { EnrichedSubscription } from '../../src/domain/types.js';
import type { SmtpConfig } from './config.js';
import type { Db } from './db.js';

export const DEFAULT_REMINDER_DAYS = 3;
const LOG_RETENTION_DAYS = 30;
const MS_PER_DAY = 86_400_000;
const RULE = '='.repeat(40);

export interface ReminderOptions {
  days?: number;
  force?: boolean;
  dryRun?: boolean;
  recipient?: string;
}

export interface ReminderResult {
  success: boolean;
  message: string;
  sent: string[];
  skipped: string[];
  /** Text body that was (or, on a dry run, would be) sent */
  preview?: string;
}

export interface SendResult {
  success: boolean;
  message: string;
}

export interface ReminderServiceOptions {
  smtp: SmtpConfig;
  baseCurrency: string;
  transport?: Transporter;
  now?: () => Date;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function dueText(daysRemaining: number): string {
  if (daysRemaining === 0) return 'today';
  return daysRemaining === 1 ? 'in 1 day' : `in ${daysRemaining} days`;
}

function splitByRenewal(subs: EnrichedSubscription[]) {
  return {
    auto: subs.filter((s) => s.autoRenew),
    manual: subs.filter((s) => !s.autoRenew),
  };
}

function totalInBase(subs: EnrichedSubscription[]): number {
  return subs.reduce((sum, s) => sum + s.amountInBase, 0);
}

/** Plain-text reminder body */
export function formatReminderText(subs: EnrichedSubscription[], baseCurrency: string, now: Date = new Date()): string {
  if (subs.length === 0) return 'No subscriptions need attention right now.';

  const { auto, manual } = splitByRenewal(subs);
  const lines = ['Subscription renewal reminder', RULE, `${subs.length} subscription(s) are due soon:`, ''];

  const section = (title: string, members: EnrichedSubscription[]) => {
    if (members.length === 0) return;
    lines.push(title, '');
    for (const s of members) {
      lines.push(`* ${s.name} (${s.category})`);
      lines.push(`  Amount: ${formatCurrency(s.amount, s.currency)}`);
      lines.push(`  Due: ${dueText(s.daysRemaining)}`);
      lines.push('');
    }
  };
  section('[Auto-renewing] These will be charged:', auto);
  section('[Manual renewal] These will lapse unless renewed:', manual);

  lines.push(RULE);
  lines.push(`Total: ${formatCurrency(totalInBase(subs), baseCurrency)}`);
  lines.push('');
  if (auto.length > 0) lines.push('Cancel any auto-renewing subscription you no longer need before it charges.');
  if (manual.length > 0) lines.push('Renew manual subscriptions in time or they will expire.');
  lines.push(`Sent: ${toDateKey(now)} ${now.toTimeString().slice(0, 5)}`);

  return lines.join('\n');
}

/** HTML reminder body; every record value is escaped */
export function formatReminderHtml(subs: EnrichedSubscription[], baseCurrency: string): string {
  if (subs.length === 0) return '<p>No subscriptions need attention right now.</p>';

  const { auto, manual } = splitByRenewal(subs);

  const table = (title: string, cls: string, members: EnrichedSubscription[]) => {
    if (members.length === 0) return '';
    const rows = members
      .map(
        (s) => `
        <tr>
          <td>${escapeHtml(s.name)}</td>
          <td>${escapeHtml(s.category)}</td>
          <td class="amount">${escapeHtml(formatCurrency(s.amount, s.currency))}</td>
          <td>${escapeHtml(dueText(s.daysRemaining))}</td>
        </tr>`,
      )
      .join('');
    return `
      <div class="section-title ${cls}">${title}</div>
      <table>
        <tr><th>Service</th><th>Category</th><th>Amount</th><th>Due</th></tr>${rows}
      </table>`;
  };

  return `<html>
  <head>
    <style>
      body { font-family: Arial, sans-serif; }
      .header { background-color: #ff4b4b; color: white; padding: 20px; text-align: center; }
      .content { padding: 20px; }
      .section-title { background-color: #f0f0f0; padding: 10px; margin: 15px 0 10px 0; border-radius: 5px; }
      .auto-renew { color: #ff4b4b; }
      .manual-renew { color: #ffa500; }
      .amount { font-weight: bold; }
      table { width: 100%; border-collapse: collapse; margin-bottom: 20px; }
      th, td { padding: 10px; text-align: left; border-bottom: 1px solid #ddd; }
    </style>
  </head>
  <body>
    <div class="header"><h1>Subscription renewal reminder</h1></div>
    <div class="content">
      <p><strong>${subs.length}</strong> subscription(s) are due soon.</p>
      ${table('Auto-renewing: these will be charged', 'auto-renew', auto)}
      ${table('Manual renewal: these will lapse unless renewed', 'manual-renew', manual)}
      <p>Total: <strong>${escapeHtml(formatCurrency(totalInBase(subs), baseCurrency))}</strong></p>
    </div>
  </body>
</html>`;
}

/**
 * Renewal reminders by email. Each subscription is reminded at most once
 * per calendar day unless forced; the send log lives in SQLite.
 */
export class ReminderService {
  private readonly now: () => Date;

  constructor(
    private readonly db: Db,
    private readonly options: ReminderServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  upcoming(subs: EnrichedSubscription[], days = DEFAULT_REMINDER_DAYS): EnrichedSubscription[] {
    return upcomingRenewals(subs, days);
  }

  /** Split into those still due a reminder today and the names already reminded */
  filterForToday(subs: EnrichedSubscription[], force = false): { toSend: EnrichedSubscription[]; skipped: string[] } {
    if (force || subs.length === 0) return { toSend: subs, skipped: [] };

    const sentToday = this.db.prepare<[string, string], { n: number }>(
      'SELECT COUNT(*) AS n FROM notification_log WHERE subscription_name = ? AND sent_date = ? AND email_sent = 1',
    );
    const today = toDateKey(this.now());
    const toSend: EnrichedSubscription[] = [];
    const skipped: string[] = [];
    for (const s of subs) {
      const row = sentToday.get(s.name, today);
      if (row && row.n > 0) skipped.push(s.name);
      else toSend.push(s);
    }
    return { toSend, skipped };
  }

  async send(subs: EnrichedSubscription[], recipient?: string): Promise<SendResult> {
    if (subs.length === 0) return { success: true, message: 'Nothing to send' };

    const { smtp, baseCurrency } = this.options;
    const to = recipient || smtp.recipient;
    if (!smtp.username || !smtp.password) {
      return { success: false, message: 'SMTP is not configured (set SMTP_USERNAME and SMTP_PASSWORD)' };
    }
    if (!to) {
      return { success: false, message: 'No recipient (set RECIPIENT_EMAIL or pass one)' };
    }

    const transport = this.options.transport ?? this.createTransport();
    try {
      await transport.sendMail({
        from: smtp.sender || smtp.username,
        to,
        subject: `Subscription reminder: ${subs.length} renewal(s) due soon`,
        text: formatReminderText(subs, baseCurrency, this.now()),
        html: formatReminderHtml(subs, baseCurrency),
      });
      console.log(`[Reminders] Sent reminder for ${subs.length} subscription(s) to ${to}`);
      return { success: true, message: `Reminder sent to ${to}` };
    } catch (error) {
      console.error('[Reminders] Failed to send reminder:', error);
      const reason = error instanceof Error ? error.message : String(error);
      return { success: false, message: `Failed to send reminder: ${reason}` };
    }
  }

  async checkAndRemind(subs: EnrichedSubscription[], options: ReminderOptions = {}): Promise<ReminderResult> {
    const { days = DEFAULT_REMINDER_DAYS, force = false, dryRun = false, recipient } = options;

    const due = this.upcoming(subs, days);
    if (due.length === 0) {
      return { success: true, message: `No subscriptions due within ${days} days`, sent: [], skipped: [] };
    }

    const { toSend, skipped } = this.filterForToday(due, force);
    if (toSend.length === 0) {
      return { success: true, message: 'All due subscriptions were already reminded today', sent: [], skipped };
    }

    const preview = formatReminderText(toSend, this.options.baseCurrency, this.now());
    if (dryRun) {
      return {
        success: true,
        message: `Dry run: ${toSend.length} reminder(s) would be sent`,
        sent: [],
        skipped,
        preview,
      };
    }

    const result = await this.send(toSend, recipient);
    this.recordSent(toSend, result.success);
    if (result.success) this.cleanupLog();

    return {
      success: result.success,
      message: result.message,
      sent: result.success ? toSend.map((s) => s.name) : [],
      skipped,
      preview,
    };
  }

  private recordSent(subs: EnrichedSubscription[], emailSent: boolean): void {
    const insert = this.db.prepare<[string, string, number, number]>(
      'INSERT INTO notification_log (subscription_name, sent_date, days_remaining, email_sent) VALUES (?, ?, ?, ?)',
    );
    const today = toDateKey(this.now());
    const insertAll = this.db.transaction((items: EnrichedSubscription[]) => {
      for (const s of items) insert.run(s.name, today, s.daysRemaining, emailSent ? 1 : 0);
    });
    insertAll(subs);
  }

  private cleanupLog(): void {
    const cutoff = toDateKey(new Date(this.now().getTime() - LOG_RETENTION_DAYS * MS_PER_DAY));
    const { changes } = this.db.prepare<[string]>('DELETE FROM notification_log WHERE sent_date < ?').run(cutoff);
    if (changes > 0) console.log(`[Reminders] Removed ${changes} old log entries`);
  }

  private createTransport(): Transporter {
    const { smtp } = this.options;
    // Port 587 with STARTTLS
    return nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: false,
      requireTLS: true,
      auth: { user: smtp.username, pass: smtp.password },
    });
  }
}
