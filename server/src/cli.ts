import { enrichSubscriptions } from '../../src/domain/computations.js';
import type { Subscription } from '../../src/domain/types.js';
import type { ReminderService } from './notifications.js';
import type { RateService } from './rates.js';
import type { SubscriptionStore } from './store.js';

export const REMIND_HELP = `remind [options]

Send renewal reminders for subscriptions due soon. Meant to be run from cron.

Options:
  --days, -d <n>       Days ahead to check (default: 7)
  --dry-run            Print the reminder without sending it
  --email, -e <addr>   Recipient (overrides RECIPIENT_EMAIL)
  --force              Send even if already reminded today
  --help, -h           Show this help
`;

export interface RemindArgs {
  days: number;
  dryRun: boolean;
  email: string | null;
  force: boolean;
  help: boolean;
}

function getFlag(args: string[], name: string, alias?: string): string | null {
  const idx = args.findIndex((arg) => arg === name || arg === alias);
  if (idx === -1) return null;
  return args[idx + 1] ?? null;
}

function parseDays(value: string | null, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export function parseRemindArgs(args: string[]): RemindArgs {
  return {
    days: parseDays(getFlag(args, '--days', '-d'), 7),
    dryRun: args.includes('--dry-run'),
    email: getFlag(args, '--email', '-e'),
    force: args.includes('--force'),
    help: args.includes('--help') || args.includes('-h'),
  };
}

export interface RemindDeps {
  store: SubscriptionStore;
  rates: RateService;
  reminders: ReminderService;
  baseCurrency: string;
  now?: () => Date;
  log?: (line: string) => void;
}

const RULE = '='.repeat(50);

/** Returns the process exit code */
export async function runRemind(argv: string[], deps: RemindDeps): Promise<number> {
  const log = deps.log ?? ((line: string) => console.log(line));
  const now = deps.now ?? (() => new Date());
  const args = parseRemindArgs(argv);
  if (args.help) {
    log(REMIND_HELP);
    return 0;
  }

  log(RULE);
  log('Subscription renewal reminders');
  log(RULE);

  let subscriptions: Subscription[];
  try {
    subscriptions = deps.store.list();
    log(`Loaded ${subscriptions.length} subscription(s)`);
  } catch (error) {
    log(`Failed to load subscriptions: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const { rates } = await deps.rates.getRates();
  const enriched = enrichSubscriptions(subscriptions, rates, deps.baseCurrency, now());

  log(`Checking for renewals due within ${args.days} day(s)...`);
  const result = await deps.reminders.checkAndRemind(enriched, {
    days: args.days,
    force: args.force,
    dryRun: args.dryRun,
    recipient: args.email ?? undefined,
  });

  if (result.preview) {
    log('');
    log(result.preview);
    log('');
  }
  if (result.skipped.length > 0) {
    log(`Already reminded today: ${result.skipped.join(', ')}`);
  }
  log(RULE);
  log(result.success ? result.message : `Failed: ${result.message}`);
  log(RULE);

  return result.success ? 0 : 1;
}
