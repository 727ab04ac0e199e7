/**
 * Renewal reminder entry point for cron:
 *   npm run remind -- --days 14
 *   npm run remind -- --dry-run
 */
import { runRemind } from '../src/cli.js';
import { getConfig } from '../src/config.js';
import { openDatabase } from '../src/db.js';
import { ReminderService } from '../src/notifications.js';
import { RateService } from '../src/rates.js';
import { SubscriptionStore } from '../src/store.js';

const config = getConfig();
const db = openDatabase(config.dbFile);

runRemind(process.argv.slice(2), {
  store: new SubscriptionStore(config.subscriptionsFile, config.baseCurrency),
  rates: new RateService(db, {
    token: config.rateApiToken,
    baseCurrency: config.baseCurrency,
    ttlSeconds: config.rateCacheTtlSeconds,
  }),
  reminders: new ReminderService(db, { smtp: config.smtp, baseCurrency: config.baseCurrency }),
  baseCurrency: config.baseCurrency,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  })
  .finally(() => db.close());
