import { createApp } from './app.js';
import { getConfig } from './config.js';
import { openDatabase } from './db.js';
import { HistoryService } from './history.js';
import { ReminderService } from './notifications.js';
import { RateService } from './rates.js';
import { SubscriptionStore, loadCategories } from './store.js';

const config = getConfig();
const db = openDatabase(config.dbFile);

const app = createApp({
  config,
  store: new SubscriptionStore(config.subscriptionsFile, config.baseCurrency),
  rates: new RateService(db, {
    token: config.rateApiToken,
    baseCurrency: config.baseCurrency,
    ttlSeconds: config.rateCacheTtlSeconds,
  }),
  history: new HistoryService(db),
  reminders: new ReminderService(db, { smtp: config.smtp, baseCurrency: config.baseCurrency }),
  categories: () => loadCategories(config.categoriesFile),
});

app.listen(config.port, () => {
  console.log(`[API] Server running on http://localhost:${config.port}`);
  console.log(`[API] Subscriptions file: ${config.subscriptionsFile}`);
});
