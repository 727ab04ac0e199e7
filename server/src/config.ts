import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

export interface SmtpConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  sender: string;
  recipient: string;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  subscriptionsFile: string;
  categoriesFile: string;
  dbFile: string;
  baseCurrency: string;
  warningDays: number;
  reminderDays: number;
  rateApiToken: string;
  rateCacheTtlSeconds: number;
  smtp: SmtpConfig;
}

function intOr(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Build the config from an environment map (process.env by default) */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = path.resolve(projectRoot, env.DATA_DIR || 'data');
  const username = env.SMTP_USERNAME ?? '';

  return Object.freeze({
    port: intOr(env.PORT, 8787),
    dataDir,
    subscriptionsFile: env.SUBSCRIPTIONS_FILE || path.join(dataDir, 'subscriptions.csv'),
    categoriesFile: env.CATEGORIES_FILE || path.join(dataDir, 'categories.csv'),
    dbFile: env.DB_FILE || path.join(dataDir, 'subdash.db'),
    baseCurrency: (env.BASE_CURRENCY || 'THB').toUpperCase(),
    warningDays: intOr(env.WARNING_DAYS, 7),
    reminderDays: intOr(env.REMINDER_DAYS, 3),
    rateApiToken: env.RATE_API_TOKEN ?? '',
    rateCacheTtlSeconds: intOr(env.RATE_CACHE_TTL_SECONDS, 3600),
    smtp: Object.freeze({
      host: env.SMTP_SERVER || 'smtp.gmail.com',
      port: intOr(env.SMTP_PORT, 587),
      username,
      password: env.SMTP_PASSWORD ?? '',
      sender: env.SENDER_EMAIL || username,
      recipient: env.RECIPIENT_EMAIL ?? '',
    }),
  });
}

let cached: AppConfig | null = null;

/** Process-wide config; reads `.env` at the project root on first use */
export function getConfig(): AppConfig {
  if (!cached) {
    dotenv.config({ path: path.join(projectRoot, '.env') });
    cached = loadConfig();
  }
  return cached;
}
