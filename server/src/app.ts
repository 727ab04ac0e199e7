import cors from 'cors';
import express, { type Response } from 'express';
import { z } from 'zod';
import {
  categoryBreakdown,
  costFlow,
  cycleDistribution,
  dashboardKpis,
  enrichSubscription,
  enrichSubscriptions,
  filterSubscriptions,
  paymentTimeline,
  renewalWarnings,
  sortSubscriptions,
  topByMonthlyCost,
} from '../../src/domain/computations.js';
import { SUPPORTED_CURRENCIES } from '../../src/domain/currency.js';
import { BILLING_CYCLES, IMPORT_MODES, type EnrichedSubscription, type SortKey, type Subscription } from '../../src/domain/types.js';
import {
  SubscriptionInputSchema,
  SubscriptionPatchSchema,
  recordToInput,
  type ImportedRecord,
} from '../../src/domain/validation.js';
import type { AppConfig } from './config.js';
import { EXPORT_CONTENT_TYPES, exportCsv, exportFilename, exportXlsx } from './exporter.js';
import type { HistoryService } from './history.js';
import type { ReminderService } from './notifications.js';
import type { RateService } from './rates.js';
import type { SubscriptionStore } from './store.js';

export interface AppDeps {
  config: AppConfig;
  store: SubscriptionStore;
  rates: RateService;
  history: HistoryService;
  reminders: ReminderService;
  categories: () => string[];
  now?: () => Date;
}

const SORT_KEYS = ['days-asc', 'days-desc', 'cost-asc', 'cost-desc', 'name'] as const satisfies readonly SortKey[];

const ListQuerySchema = z.object({
  category: z.string().optional(),
  autoRenew: z.enum(['true', 'false']).optional(),
  sort: z.enum(SORT_KEYS).default('days-asc'),
});

const ImportBodySchema = z.object({
  mode: z.enum(IMPORT_MODES).default('append'),
  records: z.array(z.record(z.unknown())).min(1, 'No records to import'),
});

const HistoryQuerySchema = z.object({
  months: z.coerce.number().int().min(1).max(120).default(12),
  category: z.string().trim().min(1).optional(),
});

const ReminderBodySchema = z.object({
  days: z.coerce.number().int().min(0).max(365).optional(),
  force: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  email: z.string().email().optional(),
});

const ExportQuerySchema = z.object({
  format: z.enum(['csv', 'xlsx']).default('csv'),
});

function badRequest(res: Response, error: z.ZodError): void {
  const issue = error.issues[0];
  res.status(400).json({
    error: issue?.message ?? 'Invalid request',
    details: error.flatten().fieldErrors,
  });
}

export function createApp(deps: AppDeps) {
  const { config, store, rates, history, reminders } = deps;
  const now = deps.now ?? (() => new Date());
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  async function loadEnriched(): Promise<EnrichedSubscription[]> {
    const { rates: table } = await rates.getRates();
    return enrichSubscriptions(store.list(), table, config.baseCurrency, now());
  }

  async function enrichOne(sub: Subscription): Promise<EnrichedSubscription> {
    const { rates: table } = await rates.getRates();
    return enrichSubscription(sub, table, config.baseCurrency, now());
  }

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /options - values for the form selects
  app.get('/options', (_req, res) => {
    try {
      const inUse = store.list().map((s) => s.category);
      const categories = Array.from(new Set([...deps.categories(), ...inUse]));
      res.json({
        categories,
        cycles: BILLING_CYCLES,
        currencies: SUPPORTED_CURRENCIES,
        baseCurrency: config.baseCurrency,
        warningDays: config.warningDays,
        reminderDays: config.reminderDays,
        importModes: IMPORT_MODES,
      });
    } catch (error) {
      console.error('[API] Error fetching options:', error);
      res.status(500).json({ error: 'Failed to fetch options' });
    }
  });

  // --- Subscriptions ---

  // GET /subscriptions?category=&autoRenew=&sort=
  app.get('/subscriptions', async (req, res) => {
    const query = ListQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    try {
      const { category, autoRenew, sort } = query.data;
      const filtered = filterSubscriptions(await loadEnriched(), {
        category,
        autoRenew: autoRenew === undefined ? undefined : autoRenew === 'true',
      });
      res.json(sortSubscriptions(filtered, sort));
    } catch (error) {
      console.error('[API] Error fetching subscriptions:', error);
      res.status(500).json({ error: 'Failed to fetch subscriptions' });
    }
  });

  // POST /subscriptions - Create a single subscription
  app.post('/subscriptions', async (req, res) => {
    const body = SubscriptionInputSchema.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const created = store.add(body.data);
      res.status(201).json(await enrichOne(created));
    } catch (error) {
      console.error('[API] Error creating subscription:', error);
      res.status(500).json({ error: 'Failed to create subscription' });
    }
  });

  // PUT /subscriptions/:id - Partial update
  app.put('/subscriptions/:id', async (req, res) => {
    const body = SubscriptionPatchSchema.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const updated = store.update(req.params.id, body.data);
      if (!updated) {
        res.status(404).json({ error: 'Subscription not found' });
        return;
      }
      res.json(await enrichOne(updated));
    } catch (error) {
      console.error('[API] Error updating subscription:', error);
      res.status(500).json({ error: 'Failed to update subscription' });
    }
  });

  // DELETE /subscriptions/:id
  app.delete('/subscriptions/:id', (req, res) => {
    try {
      if (!store.remove(req.params.id)) {
        res.status(404).json({ error: 'Subscription not found' });
        return;
      }
      res.json({ ok: true });
    } catch (error) {
      console.error('[API] Error deleting subscription:', error);
      res.status(500).json({ error: 'Failed to delete subscription' });
    }
  });

  // POST /subscriptions/import - { mode, records }; any invalid row rejects the whole batch
  app.post('/subscriptions/import', (req, res) => {
    const body = ImportBodySchema.safeParse(req.body);
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const records: ImportedRecord[] = [];
      const rowErrors: { row: number; error: string }[] = [];
      body.data.records.forEach((record, index) => {
        const result = recordToInput(record, config.baseCurrency);
        if (result.ok) records.push(result.value);
        else rowErrors.push({ row: index + 1, error: result.error });
      });
      if (rowErrors.length > 0) {
        res.status(400).json({ error: `${rowErrors.length} invalid record(s)`, details: rowErrors });
        return;
      }

      res.json(store.import(records, body.data.mode));
    } catch (error) {
      console.error('[API] Error importing subscriptions:', error);
      res.status(500).json({ error: 'Failed to import subscriptions' });
    }
  });

  // --- Dashboard ---

  app.get('/summary', async (_req, res) => {
    try {
      const subs = await loadEnriched();
      res.json({
        baseCurrency: config.baseCurrency,
        warningDays: config.warningDays,
        kpis: dashboardKpis(subs, config.warningDays),
        upcoming: renewalWarnings(subs, config.warningDays),
        categories: categoryBreakdown(subs),
        cycles: cycleDistribution(subs),
        top: topByMonthlyCost(subs, 3),
        timeline: paymentTimeline(subs, 90),
        costFlow: costFlow(subs),
      });
    } catch (error) {
      console.error('[API] Error building summary:', error);
      res.status(500).json({ error: 'Failed to build summary' });
    }
  });

  // --- Rates ---

  app.get('/rates', async (_req, res) => {
    try {
      res.json(await rates.getRates());
    } catch (error) {
      console.error('[API] Error fetching rates:', error);
      res.status(500).json({ error: 'Failed to fetch rates' });
    }
  });

  app.post('/rates/refresh', async (_req, res) => {
    try {
      res.json(await rates.getRates({ forceRefresh: true }));
    } catch (error) {
      console.error('[API] Error refreshing rates:', error);
      res.status(500).json({ error: 'Failed to refresh rates' });
    }
  });

  // --- History ---

  // GET /history?months=&category=
  app.get('/history', (req, res) => {
    const query = HistoryQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    try {
      const { months, category } = query.data;
      res.json({
        snapshots: history.trend(months),
        growthRate: history.growthRate(),
        ...(category ? { categoryTrend: history.categoryTrend(category, months) } : {}),
      });
    } catch (error) {
      console.error('[API] Error fetching history:', error);
      res.status(500).json({ error: 'Failed to fetch history' });
    }
  });

  app.post('/history/snapshot', async (_req, res) => {
    try {
      res.status(201).json(history.recordSnapshot(await loadEnriched(), now()));
    } catch (error) {
      console.error('[API] Error recording snapshot:', error);
      res.status(500).json({ error: 'Failed to record snapshot' });
    }
  });

  // --- Reminders ---

  app.post('/reminders', async (req, res) => {
    const body = ReminderBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      badRequest(res, body.error);
      return;
    }
    try {
      const { days = config.reminderDays, force, dryRun, email } = body.data;
      const result = await reminders.checkAndRemind(await loadEnriched(), { days, force, dryRun, recipient: email });
      res.json(result);
    } catch (error) {
      console.error('[API] Error sending reminders:', error);
      res.status(500).json({ error: 'Failed to send reminders' });
    }
  });

  // --- Export ---

  app.get('/export', async (req, res) => {
    const query = ExportQuerySchema.safeParse(req.query);
    if (!query.success) {
      badRequest(res, query.error);
      return;
    }
    try {
      const { format } = query.data;
      const subs = await loadEnriched();
      const body = format === 'xlsx' ? exportXlsx(subs) : exportCsv(subs);
      res.setHeader('Content-Type', EXPORT_CONTENT_TYPES[format]);
      res.setHeader('Content-Disposition', `attachment; filename="${exportFilename(format, now())}"`);
      res.send(body);
    } catch (error) {
      console.error('[API] Error exporting subscriptions:', error);
      res.status(500).json({ error: 'Failed to export subscriptions' });
    }
  });

  return app;
}
