import fs from 'fs';
import type { Server } from 'http';
import nodemailer from 'nodemailer';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { openDatabase, type Db } from '../src/db.js';
import { HistoryService } from '../src/history.js';
import { ReminderService } from '../src/notifications.js';
import { RateService } from '../src/rates.js';
import { SubscriptionStore } from '../src/store.js';

const NOW = new Date(2025, 2, 1, 9, 0);

const CHATBOT = {
  name: 'Chatbot Pro',
  vendor: 'Bots Ltd',
  category: 'AI',
  cycle: 'monthly',
  amount: 20,
  currency: 'USD',
  nextPayment: '2025-03-04',
  autoRenew: true,
};

const CLOUD_DISK = {
  name: 'Cloud Disk',
  vendor: 'Disk Co',
  category: 'System',
  cycle: 'yearly',
  amount: 1200,
  currency: 'THB',
  nextPayment: '2025-08-01',
  autoRenew: false,
};

describe('HTTP API', () => {
  let dir: string;
  let db: Db;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'subdash-api-'));
    db = openDatabase(':memory:');
    const config = loadConfig({
      DATA_DIR: dir,
      SMTP_USERNAME: 'test-user',
      SMTP_PASSWORD: 'test-secret',
      RECIPIENT_EMAIL: 'me@example.com',
    });

    const app = createApp({
      config,
      store: new SubscriptionStore(config.subscriptionsFile, config.baseCurrency, () => NOW),
      // No token: the service never leaves the process and serves the built-in table
      rates: new RateService(db, { token: '', baseCurrency: 'THB', ttlSeconds: 3600, now: () => NOW }),
      history: new HistoryService(db),
      reminders: new ReminderService(db, {
        smtp: config.smtp,
        baseCurrency: 'THB',
        transport: nodemailer.createTransport({ jsonTransport: true }),
        now: () => NOW,
      }),
      categories: () => ['AI', 'Video'],
      now: () => NOW,
    });

    server = app.listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server did not bind a port');
    baseUrl = `http://127.0.0.1:${address.port}`;

    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function request(method: string, route: string, body?: unknown) {
    return fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function create(input: object): Promise<{ id: string }> {
    const res = await request('POST', '/subscriptions', input);
    expect(res.status).toBe(201);
    return res.json();
  }

  it('answers health checks', async () => {
    const res = await request('GET', '/health');
    expect(await res.json()).toEqual({ ok: true });
  });

  it('creates a subscription and returns it enriched', async () => {
    const res = await request('POST', '/subscriptions', CHATBOT);
    expect(res.status).toBe(201);

    const body = await res.json();
    expect(body).toMatchObject({ ...CHATBOT, daysRemaining: 3, amountInBase: 710, monthlyCost: 710 });
    expect(body.id).toMatch(/^c/);
  });

  it('rejects an invalid body with the first problem', async () => {
    const res = await request('POST', '/subscriptions', { ...CHATBOT, amount: 0 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Amount must be greater than 0',
      details: { amount: ['Amount must be greater than 0'] },
    });
  });

  it('lists with filters and sorting', async () => {
    await create(CHATBOT);
    await create(CLOUD_DISK);
    await create({ ...CHATBOT, name: 'Code Helper', amount: 10 });

    const all = await (await request('GET', '/subscriptions?sort=cost-desc')).json();
    expect(all.map((s: { name: string }) => s.name)).toEqual(['Chatbot Pro', 'Code Helper', 'Cloud Disk']);

    const manual = await (await request('GET', '/subscriptions?autoRenew=false')).json();
    expect(manual.map((s: { name: string }) => s.name)).toEqual(['Cloud Disk']);

    const ai = await (await request('GET', '/subscriptions?category=AI&sort=name')).json();
    expect(ai.map((s: { name: string }) => s.name)).toEqual(['Chatbot Pro', 'Code Helper']);

    expect((await request('GET', '/subscriptions?sort=random')).status).toBe(400);
  });

  it('updates and deletes by id', async () => {
    const { id } = await create(CHATBOT);

    const updated = await request('PUT', `/subscriptions/${id}`, { amount: 25, cycle: 'quarterly' });
    expect(updated.status).toBe(200);
    expect(await updated.json()).toMatchObject({ id, amount: 25, cycle: 'quarterly', amountInBase: 887.5, monthlyCost: 887.5 / 3 });

    expect((await request('PUT', `/subscriptions/${id}`, { currency: 'ZZZ' })).status).toBe(400);
    expect((await request('PUT', '/subscriptions/missing', { amount: 1 })).status).toBe(404);

    expect(await (await request('DELETE', `/subscriptions/${id}`)).json()).toEqual({ ok: true });
    expect((await request('DELETE', `/subscriptions/${id}`)).status).toBe(404);
  });

  it('imports records and rejects a batch with bad rows', async () => {
    await create(CHATBOT);

    const bad = await request('POST', '/subscriptions/import', {
      mode: 'append',
      records: [{ name: 'Ok', category: 'AI', cycle: 'monthly', amount: '5', next_payment: '2025-04-01', auto_renew: 'TRUE' }, { name: 'Broken' }],
    });
    expect(bad.status).toBe(400);
    expect(await bad.json()).toEqual({
      error: '1 invalid record(s)',
      details: [{ row: 2, error: 'Category is required' }],
    });

    const good = await request('POST', '/subscriptions/import', {
      mode: 'merge',
      records: [
        { Name: 'Chatbot Pro', Category: 'AI', Cycle: 'monthly', Amount: '22', Currency: 'USD', 'Next Payment': '2025-03-04', 'Auto Renew': 'yes' },
        { Name: 'Tune Box', Category: 'Music', Cycle: 'monthly', Amount: '129', 'Next Payment': '2025-03-20', 'Auto Renew': 'no' },
      ],
    });
    expect(await good.json()).toEqual({ imported: 2, total: 2 });

    expect((await request('POST', '/subscriptions/import', { mode: 'upsert', records: [{}] })).status).toBe(400);
  });

  it('summarises the dashboard', async () => {
    await create(CHATBOT);
    await create(CLOUD_DISK);

    const summary = await (await request('GET', '/summary')).json();
    expect(summary.kpis).toEqual({
      totalCount: 2,
      activeCount: 2,
      monthlyTotal: 810,
      yearlyEstimate: 9720,
      warningCount: 1,
    });
    expect(summary.upcoming.map((s: { name: string }) => s.name)).toEqual(['Chatbot Pro']);
    expect(summary.categories.map((c: { category: string }) => c.category)).toEqual(['AI', 'System']);
    expect(summary.top.map((s: { name: string }) => s.name)).toEqual(['Chatbot Pro', 'Cloud Disk']);
    expect(summary.costFlow.nodes[0]).toEqual({ name: 'Total', kind: 'total' });
  });

  it('merges configured and in-use categories into the options', async () => {
    await create(CLOUD_DISK);
    const options = await (await request('GET', '/options')).json();
    expect(options.categories).toEqual(['AI', 'Video', 'System']);
    expect(options.baseCurrency).toBe('THB');
    expect(options.cycles).toEqual(['monthly', 'quarterly', 'semiannual', 'yearly', 'lifetime']);
  });

  it('reports the rate source', async () => {
    const body = await (await request('GET', '/rates')).json();
    expect(body.base).toBe('THB');
    expect(body.rates.USD).toBe(35.5);
    expect(body.status.status).toBe('fallback');
  });

  it('records snapshots and returns the trend', async () => {
    await create(CLOUD_DISK);
    const snap = await request('POST', '/history/snapshot');
    expect(snap.status).toBe(201);

    expect(await (await request('GET', '/history')).json()).toEqual({
      snapshots: [{ date: '2025-03-01', subscriptionCount: 1, monthlyTotal: 100, yearlyEstimate: 1200, categoryTotals: { System: 100 } }],
      growthRate: null,
    });

    expect(await (await request('GET', '/history?category=System')).json()).toMatchObject({
      categoryTrend: [{ date: '2025-03-01', monthlyCost: 100 }],
    });
  });

  it('previews reminders on a dry run', async () => {
    await create(CHATBOT);
    const res = await request('POST', '/reminders', { dryRun: true, days: 7 });
    expect(await res.json()).toMatchObject({
      success: true,
      message: 'Dry run: 1 reminder(s) would be sent',
      sent: [],
      skipped: [],
    });
  });

  it('sends reminders through the configured transport', async () => {
    await create(CHATBOT);
    const res = await request('POST', '/reminders', { days: 7 });
    expect(await res.json()).toMatchObject({ success: true, sent: ['Chatbot Pro'] });
  });

  it('exports CSV and Excel attachments', async () => {
    await create(CHATBOT);

    const csv = await request('GET', '/export?format=csv');
    expect(csv.headers.get('content-disposition')).toBe('attachment; filename="subscriptions_20250301.csv"');
    const text = await csv.text();
    expect(text.split('\n')[1]).toBe('Chatbot Pro,Bots Ltd,AI,monthly,20,USD,710,2025-03-04,3,TRUE');

    const xlsx = await request('GET', '/export?format=xlsx');
    expect(xlsx.headers.get('content-type')).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    expect((await xlsx.arrayBuffer()).byteLength).toBeGreaterThan(0);

    expect((await request('GET', '/export?format=pdf')).status).toBe(400);
  });
});
