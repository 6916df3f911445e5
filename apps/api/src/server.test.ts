import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AppConfig } from './config.js';
import { openDatabase } from './db.js';
import { buildServer } from './server.js';

const config: AppConfig = {
  port: 0,
  host: '127.0.0.1',
  origins: [],
  databasePath: ':memory:',
  debug: false,
  testing: true,
  logLevel: 'silent',
};

const CLOCK = () => new Date(2024, 2, 20, 12);

function multipart(filename: string, content: string) {
  const boundary = '----tallybook-test-boundary';
  const payload = [
    `--${boundary}`,
    `Content-Disposition: form-data; name="csv_file"; filename="${filename}"`,
    'Content-Type: text/csv',
    '',
    content,
    `--${boundary}--`,
    '',
  ].join('\r\n');
  return { payload, headers: { 'content-type': `multipart/form-data; boundary=${boundary}` } };
}

describe('HTTP API', () => {
  let server: FastifyInstance;

  async function seed() {
    const date = '2024-03-05';
    const rows = [
      { description: 'Groceries', amount: '120', type: 'expense', date, category: 'food', tags: 'recurring' },
      { description: 'Pizza', amount: '40', type: 'expense', date, category: 'food', tags: ['dining'] },
      { description: 'BusPass', amount: '60', type: 'expense', date, category: 'transport', tags: 'recurring' },
      { description: 'Salary', amount: 3000, type: 'income', date, category: 'salary', tags: 'recurring' },
    ];
    for (const payload of rows) {
      const res = await server.inject({ method: 'POST', url: '/api/transactions', payload });
      expect(res.statusCode).toBe(201);
    }
  }

  beforeEach(async () => {
    server = await buildServer({ config, db: openDatabase(':memory:'), clock: CLOCK });
  });

  afterEach(async () => {
    await server.close();
  });

  it('reports health', async () => {
    const res = await server.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, database: true });
  });

  it('creates and reads back a transaction', async () => {
    const created = await server.inject({
      method: 'POST',
      url: '/api/transactions',
      payload: { description: 'Coffee', amount: '3.20', type: 'expense', date: '2024-03-01', category: 'Food', tags: 'a, b' },
    });
    expect(created.statusCode).toBe(201);
    const { id } = created.json<{ id: number }>();

    const res = await server.inject({ method: 'GET', url: `/api/transactions/${id}` });
    expect(res.json()).toMatchObject({ category: 'food', tags: ['a', 'b'], amount: '3.20' });
  });

  it('maps validation failures to 400', async () => {
    const badAmount = await server.inject({
      method: 'POST',
      url: '/api/transactions',
      payload: { description: 'X', amount: '-5', type: 'expense', date: '2024-03-01' },
    });
    expect(badAmount.statusCode).toBe(400);
    expect(badAmount.json()).toEqual({ error: 'Amount must be positive' });

    const missingType = await server.inject({
      method: 'POST',
      url: '/api/transactions',
      payload: { description: 'X', amount: '5', date: '2024-03-01' },
    });
    expect(missingType.statusCode).toBe(400);
    expect(missingType.json()).toEqual({ error: 'type: Required' });
  });

  it('returns 404 for unknown transactions', async () => {
    const res = await server.inject({ method: 'DELETE', url: '/api/transactions/42' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Transaction not found' });
  });

  it('lists one month per page and degrades a bad page number', async () => {
    await seed();
    const res = await server.inject({ method: 'GET', url: '/api/transactions?page=abc&categories=food' });
    expect(res.statusCode).toBe(200);
    const body = res.json<{ page: number; total: number; currentMonth: string }>();
    expect(body).toMatchObject({ page: 1, total: 2, currentMonth: '2024-03' });
  });

  it('computes filtered stats', async () => {
    await seed();
    const both = await server.inject({ method: 'GET', url: '/api/stats?categories=food&tags=recurring' });
    expect(both.json<{ summary: { expenses: string } }>().summary.expenses).toBe('120.00');

    const tagOnly = await server.inject({ method: 'GET', url: '/api/stats?tags=recurring' });
    expect(tagOnly.json<{ summary: unknown }>().summary).toEqual({
      income: '3000.00',
      expenses: '180.00',
      net: '2820.00',
      transactionCount: 3,
    });

    const repeated = await server.inject({ method: 'GET', url: '/api/stats?range=7d&range=30d' });
    expect(repeated.statusCode).toBe(200);
    expect(repeated.json<{ summary: { transactionCount: number } }>().summary.transactionCount).toBe(4);

    const current = await server.inject({ method: 'GET', url: '/api/stats?range=current_month' });
    expect(current.json<{ summary: { transactionCount: number } }>().summary.transactionCount).toBe(4);
  });

  it('serves chart series', async () => {
    await seed();
    const res = await server.inject({ method: 'GET', url: '/api/chart-data' });
    expect(res.json()).toEqual({
      categories: {
        labels: ['food', 'transport', 'salary'],
        expenses: ['160.00', '60.00', '0.00'],
        income: ['0.00', '0.00', '3000.00'],
      },
      monthly: { labels: ['2024-03'], expenses: ['220.00'], income: ['3000.00'] },
    });
  });

  it('turns a rename onto an existing category into a 409 conflict', async () => {
    await seed();
    const res = await server.inject({
      method: 'PUT',
      url: '/api/categories/food',
      payload: { name: 'Transport' },
    });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: 'Category already exists', conflict: true, target: 'transport' });

    const merged = await server.inject({
      method: 'POST',
      url: '/api/categories/food/merge',
      payload: { target: 'transport' },
    });
    expect(merged.json()).toEqual({ success: true, category: 'transport', affected: 2 });

    const list = await server.inject({ method: 'GET', url: '/api/categories' });
    expect(list.json<string[]>()).not.toContain('food');
  });

  it('adds, renames and deletes categories', async () => {
    const added = await server.inject({ method: 'POST', url: '/api/categories', payload: { name: 'Eating Out' } });
    expect(added.statusCode).toBe(201);
    expect(added.json()).toEqual({ success: true, category: 'eating out' });

    const dup = await server.inject({ method: 'POST', url: '/api/categories', payload: { name: 'eating out' } });
    expect(dup.statusCode).toBe(409);
    expect(dup.json()).toEqual({ error: 'Category already exists' });

    const renamed = await server.inject({
      method: 'PUT',
      url: '/api/categories/eating%20out',
      payload: { name: 'restaurants' },
    });
    expect(renamed.json()).toEqual({ success: true, category: 'restaurants' });

    const removed = await server.inject({ method: 'DELETE', url: '/api/categories/restaurants' });
    expect(removed.json()).toEqual({ success: true, affected: 0 });

    const missing = await server.inject({ method: 'DELETE', url: '/api/categories/restaurants' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'Category not found' });
  });

  it('renames and merges tags', async () => {
    await seed();
    const conflict = await server.inject({ method: 'PUT', url: '/api/tags/dining', payload: { name: 'recurring' } });
    expect(conflict.statusCode).toBe(409);

    const merged = await server.inject({
      method: 'POST',
      url: '/api/tags/dining/merge',
      payload: { target: 'recurring' },
    });
    expect(merged.json()).toEqual({ success: true, tag: 'recurring', affected: 1 });

    const tags = await server.inject({ method: 'GET', url: '/api/tags' });
    expect(tags.json()).toEqual(['recurring']);
  });

  it('imports a CSV upload with per-row errors', async () => {
    const csv = 'date,description,amount,type\n2024-03-01,Tea,2.00,expense\n2024-03-02,,1,expense';
    const { payload, headers } = multipart('rows.csv', csv);
    const res = await server.inject({ method: 'POST', url: '/api/transactions/import', payload, headers });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      imported: 1,
      errors: ['Row 3: Missing required fields (description/name, amount, date)'],
    });
  });

  it('refuses uploads that are not CSV files', async () => {
    const { payload, headers } = multipart('rows.txt', 'date\n');
    const res = await server.inject({ method: 'POST', url: '/api/transactions/import', payload, headers });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'File must be a CSV' });
  });

  it('guards the debug-only endpoints', async () => {
    const populate = await server.inject({ method: 'POST', url: '/api/populate-test-data' });
    expect(populate.statusCode).toBe(403);

    await seed();
    const cleared = await server.inject({ method: 'POST', url: '/api/transactions/clear-all' });
    expect(cleared.json()).toEqual({ success: true, deleted: 4 });
  });

  it('populates sample data in debug mode', async () => {
    const debugServer = await buildServer({
      config: { ...config, debug: true },
      db: openDatabase(':memory:'),
      clock: CLOCK,
    });
    const res = await debugServer.inject({ method: 'POST', url: '/api/populate-test-data' });
    expect(res.json()).toEqual({ success: true, message: 'Added 12 test transactions', count: 12 });
    await debugServer.close();
  });
});
