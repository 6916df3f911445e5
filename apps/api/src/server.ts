import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { ZodError } from 'zod';
import type { AppConfig } from './config.js';
import { checkHealth, type Db } from './db.js';
import { isAppError } from './errors.js';
import { registerCategoryRoutes } from './routes/categories.js';
import { registerSettingsRoutes } from './routes/settings.js';
import { registerStatsRoutes } from './routes/stats.js';
import { registerTransactionRoutes } from './routes/transactions.js';
import { TaxonomyStore } from './taxonomy.js';
import { TransactionStore } from './transactions.js';

export type AppContext = {
  config: AppConfig;
  db: Db;
  transactions: TransactionStore;
  taxonomy: TaxonomyStore;
  clock: () => Date;
};

export type ServerOptions = {
  config: AppConfig;
  db: Db;
  clock?: () => Date;
};

export async function buildServer(opts: ServerOptions): Promise<FastifyInstance> {
  const clock = opts.clock ?? (() => new Date());
  const ctx: AppContext = {
    config: opts.config,
    db: opts.db,
    transactions: new TransactionStore(opts.db, clock),
    taxonomy: new TaxonomyStore(opts.db),
    clock,
  };

  const server = Fastify({ logger: { level: opts.config.logLevel } });

  await server.register(cors, { origin: opts.config.origins.length ? opts.config.origins : true });
  await server.register(multipart, { limits: { fileSize: 5 * 1024 * 1024, files: 1 } });

  server.setErrorHandler((err, req, reply) => {
    if (isAppError(err)) {
      return reply.code(err.statusCode).send({ error: err.message });
    }
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
      return reply.code(400).send({ error: `${where}${issue?.message ?? 'Invalid request'}` });
    }
    if (err.statusCode && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.message });
    }
    req.log.error(err);
    return reply.code(500).send({ error: 'Internal server error' });
  });

  server.get('/health', async (_req, reply) => {
    const database = checkHealth(ctx.db);
    if (!database) reply.code(503);
    return { ok: database, database };
  });

  server.get('/', async () => ({
    name: 'Tallybook API',
    routes: [
      '/health',
      '/api/transactions (GET list, POST create)',
      '/api/transactions/:id (GET, PUT, DELETE)',
      '/api/transactions/import (POST multipart csv_file)',
      '/api/stats',
      '/api/chart-data',
      '/api/categories (GET, POST)',
      '/api/categories/:name (PUT rename, DELETE)',
      '/api/categories/:name/merge (POST)',
      '/api/tags (GET)',
      '/api/tags/:name (PUT rename, DELETE)',
      '/api/tags/:name/merge (POST)',
      '/api/settings',
    ],
  }));

  registerTransactionRoutes(server, ctx);
  registerStatsRoutes(server, ctx);
  registerCategoryRoutes(server, ctx);
  registerSettingsRoutes(server, ctx);

  return server;
}
