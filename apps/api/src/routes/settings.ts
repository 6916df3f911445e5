import type { FastifyInstance } from 'fastify';
import { ForbiddenError } from '../errors.js';
import { populateSampleData } from '../sampleData.js';
import type { AppContext } from '../server.js';

export function registerSettingsRoutes(server: FastifyInstance, ctx: AppContext): void {
  const { config, taxonomy, transactions } = ctx;

  server.get('/api/settings', async () => ({
    debug: config.debug,
    categories: taxonomy.listCategoryUsage(),
    tags: taxonomy.listTagUsage(),
  }));

  server.post('/api/populate-test-data', async req => {
    if (!config.debug) {
      throw new ForbiddenError('Test data generation is only available in debug mode');
    }
    const count = populateSampleData(transactions, ctx.clock());
    req.log.info({ count }, 'sample data added');
    return { success: true, message: `Added ${count} test transactions`, count };
  });

  server.post('/api/transactions/clear-all', async req => {
    if (!config.debug && !config.testing) {
      throw new ForbiddenError('Only available in debug/testing mode');
    }
    const deleted = transactions.clearAll();
    req.log.warn({ deleted }, 'all transactions cleared');
    return { success: true, deleted };
  });
}
