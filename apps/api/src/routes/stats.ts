import type { FastifyInstance } from 'fastify';
import { parseFilter } from '../filters.js';
import type { AppContext } from '../server.js';
import {
  breakdownByCategory,
  breakdownByMonth,
  buildChartData,
  paginateMonths,
  summarize,
  toBreakdownRows,
  toSummaryStats,
} from '../stats.js';
import { FilterQuerySchema } from './schemas.js';

const MONTHS_PER_PAGE = 6;
const CHART_MONTHS = 12;

export function registerStatsRoutes(server: FastifyInstance, ctx: AppContext): void {
  server.get('/api/stats', async req => {
    const q = FilterQuerySchema.parse(req.query);
    const rows = ctx.transactions.query(parseFilter(q));
    const monthly = paginateMonths(breakdownByMonth(rows), q.page, MONTHS_PER_PAGE);

    return {
      summary: toSummaryStats(summarize(rows)),
      categories: toBreakdownRows(breakdownByCategory(rows)),
      monthly: toBreakdownRows(monthly.months),
      pagination: { page: monthly.page, totalPages: monthly.totalPages },
    };
  });

  server.get('/api/chart-data', async req => {
    const q = FilterQuerySchema.parse(req.query);
    return buildChartData(ctx.transactions.query(parseFilter(q)), CHART_MONTHS);
  });
}
