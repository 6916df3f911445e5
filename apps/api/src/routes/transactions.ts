import type { FastifyInstance } from 'fastify';
import { CsvError } from 'csv-parse';
import { importCsv } from '../csvImport.js';
import { ValidationError } from '../errors.js';
import { parseFilter } from '../filters.js';
import type { AppContext } from '../server.js';
import { FilterQuerySchema, IdParamsSchema, TransactionBodySchema } from './schemas.js';

export function registerTransactionRoutes(server: FastifyInstance, ctx: AppContext): void {
  const { transactions } = ctx;

  server.get('/api/transactions', async req => {
    const q = FilterQuerySchema.parse(req.query);
    return transactions.listPage(parseFilter(q), q.page);
  });

  server.get('/api/transactions/:id', async req => {
    const { id } = IdParamsSchema.parse(req.params);
    return transactions.get(id);
  });

  server.post('/api/transactions', async (req, reply) => {
    const body = TransactionBodySchema.parse(req.body);
    const created = transactions.create(body);
    reply.code(201);
    return created;
  });

  server.put('/api/transactions/:id', async req => {
    const { id } = IdParamsSchema.parse(req.params);
    const body = TransactionBodySchema.parse(req.body);
    return transactions.update(id, body);
  });

  server.delete('/api/transactions/:id', async req => {
    const { id } = IdParamsSchema.parse(req.params);
    transactions.delete(id);
    return { success: true };
  });

  server.post('/api/transactions/import', async req => {
    let upload: { filename: string; data: Buffer } | undefined;

    for await (const part of req.parts()) {
      if (part.type !== 'file') continue;
      if (part.fieldname === 'csv_file' && !upload) {
        upload = { filename: part.filename, data: await part.toBuffer() };
      } else {
        part.file.resume();
      }
    }

    if (!upload) throw new ValidationError('No file uploaded');
    if (!upload.filename) throw new ValidationError('No file selected');
    if (!upload.filename.toLowerCase().endsWith('.csv')) {
      throw new ValidationError('File must be a CSV');
    }

    try {
      const result = await importCsv(transactions, upload.data);
      req.log.info(
        { filename: upload.filename, imported: result.imported, failed: result.errors.length },
        'csv import finished'
      );
      return result;
    } catch (err) {
      if (err instanceof CsvError) {
        throw new ValidationError(`Failed to process CSV: ${err.message}`);
      }
      throw err;
    }
  });
}
