import type { FastifyInstance, FastifyReply } from 'fastify';
import type { LabelKind } from '../labels.js';
import type { AppContext } from '../server.js';
import type { RenameResult } from '../taxonomy.js';
import { MergeBodySchema, NameBodySchema, NameParamsSchema } from './schemas.js';

function renameResponse(reply: FastifyReply, kind: LabelKind, result: RenameResult) {
  switch (result.status) {
    case 'renamed':
      return { success: true, [kind]: result.name };
    case 'conflict':
      // Client asks the user to confirm, then calls the merge route.
      reply.code(409);
      return {
        error: `${kind === 'category' ? 'Category' : 'Tag'} already exists`,
        conflict: true,
        target: result.target,
      };
    case 'failed':
      reply.code(result.error.statusCode);
      return { error: result.error.message };
  }
}

export function registerCategoryRoutes(server: FastifyInstance, ctx: AppContext): void {
  const { taxonomy } = ctx;

  server.get('/api/categories', async () => taxonomy.listCategories());

  server.post('/api/categories', async (req, reply) => {
    const { name } = NameBodySchema.parse(req.body);
    const category = taxonomy.addCategory(name);
    reply.code(201);
    return { success: true, category };
  });

  server.put('/api/categories/:name', async (req, reply) => {
    const { name } = NameParamsSchema.parse(req.params);
    const body = NameBodySchema.parse(req.body);
    const result = taxonomy.renameCategory(name, body.name);
    if (result.status === 'renamed') {
      req.log.info({ from: name, to: result.name, affected: result.affected }, 'category renamed');
    }
    return renameResponse(reply, 'category', result);
  });

  server.post('/api/categories/:name/merge', async req => {
    const { name } = NameParamsSchema.parse(req.params);
    const { target } = MergeBodySchema.parse(req.body);
    const merged = taxonomy.mergeCategory(name, target);
    req.log.info(merged, 'category merged');
    return { success: true, category: merged.target, affected: merged.affected };
  });

  server.delete('/api/categories/:name', async req => {
    const { name } = NameParamsSchema.parse(req.params);
    const affected = taxonomy.deleteCategory(name);
    req.log.info({ category: name, affected }, 'category deleted');
    return { success: true, affected };
  });

  server.get('/api/tags', async () => taxonomy.listTags());

  server.put('/api/tags/:name', async (req, reply) => {
    const { name } = NameParamsSchema.parse(req.params);
    const body = NameBodySchema.parse(req.body);
    const result = taxonomy.renameTag(name, body.name);
    if (result.status === 'renamed') {
      req.log.info({ from: name, to: result.name, affected: result.affected }, 'tag renamed');
    }
    return renameResponse(reply, 'tag', result);
  });

  server.post('/api/tags/:name/merge', async req => {
    const { name } = NameParamsSchema.parse(req.params);
    const { target } = MergeBodySchema.parse(req.body);
    const merged = taxonomy.mergeTag(name, target);
    req.log.info(merged, 'tag merged');
    return { success: true, tag: merged.target, affected: merged.affected };
  });

  server.delete('/api/tags/:name', async req => {
    const { name } = NameParamsSchema.parse(req.params);
    const affected = taxonomy.deleteTag(name);
    req.log.info({ tag: name, affected }, 'tag deleted');
    return { success: true, affected };
  });
}
