import type { FastifyInstance } from 'fastify';
import type { DocClient } from '../../../../src/index.js';
import { parseSearchQuery } from '../search-params.js';

export async function registerArticleRoutes(app: FastifyInstance, client: DocClient): Promise<void> {
  // GET /articles: article list matching the filters
  app.get('/articles', async (request) => {
    const filters = parseSearchQuery(request.query);
    return client.articleSearch(filters);
  });
}
