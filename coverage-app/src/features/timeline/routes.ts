import type { FastifyInstance } from 'fastify';
import type { DocClient } from '../../../../src/index.js';
import { parseSearchQuery } from '../search-params.js';

export async function registerTimelineRoutes(app: FastifyInstance, client: DocClient): Promise<void> {
  // GET /timeline/:mode: coverage timeline; an unknown mode is rejected by the client
  app.get<{ Params: { mode: string } }>('/timeline/:mode', async (request) => {
    const filters = parseSearchQuery(request.query);
    return client.timelineSearch(request.params.mode, filters);
  });
}
