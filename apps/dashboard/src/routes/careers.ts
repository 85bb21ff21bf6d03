import {
  buildIdeaCards,
  exportIdeasCsv,
  generateIdeas,
  ideasExportFileName,
  NO_IDEAS_TO_EXPORT,
  profileFormOptions,
} from '@townsquare/career-ideas';
import { csvDownload, errorJson, json, parseJsonBody } from '../http.js';
import type { Route } from './types.js';

export const careerRoutes: Route[] = [
  {
    method: 'GET',
    path: '/api/careers/options',
    handler: async () => json(200, profileFormOptions()),
  },
  {
    method: 'POST',
    path: '/api/careers/generate',
    handler: async (request, { session, model, logger }) => {
      const body = parseJsonBody(request.body);
      if (!body.ok) {
        return errorJson(400, 'Request body must be JSON');
      }

      const outcome = await generateIdeas(session.careers, body.value, { model });

      switch (outcome.status) {
        case 'invalid':
          return errorJson(400, outcome.message, { issues: outcome.issues });
        case 'unavailable':
          return errorJson(503, outcome.message);
        case 'failed':
          logger.warn({ event: 'idea_generation_failed', sessionId: session.id }, outcome.message);
          return errorJson(502, outcome.message);
        case 'unparsed':
          logger.warn(
            { event: 'idea_response_unparsed', sessionId: session.id, rawLength: outcome.raw.length },
            'Model reply was not JSON',
          );
          return json(200, { status: 'unparsed', warning: outcome.warning, raw: outcome.raw }, { outcome: 'unparsed' });
        case 'generated':
          return json(
            200,
            { status: 'generated', replaced: outcome.replaced, ...buildIdeaCards(outcome.ideas) },
            { outcome: 'generated', ideas: outcome.ideas.length },
          );
      }
    },
  },
  {
    method: 'GET',
    path: '/api/careers/ideas',
    handler: async (_request, { session }) => json(200, buildIdeaCards(session.careers.ideas)),
  },
  {
    method: 'GET',
    path: '/api/careers/ideas.csv',
    handler: async (_request, { session, clock }) => {
      const ideas = session.careers.ideas;
      if (ideas.length === 0) {
        return errorJson(404, NO_IDEAS_TO_EXPORT);
      }

      return csvDownload(exportIdeasCsv(ideas), ideasExportFileName(clock()), { rows: ideas.length });
    },
  },
];
