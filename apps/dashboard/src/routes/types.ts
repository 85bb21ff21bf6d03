import type { LanguageModel } from '@townsquare/career-ideas';
import type { Geocoder } from '@townsquare/community-map';
import type { Logger } from 'pino';
import type { DashboardResponse } from '../http.js';
import type { DashboardSession } from '../sessions.js';

export interface DashboardRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  body: string;
}

export interface RouteContext {
  session: DashboardSession;
  logger: Logger;
  geocoder: Geocoder;
  model: LanguageModel;
  clock: () => Date;
}

export type RouteHandler = (request: DashboardRequest, context: RouteContext) => Promise<DashboardResponse>;

export interface Route {
  method: 'GET' | 'POST';
  path: string;
  handler: RouteHandler;
}
