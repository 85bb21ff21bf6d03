import { careerRoutes } from './careers.js';
import { mapRoutes } from './map.js';
import type { Route } from './types.js';

export const dashboardRoutes: Route[] = [...mapRoutes, ...careerRoutes];

export function findRoute(method: string, path: string): Route | undefined {
  return dashboardRoutes.find((route) => route.method === method && route.path === path);
}

export type { DashboardRequest, Route, RouteContext, RouteHandler } from './types.js';
