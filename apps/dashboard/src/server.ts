import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { LanguageModel } from '@townsquare/career-ideas';
import type { Geocoder } from '@townsquare/community-map';
import type { Logger } from 'pino';
import {
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_TEXT,
  errorJson,
  firstHeader,
  readBody,
  readCookie,
  RequestBodyTooLargeError,
  resolveUrl,
  writeText,
  type DashboardResponse,
  type HeaderValue,
} from './http.js';
import { findRoute, type RouteContext } from './routes/index.js';
import type { SessionRegistry } from './sessions.js';
import { withRequestLogger } from './with-request-logger.js';

export const SESSION_COOKIE = 'townsquare_sid';
export const SESSION_HEADER = 'x-session-id';
const HEALTH_PATH = '/healthz';

export interface DashboardDeps {
  logger: Logger;
  geocoder: Geocoder;
  model: LanguageModel;
  sessions: SessionRegistry;
  clock?: () => Date;
}

export interface RawRequest {
  method?: string;
  url?: string;
  headers: Record<string, HeaderValue>;
  body: string;
}

export interface RawResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface DashboardApp {
  handle(request: RawRequest): Promise<RawResponse>;
}

function render(response: DashboardResponse, headers: Record<string, string>): RawResponse {
  if (response.kind === 'json') {
    return {
      status: response.status,
      headers: { ...headers, 'Content-Type': CONTENT_TYPE_JSON },
      body: JSON.stringify(response.body),
    };
  }

  return {
    status: response.status,
    headers: {
      ...headers,
      'Content-Type': response.contentType,
      ...(response.fileName ? { 'Content-Disposition': `attachment; filename="${response.fileName}"` } : {}),
    },
    body: response.body,
  };
}

function renderError(status: number, message: string): RawResponse {
  return render(errorJson(status, message), {});
}

export function createDashboardApp(deps: DashboardDeps): DashboardApp {
  const clock = deps.clock ?? (() => new Date());

  return {
    handle: async (raw) => {
      const method = (raw.method ?? 'GET').toUpperCase();
      const url = resolveUrl(raw.url);
      const path = url.pathname;

      if (path === HEALTH_PATH) {
        return { status: 200, headers: { 'Content-Type': CONTENT_TYPE_TEXT }, body: 'ok\n' };
      }

      const route = findRoute(method, path);
      if (!route) {
        return renderError(404, 'Not found');
      }

      const requestedId = readCookie(raw.headers.cookie, SESSION_COOKIE) ?? firstHeader(raw.headers[SESSION_HEADER]);
      const { session, created } = deps.sessions.resolve(requestedId);
      const sessionHeaders: Record<string, string> = {
        [SESSION_HEADER]: session.id,
        ...(created ? { 'Set-Cookie': `${SESSION_COOKIE}=${session.id}; Path=/; HttpOnly; SameSite=Lax` } : {}),
      };

      const context: RouteContext = {
        session,
        logger: deps.logger,
        geocoder: deps.geocoder,
        model: deps.model,
        clock,
      };

      try {
        const response = await withRequestLogger({
          logger: deps.logger,
          method,
          path,
          sessionId: session.id,
          summary: (result: DashboardResponse) => ({ status: result.status, ...result.summary }),
          run: () => route.handler({ method, path, query: url.searchParams, body: raw.body }, context),
        });
        return render(response, sessionHeaders);
      } catch {
        return render(errorJson(500, 'Internal server error'), sessionHeaders);
      }
    },
  };
}

export interface DashboardServerOptions {
  host: string;
  port: number;
  maxBodyBytes: number;
  logger: Logger;
  app: DashboardApp;
}

export interface DashboardServerHandle {
  close: () => Promise<void>;
}

/**
 * Read the body, hand the request to the app and write the reply. An oversized or
 * unreadable body is answered directly and the connection is dropped once the reply
 * has been flushed, so the rest of the upload is never read.
 */
export async function serveRequest(
  request: IncomingMessage,
  response: ServerResponse,
  options: Pick<DashboardServerOptions, 'maxBodyBytes' | 'logger' | 'app'>,
): Promise<void> {
  let body = '';
  if (request.method !== 'GET' && request.method !== 'HEAD') {
    try {
      body = await readBody(request, options.maxBodyBytes);
    } catch (error) {
      const status = error instanceof RequestBodyTooLargeError ? 413 : 400;
      const message = error instanceof Error ? error.message : 'Could not read request body';
      options.logger.warn({ event: 'request_body_rejected', status, error: message }, 'Request body rejected');
      response.once('finish', () => request.destroy());
      response.setHeader('Connection', 'close');
      writeText(response, status, CONTENT_TYPE_JSON, JSON.stringify({ error: message }));
      return;
    }
  }

  const result = await options.app.handle({
    method: request.method,
    url: request.url,
    headers: request.headers,
    body,
  });

  response.statusCode = result.status;
  for (const [name, value] of Object.entries(result.headers)) {
    response.setHeader(name, value);
  }
  response.end(result.body);
}

export function startDashboardServer(options: DashboardServerOptions): DashboardServerHandle {
  const server = createServer((request, response) => {
    void serveRequest(request, response, options);
  });

  server.listen(options.port, options.host, () => {
    const address = server.address();
    options.logger.info(
      {
        event: 'dashboard_server_started',
        host: options.host,
        port: typeof address === 'object' && address ? address.port : options.port,
      },
      'Dashboard server started',
    );
  });

  return {
    close: async () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }

          resolve();
        });
      }),
  };
}
