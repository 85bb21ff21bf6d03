import type { IncomingMessage, ServerResponse } from 'node:http';

export const CONTENT_TYPE_JSON = 'application/json; charset=utf-8';
export const CONTENT_TYPE_TEXT = 'text/plain; charset=utf-8';
export const CONTENT_TYPE_CSV = 'text/csv; charset=utf-8';

export type HeaderValue = string | string[] | undefined;

export type DashboardResponse =
  | { kind: 'json'; status: number; body: unknown; summary?: Record<string, unknown> }
  | {
      kind: 'text';
      status: number;
      contentType: string;
      body: string;
      fileName?: string;
      summary?: Record<string, unknown>;
    };

export class RequestBodyTooLargeError extends Error {
  readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`);
    this.name = 'RequestBodyTooLargeError';
    this.limitBytes = limitBytes;
  }
}

export function json(status: number, body: unknown, summary?: Record<string, unknown>): DashboardResponse {
  return { kind: 'json', status, body, summary };
}

export function errorJson(status: number, error: string, extra: Record<string, unknown> = {}): DashboardResponse {
  return { kind: 'json', status, body: { error, ...extra } };
}

export function csvDownload(body: string, fileName: string, summary?: Record<string, unknown>): DashboardResponse {
  return { kind: 'text', status: 200, contentType: CONTENT_TYPE_CSV, body, fileName, summary };
}

export function firstHeader(value: HeaderValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function readCookie(header: HeaderValue, name: string): string | undefined {
  const raw = firstHeader(header);
  if (!raw) {
    return undefined;
  }

  for (const part of raw.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) {
      continue;
    }

    if (part.slice(0, separator).trim() === name) {
      return part.slice(separator + 1).trim();
    }
  }

  return undefined;
}

export function resolveUrl(rawUrl: string | undefined): URL {
  try {
    return new URL(rawUrl ?? '/', 'http://localhost');
  } catch {
    return new URL('/', 'http://localhost');
  }
}

export function readBody(request: IncomingMessage, limitBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let rejected = false;

    request.on('data', (chunk: Buffer) => {
      if (rejected) {
        return;
      }

      received += chunk.length;
      if (received > limitBytes) {
        rejected = true;
        request.pause();
        reject(new RequestBodyTooLargeError(limitBytes));
        return;
      }

      chunks.push(chunk);
    });

    request.on('end', () => {
      if (!rejected) {
        resolve(Buffer.concat(chunks).toString('utf8'));
      }
    });

    request.on('error', (error) => {
      if (!rejected) {
        rejected = true;
        reject(error);
      }
    });
  });
}

export function writeText(response: ServerResponse, statusCode: number, contentType: string, body: string): void {
  response.statusCode = statusCode;
  response.setHeader('Content-Type', contentType);
  response.end(body);
}

export type JsonBody = { ok: true; value: unknown } | { ok: false };

/** An empty body reads as `{}` so that form defaults apply. */
export function parseJsonBody(body: string): JsonBody {
  if (!body.trim()) {
    return { ok: true, value: {} };
  }

  try {
    const value: unknown = JSON.parse(body);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
