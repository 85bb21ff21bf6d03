import { LanguageModelError, LanguageModelUnavailableError, type LanguageModel } from '@townsquare/career-ideas';
import type { Geocoder } from '@townsquare/community-map';
import { EventEmitter } from 'node:events';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { PassThrough } from 'node:stream';
import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { createDashboardApp, serveRequest, type DashboardApp, type RawRequest } from '../src/server.js';
import { SessionRegistry } from '../src/sessions.js';

function createLoggerMock(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

interface Harness {
  geocoder?: Geocoder;
  model?: LanguageModel;
}

function createHarness({ geocoder, model }: Harness = {}) {
  const logger = createLoggerMock();
  let next = 0;
  const app = createDashboardApp({
    logger,
    geocoder: geocoder ?? { geocode: vi.fn(async () => null) },
    model: model ?? { configured: true, complete: vi.fn(async () => '{"ideas":[]}') },
    sessions: new SessionRegistry({ idleMs: 60_000, createId: () => `sid-${++next}` }),
    clock: () => new Date(2026, 4, 1, 16, 45, 10),
  });

  const send = (method: string, url: string, body = '', headers: RawRequest['headers'] = { 'x-session-id': 'sid-1' }) =>
    app.handle({ method, url, headers, body });

  return { app, logger, send };
}

function parse(body: string): unknown {
  return JSON.parse(body);
}

describe('dashboard app', () => {
  it('answers health checks without a session', async () => {
    const { send } = createHarness();
    const response = await send('GET', '/healthz', '', {});

    expect(response).toEqual({ status: 200, headers: { 'Content-Type': 'text/plain; charset=utf-8' }, body: 'ok\n' });
  });

  it('issues a session cookie on first contact', async () => {
    const { send } = createHarness();

    const first = await send('GET', '/api/map/pins', '', {});
    const second = await send('GET', '/api/map/pins', '', { cookie: 'theme=dark; townsquare_sid=sid-1' });

    expect(first.headers['Set-Cookie']).toBe('townsquare_sid=sid-1; Path=/; HttpOnly; SameSite=Lax');
    expect(first.headers['x-session-id']).toBe('sid-1');
    expect(second.headers['Set-Cookie']).toBeUndefined();
    expect(second.headers['x-session-id']).toBe('sid-1');
  });

  it('returns 404 for unknown routes', async () => {
    const { send } = createHarness();
    const response = await send('DELETE', '/api/map/pins');

    expect(response.status).toBe(404);
    expect(parse(response.body)).toEqual({ error: 'Not found' });
  });

  it('adds, lists, likes and exports pins', async () => {
    const { send } = createHarness();
    await send('GET', '/api/map/pins');

    const added = await send(
      'POST',
      '/api/map/pins',
      JSON.stringify({ name: 'Library', category: 'Study Spot', description: 'Quiet tables', lat: 36.3, lon: -77.6 }),
    );
    expect(added.status).toBe(201);
    expect(parse(added.body)).toMatchObject({ message: "Added 'Library' to the map!", geocoded: false });

    const listing = await send('GET', '/api/map/pins?q=quiet&category=Study%20Spot&category=Bogus');
    expect(parse(listing.body)).toMatchObject({ total: 1, visible: 1, hints: [] });

    const liked = await send(
      'POST',
      '/api/map/pins/like',
      JSON.stringify({ name: 'Library', category: 'Study Spot', lat: 36.3, lon: -77.6 }),
    );
    expect(liked.status).toBe(200);
    expect(parse(liked.body)).toMatchObject({ pin: { likes: 1 } });

    const csv = await send('GET', '/api/map/pins.csv');
    expect(csv.headers['Content-Disposition']).toBe('attachment; filename="halifax_pins.csv"');
    expect(csv.body.split('\n')).toEqual([
      'name,category,description,address,lat,lon,likes,added_at',
      'Library,Study Spot,Quiet tables,,36.3,-77.6,1,2026-05-01 16:45:10',
      '',
    ]);
  });

  it('rejects invalid pins and unknown likes', async () => {
    const { send } = createHarness();
    await send('GET', '/api/map/pins');

    const invalid = await send('POST', '/api/map/pins', JSON.stringify({ name: '' }));
    const notJson = await send('POST', '/api/map/pins', '{name:');
    const missing = await send(
      'POST',
      '/api/map/pins/like',
      JSON.stringify({ name: 'Ghost', category: 'Other', lat: 0, lon: 0 }),
    );

    expect(invalid.status).toBe(400);
    expect(parse(invalid.body)).toMatchObject({ error: 'Please provide a place name.' });
    expect(notJson.status).toBe(400);
    expect(missing.status).toBe(404);
    expect(parse(missing.body)).toEqual({ error: 'Pin not found' });
  });

  it('warns and keeps form coordinates when geocoding fails', async () => {
    const { send, logger } = createHarness({
      geocoder: {
        geocode: vi.fn(async () => {
          throw new Error('service unavailable');
        }),
      },
    });
    await send('GET', '/api/map/pins');

    const response = await send('POST', '/api/map/pins', JSON.stringify({ name: 'Pool', address: 'Main St', lat: 36.4, lon: -77.5 }));

    expect(response.status).toBe(201);
    expect(parse(response.body)).toMatchObject({
      pin: { lat: 36.4, lon: -77.5 },
      warning: 'Geocoding failed; using the latitude/longitude entered on the form.',
    });
    expect(vi.mocked(logger.warn).mock.calls[0]?.[0]).toMatchObject({ event: 'geocode_failed', error: 'service unavailable' });
  });

  it('imports CSV bodies and reports rejected files', async () => {
    const { send, logger } = createHarness();
    await send('GET', '/api/map/pins');

    const imported = await send('POST', '/api/map/pins/import', 'name,category,description,address,lat,lon\nPark,Nature/Outdoors,,,36.3,-77.6\n');
    const rejected = await send('POST', '/api/map/pins/import', 'name,lat,lon\nPark,1,2\n');
    const view = await send('GET', '/api/map/view?heatmap=1');

    expect(parse(imported.body)).toEqual({ message: 'Imported pins from CSV!', imported: 1, skipped: 0 });
    expect(rejected.status).toBe(400);
    expect(parse(rejected.body)).toEqual({
      error: 'CSV missing required columns: category, description, address',
      missingColumns: ['category', 'description', 'address'],
    });
    expect(parse(view.body)).toMatchObject({ status: 'ready', center: { lat: 36.3, lon: -77.6 } });
    expect(vi.mocked(logger.warn)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(logger.warn).mock.calls[0]).toEqual([
      { event: 'pin_import_rejected', sessionId: 'sid-1', missingColumns: ['category', 'description', 'address'] },
      'CSV missing required columns: category, description, address',
    ]);
  });

  it('generates ideas and exports them', async () => {
    const model = {
      configured: true,
      complete: vi.fn(async () => 'Sure!\n{"ideas":[{"title":"Nurse","starter_steps":["Shadow at the clinic"]}]}'),
    };
    const { send } = createHarness({ model });
    await send('GET', '/api/careers/ideas');

    const before = await send('GET', '/api/careers/ideas.csv');
    expect(before.status).toBe(404);
    expect(parse(before.body)).toEqual({ error: 'Generate ideas first, then you can download them as a CSV.' });

    const generated = await send('POST', '/api/careers/generate', JSON.stringify({ numIdeas: 3 }));
    expect(generated.status).toBe(200);
    expect(parse(generated.body)).toMatchObject({
      status: 'generated',
      replaced: true,
      summary: 'Here are 1 career ideas based on your interests:',
      cards: [{ heading: '1. Nurse', starterSteps: ['Shadow at the clinic'] }],
    });

    const csv = await send('GET', '/api/careers/ideas.csv');
    expect(csv.headers['Content-Disposition']).toBe('attachment; filename="career_ideas_20260501_1645.csv"');
    expect(csv.body.split('\n')[1]).toBe('Nurse,,Shadow at the clinic,,,,');
  });

  it('maps generation failures to status codes', async () => {
    const generic = createHarness({
      model: { configured: true, complete: vi.fn().mockRejectedValue(new Error('socket hang up')) },
    });
    const offline = createHarness({
      model: { configured: false, complete: vi.fn().mockRejectedValue(new LanguageModelUnavailableError()) },
    });
    const broken = createHarness({
      model: { configured: true, complete: vi.fn().mockRejectedValue(new LanguageModelError('timeout')) },
    });
    const rambling = createHarness({
      model: { configured: true, complete: vi.fn(async () => 'no json here') },
    });

    const failed = await generic.send('POST', '/api/careers/generate', '{}');
    const offlineResponse = await offline.send('POST', '/api/careers/generate', '{}');
    const brokenResponse = await broken.send('POST', '/api/careers/generate', '{}');
    const ramblingResponse = await rambling.send('POST', '/api/careers/generate', '{}');
    const invalid = await rambling.send('POST', '/api/careers/generate', JSON.stringify({ grade: '13th' }));

    expect(failed.status).toBe(502);
    expect(parse(failed.body)).toEqual({ error: 'AI error: socket hang up' });
    expect(offlineResponse.status).toBe(503);
    expect(brokenResponse.status).toBe(502);
    expect(parse(brokenResponse.body)).toEqual({ error: 'AI error: timeout' });
    expect(ramblingResponse.status).toBe(200);
    expect(parse(ramblingResponse.body)).toEqual({
      status: 'unparsed',
      warning: "Couldn't parse AI response as JSON. Showing raw text below.",
      raw: 'no json here',
    });
    expect(invalid.status).toBe(400);

    expect(vi.mocked(generic.logger.warn).mock.calls).toEqual([
      [{ event: 'idea_generation_failed', sessionId: 'sid-1' }, 'AI error: socket hang up'],
    ]);
    expect(vi.mocked(broken.logger.warn).mock.calls[0]?.[0]).toMatchObject({ event: 'idea_generation_failed' });
    expect(vi.mocked(offline.logger.warn)).not.toHaveBeenCalled();
    expect(vi.mocked(rambling.logger.warn).mock.calls).toEqual([
      [{ event: 'idea_response_unparsed', sessionId: 'sid-1', rawLength: 12 }, 'Model reply was not JSON'],
    ]);
  });

  it('turns handler crashes into 500 responses', async () => {
    const { send, logger } = createHarness({
      model: { configured: true, complete: vi.fn().mockResolvedValue(42) },
    });

    const response = await send('POST', '/api/careers/generate', '{}');

    expect(response.status).toBe(500);
    expect(parse(response.body)).toEqual({ error: 'Internal server error' });
    expect(vi.mocked(logger.error).mock.calls[0]?.[0]).toMatchObject({ event: 'request_failed' });
  });
});

class ResponseRecorder extends EventEmitter {
  statusCode = 200;
  headers: Record<string, string> = {};
  body = '';

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  end(chunk?: string): this {
    this.body = chunk ?? '';
    this.emit('finish');
    return this;
  }
}

function incoming(method: string, url: string, body: string) {
  const stream = Object.assign(new PassThrough(), { method, url, headers: {} });
  stream.end(Buffer.from(body));
  return stream;
}

describe('serveRequest', () => {
  it('passes the body to the app and writes its reply', async () => {
    const logger = createLoggerMock();
    const handle = vi.fn(async () => ({ status: 201, headers: { 'x-session-id': 'sid-9' }, body: '{"ok":true}' }));
    const app: DashboardApp = { handle };
    const request = incoming('POST', '/api/map/pins', '{"name":"Dock"}');
    const response = new ResponseRecorder();

    await serveRequest(request as unknown as IncomingMessage, response as unknown as ServerResponse, {
      maxBodyBytes: 64,
      logger,
      app,
    });

    expect(handle).toHaveBeenCalledWith({ method: 'POST', url: '/api/map/pins', headers: {}, body: '{"name":"Dock"}' });
    expect(response.statusCode).toBe(201);
    expect(response.headers).toEqual({ 'x-session-id': 'sid-9' });
    expect(response.body).toBe('{"ok":true}');
  });

  it('answers 413 for oversized bodies and drops the connection', async () => {
    const logger = createLoggerMock();
    const handle = vi.fn();
    const request = incoming('POST', '/api/map/pins/import', 'x'.repeat(20));
    const response = new ResponseRecorder();

    await serveRequest(request as unknown as IncomingMessage, response as unknown as ServerResponse, {
      maxBodyBytes: 8,
      logger,
      app: { handle },
    });

    expect(handle).not.toHaveBeenCalled();
    expect(response.statusCode).toBe(413);
    expect(response.headers).toEqual({ Connection: 'close', 'Content-Type': 'application/json; charset=utf-8' });
    expect(JSON.parse(response.body)).toEqual({ error: 'Request body exceeds 8 bytes' });
    expect(request.destroyed).toBe(true);
    expect(vi.mocked(logger.warn).mock.calls[0]?.[0]).toEqual({
      event: 'request_body_rejected',
      status: 413,
      error: 'Request body exceeds 8 bytes',
    });
  });
});
