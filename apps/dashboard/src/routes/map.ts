import {
  buildMapView,
  buildPinListing,
  exportPinsCsv,
  importPins,
  likePin,
  parseCategorySelection,
  pinIdentitySchema,
  PINS_EXPORT_FILE_NAME,
  submitPin,
} from '@townsquare/community-map';
import { csvDownload, errorJson, json, parseJsonBody } from '../http.js';
import type { Route } from './types.js';

const GEOCODE_FALLBACK_WARNING = 'Geocoding failed; using the latitude/longitude entered on the form.';

function readFlag(query: URLSearchParams, name: string): boolean {
  const raw = query.get(name)?.trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on';
}

export const mapRoutes: Route[] = [
  {
    method: 'GET',
    path: '/api/map/pins',
    handler: async (request, { session }) => {
      const listing = buildPinListing(session.map.pins, {
        query: request.query.get('q') ?? undefined,
        categories: parseCategorySelection(request.query.getAll('category')),
      });

      return json(200, listing, { visible: listing.visible, total: listing.total });
    },
  },
  {
    method: 'POST',
    path: '/api/map/pins',
    handler: async (request, { session, geocoder, clock, logger }) => {
      const body = parseJsonBody(request.body);
      if (!body.ok) {
        return errorJson(400, 'Request body must be JSON');
      }

      const outcome = await submitPin(session.map, body.value, { geocoder, clock });
      if (outcome.status === 'invalid') {
        return errorJson(400, outcome.message, { issues: outcome.issues });
      }

      if (outcome.geocodeError !== undefined) {
        logger.warn(
          { event: 'geocode_failed', sessionId: session.id, address: outcome.pin.address, error: outcome.geocodeError },
          'Geocoding failed, kept form coordinates',
        );
      }

      return json(
        201,
        {
          message: `Added '${outcome.pin.name}' to the map!`,
          pin: outcome.pin,
          geocoded: outcome.geocoded,
          ...(outcome.geocodeError !== undefined ? { warning: GEOCODE_FALLBACK_WARNING } : {}),
        },
        { geocoded: outcome.geocoded, pins: session.map.pins.length },
      );
    },
  },
  {
    method: 'POST',
    path: '/api/map/pins/like',
    handler: async (request, { session }) => {
      const body = parseJsonBody(request.body);
      if (!body.ok) {
        return errorJson(400, 'Request body must be JSON');
      }

      const identity = pinIdentitySchema.safeParse(body.value);
      if (!identity.success) {
        return errorJson(400, 'Pin identity requires name, category, lat and lon');
      }

      const pin = likePin(session.map, identity.data);
      if (!pin) {
        return errorJson(404, 'Pin not found');
      }

      return json(200, { pin }, { likes: pin.likes });
    },
  },
  {
    method: 'GET',
    path: '/api/map/view',
    handler: async (request, { session }) => {
      const view = buildMapView(session.map.pins, {
        heatmap: readFlag(request.query, 'heatmap'),
        centerOnDefault: request.query.get('center') === 'default',
      });

      return json(200, view, { status: view.status });
    },
  },
  {
    method: 'GET',
    path: '/api/map/pins.csv',
    handler: async (_request, { session }) =>
      csvDownload(exportPinsCsv(session.map.pins), PINS_EXPORT_FILE_NAME, { rows: session.map.pins.length }),
  },
  {
    method: 'POST',
    path: '/api/map/pins/import',
    handler: async (request, { session, clock, logger }) => {
      const outcome = importPins(session.map, request.body, { clock });
      if (outcome.status === 'rejected') {
        logger.warn(
          { event: 'pin_import_rejected', sessionId: session.id, missingColumns: outcome.missingColumns },
          outcome.message,
        );
        return errorJson(400, outcome.message, { missingColumns: outcome.missingColumns });
      }

      return json(
        200,
        { message: 'Imported pins from CSV!', imported: outcome.imported, skipped: outcome.skipped },
        { imported: outcome.imported, skipped: outcome.skipped },
      );
    },
  },
];
