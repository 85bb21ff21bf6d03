import { parsePinsCsv, PinCsvError, type ParsedPinCsv } from './csv.js';
import type { Geocoder } from './geocoder.js';
import { GEOCODE_LOCALITY } from './locale.js';
import { pinFormSchema } from './schema.js';
import { appendPin } from './store.js';
import type { Clock, MapSessionState, Pin } from './types.js';

export interface MapSessionDeps {
  geocoder: Geocoder;
  clock?: Clock;
}

export interface FieldIssue {
  path: string;
  message: string;
}

export type SubmitPinOutcome =
  | { status: 'added'; pin: Pin; geocoded: boolean; geocodeError?: string }
  | { status: 'invalid'; message: string; issues: FieldIssue[] };

export type ImportPinsOutcome =
  | { status: 'imported'; imported: number; skipped: number }
  | { status: 'rejected'; message: string; missingColumns: string[] };

const systemClock: Clock = () => new Date();

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle the "add a place" form: validate, optionally geocode the address,
 * then append. Geocoding problems fall back to the coordinates typed into the form.
 */
export async function submitPin(
  state: MapSessionState,
  input: unknown,
  deps: MapSessionDeps,
): Promise<SubmitPinOutcome> {
  const parsed = pinFormSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    return { status: 'invalid', message: issues[0]?.message ?? 'Invalid pin', issues };
  }

  const form = parsed.data;
  let { lat, lon } = form;
  let geocoded = false;
  let geocodeError: string | undefined;

  if (form.useGeocode && form.address) {
    try {
      const hit = await deps.geocoder.geocode(`${form.address}, ${GEOCODE_LOCALITY}`);
      if (hit) {
        ({ lat, lon } = hit);
        geocoded = true;
      }
    } catch (error) {
      geocodeError = errorMessage(error);
    }
  }

  const now = (deps.clock ?? systemClock)();
  const pin = appendPin(
    state,
    { name: form.name, category: form.category, description: form.description, address: form.address, lat, lon },
    { now },
  );

  return geocodeError === undefined
    ? { status: 'added', pin, geocoded }
    : { status: 'added', pin, geocoded, geocodeError };
}

/**
 * Import an uploaded CSV. A rejected file leaves the session untouched;
 * accepted rows are appended one by one.
 */
export function importPins(state: MapSessionState, csv: string, deps: Pick<MapSessionDeps, 'clock'> = {}): ImportPinsOutcome {
  let parsed: ParsedPinCsv;
  try {
    parsed = parsePinsCsv(csv);
  } catch (error) {
    if (error instanceof PinCsvError) {
      return { status: 'rejected', message: error.message, missingColumns: error.missingColumns };
    }

    throw error;
  }

  const now = (deps.clock ?? systemClock)();
  for (const row of parsed.rows) {
    appendPin(state, row.draft, { now, likes: row.likes, addedAt: row.addedAt });
  }

  return { status: 'imported', imported: parsed.rows.length, skipped: parsed.skipped };
}
