import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { FALLBACK_CATEGORY, isPinCategory } from './categories.js';
import { DEFAULT_CENTER } from './locale.js';
import type { Pin, PinDraft } from './types.js';

export const PIN_CSV_COLUMNS = ['name', 'category', 'description', 'address', 'lat', 'lon', 'likes', 'added_at'] as const;
export const REQUIRED_PIN_CSV_COLUMNS = ['name', 'category', 'description', 'address', 'lat', 'lon'] as const;

export class PinCsvError extends Error {
  readonly missingColumns: string[];

  constructor(message: string, missingColumns: string[] = []) {
    super(message);
    this.name = 'PinCsvError';
    this.missingColumns = missingColumns;
  }
}

export interface PinCsvRow {
  draft: PinDraft;
  likes?: number;
  addedAt?: string;
}

export interface ParsedPinCsv {
  rows: PinCsvRow[];
  skipped: number;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseCoordinate(value: unknown, fallback: number): number {
  const raw = asString(value)?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseLikes(value: unknown): number | undefined {
  const raw = asString(value)?.trim();
  if (!raw) {
    return undefined;
  }

  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

function toPinCsvRow(record: JsonRecord): PinCsvRow | null {
  const name = asString(record.name)?.trim() ?? '';
  if (!name) {
    return null;
  }

  const category = asString(record.category)?.trim() ?? '';
  const addedAt = asString(record.added_at)?.trim();

  return {
    draft: {
      name,
      category: isPinCategory(category) ? category : FALLBACK_CATEGORY,
      description: asString(record.description)?.trim() ?? '',
      address: asString(record.address)?.trim() ?? '',
      lat: parseCoordinate(record.lat, DEFAULT_CENTER.lat),
      lon: parseCoordinate(record.lon, DEFAULT_CENTER.lon),
    },
    likes: parseLikes(record.likes),
    addedAt: addedAt || undefined,
  };
}

/**
 * Serialize pins with a fixed header row, in store order.
 */
export function exportPinsCsv(pins: readonly Pin[]): string {
  return stringify([...pins], {
    header: true,
    columns: [...PIN_CSV_COLUMNS],
  });
}

/**
 * Parse an uploaded pins CSV. The header must carry every required column or
 * the whole file is rejected; rows with a blank name are skipped.
 */
export function parsePinsCsv(input: string): ParsedPinCsv {
  let header: string[] = [];
  let records: unknown;

  try {
    records = parse(input, {
      bom: true,
      columns: (line: string[]) => {
        header = line.map((column) => column.trim());
        return header;
      },
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PinCsvError(`Import failed: ${message}`);
  }

  const present = new Set(header);
  const missing = REQUIRED_PIN_CSV_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new PinCsvError(`CSV missing required columns: ${missing.join(', ')}`, missing);
  }

  const rows: PinCsvRow[] = [];
  let skipped = 0;

  for (const record of Array.isArray(records) ? records : []) {
    const row = isRecord(record) ? toPinCsvRow(record) : null;
    if (row) {
      rows.push(row);
    } else {
      skipped += 1;
    }
  }

  return { rows, skipped };
}
