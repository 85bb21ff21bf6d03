import { z } from 'zod';
import type { CareerIdea } from './types.js';

export type NormalizeResult = { ok: true; ideas: CareerIdea[] } | { ok: false; ideas: []; raw: string };

const FENCE = '```';

const textField = z.string().catch('');
const listField = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === 'string'));

export function emptyIdea(): CareerIdea {
  return {
    title: '',
    why_fit: '',
    starter_steps: [],
    skills_to_learn: [],
    local_or_free_resources: [],
    related_roles: [],
    salary_hint: '',
  };
}

const careerIdeaSchema = z
  .object({
    title: textField,
    why_fit: textField,
    starter_steps: listField,
    skills_to_learn: listField,
    local_or_free_resources: listField,
    related_roles: listField,
    salary_hint: textField,
  })
  .catch(emptyIdea);

type JsonParse = { ok: true; value: unknown } | { ok: false };

function tryParseJson(text: string): JsonParse {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function ideasArray(value: unknown): unknown[] {
  if (!isRecord(value)) {
    return [];
  }

  const ideas = value.ideas;
  return Array.isArray(ideas) ? ideas : [];
}

/**
 * Remove one surrounding markdown code fence. Only the first and last lines are
 * considered; a fence with no body collapses to an empty string.
 */
export function stripFence(raw: string): string {
  let text = raw.trim();
  if (!text.startsWith(FENCE)) {
    return text;
  }

  const firstBreak = text.indexOf('\n');
  text = firstBreak === -1 ? '' : text.slice(firstBreak + 1);

  if (text.endsWith(FENCE)) {
    const lastBreak = text.lastIndexOf('\n');
    text = lastBreak === -1 ? text.slice(0, -FENCE.length) : text.slice(0, lastBreak);
  }

  return text;
}

export function normalizeIdea(item: unknown): CareerIdea {
  return careerIdeaSchema.parse(item);
}

/**
 * Turn a model reply into career ideas. Accepts bare JSON, fenced JSON, or JSON
 * buried in prose (first `{` to last `}`). Never throws.
 */
export function parseIdeasResponse(raw: string): NormalizeResult {
  const direct = tryParseJson(stripFence(raw));
  if (direct.ok) {
    return { ok: true, ideas: ideasArray(direct.value).map(normalizeIdea) };
  }

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const embedded = tryParseJson(raw.slice(start, end + 1));
    if (embedded.ok) {
      return { ok: true, ideas: ideasArray(embedded.value).map(normalizeIdea) };
    }
  }

  return { ok: false, ideas: [], raw };
}
