import { parseIdeasResponse } from './normalize.js';
import { studentProfileSchema } from './profile.js';
import { renderUserPrompt, SYSTEM_PROMPT } from './prompt.js';
import { LanguageModelUnavailableError, type LanguageModel } from './language-model.js';
import type { CareerIdea, CareerSessionState } from './types.js';

export const UNPARSED_WARNING = "Couldn't parse AI response as JSON. Showing raw text below.";
export const MODEL_UNAVAILABLE_MESSAGE = 'AI client not initialized. Add your API key to run AI generation.';

export interface ProfileIssue {
  path: string;
  message: string;
}

export type GenerateIdeasOutcome =
  | { status: 'invalid'; message: string; issues: ProfileIssue[] }
  | { status: 'unavailable'; message: string }
  | { status: 'failed'; message: string }
  | { status: 'unparsed'; warning: string; raw: string }
  | { status: 'generated'; ideas: CareerIdea[]; replaced: boolean };

export interface CareerSessionDeps {
  model: LanguageModel;
}

export function createCareerSessionState(ideas: readonly CareerIdea[] = []): CareerSessionState {
  return { ideas: [...ideas] };
}

/**
 * Profile in, ideas out. The session keeps the last non-empty batch; failures and
 * empty replies leave it as it was.
 */
export async function generateIdeas(
  state: CareerSessionState,
  profileInput: unknown,
  deps: CareerSessionDeps,
): Promise<GenerateIdeasOutcome> {
  const parsed = studentProfileSchema.safeParse(profileInput);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    return { status: 'invalid', message: issues[0]?.message ?? 'Invalid profile', issues };
  }

  let raw: string;
  try {
    raw = await deps.model.complete({ system: SYSTEM_PROMPT, user: renderUserPrompt(parsed.data) });
  } catch (error) {
    if (error instanceof LanguageModelUnavailableError) {
      return { status: 'unavailable', message: MODEL_UNAVAILABLE_MESSAGE };
    }

    const message = error instanceof Error ? error.message : String(error);
    return { status: 'failed', message: `AI error: ${message}` };
  }

  const result = parseIdeasResponse(raw);
  if (!result.ok) {
    return { status: 'unparsed', warning: UNPARSED_WARNING, raw: result.raw };
  }

  if (result.ideas.length === 0) {
    return { status: 'generated', ideas: [], replaced: false };
  }

  state.ideas = result.ideas;
  return { status: 'generated', ideas: result.ideas, replaced: true };
}
