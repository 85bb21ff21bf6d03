// Profile and prompt
export {
  studentProfileSchema,
  profileFormOptions,
  GRADE_OPTIONS,
  POST_SCHOOL_OPTIONS,
  WORK_STYLE_OPTIONS,
  VALUE_OPTIONS,
  LOCATION_OPTIONS,
} from './profile.js';
export type { StudentProfile, StudentProfileInput, ProfileFormOptions } from './profile.js';
export { SYSTEM_PROMPT, SALARY_HINTS, renderUserPrompt } from './prompt.js';

// Language model
export {
  createLanguageModel,
  OpenAiLanguageModel,
  UnconfiguredLanguageModel,
  LanguageModelError,
  LanguageModelUnavailableError,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
} from './language-model.js';
export type { LanguageModel, CompletionRequest, ChatCompletionsClient, LanguageModelConfig } from './language-model.js';

// Normalizer
export { parseIdeasResponse, normalizeIdea, stripFence, emptyIdea } from './normalize.js';
export type { NormalizeResult } from './normalize.js';

// Session
export { createCareerSessionState, generateIdeas, UNPARSED_WARNING, MODEL_UNAVAILABLE_MESSAGE } from './session.js';
export type { GenerateIdeasOutcome, CareerSessionDeps, ProfileIssue } from './session.js';

// Output
export { buildIdeaCards, toIdeaCard, resumeBullet, INTERVIEW_QUESTIONS } from './cards.js';
export type { IdeaCard, IdeaCardDeck } from './cards.js';
export { exportIdeasCsv, ideasExportFileName, IDEA_CSV_COLUMNS, NO_IDEAS_TO_EXPORT } from './csv.js';

export type { CareerIdea, CareerSessionState } from './types.js';
