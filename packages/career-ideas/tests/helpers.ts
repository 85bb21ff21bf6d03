import type { CareerIdea } from '../src/types.js';

export function makeIdea(overrides: Partial<CareerIdea> = {}): CareerIdea {
  return {
    title: 'Welder',
    why_fit: 'Likes fixing things',
    starter_steps: ['Take shop class'],
    skills_to_learn: ['MIG welding'],
    local_or_free_resources: ['Halifax Community College'],
    related_roles: ['Pipefitter'],
    salary_hint: '$35k–$65k entry (US)',
    ...overrides,
  };
}
