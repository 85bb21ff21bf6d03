import { stringify } from 'csv-stringify/sync';
import type { CareerIdea } from './types.js';

export const IDEA_CSV_COLUMNS = [
  'title',
  'why_fit',
  'starter_steps',
  'skills_to_learn',
  'resources',
  'related_roles',
  'salary_hint',
] as const;

export const NO_IDEAS_TO_EXPORT = 'Generate ideas first, then you can download them as a CSV.';

const LIST_SEPARATOR = ' | ';

type IdeaCsvRow = Record<(typeof IDEA_CSV_COLUMNS)[number], string>;

function toRow(idea: CareerIdea): IdeaCsvRow {
  return {
    title: idea.title,
    why_fit: idea.why_fit,
    starter_steps: idea.starter_steps.join(LIST_SEPARATOR),
    skills_to_learn: idea.skills_to_learn.join(LIST_SEPARATOR),
    resources: idea.local_or_free_resources.join(LIST_SEPARATOR),
    related_roles: idea.related_roles.join(LIST_SEPARATOR),
    salary_hint: idea.salary_hint,
  };
}

export function exportIdeasCsv(ideas: readonly CareerIdea[]): string {
  return stringify(ideas.map(toRow), { header: true, columns: [...IDEA_CSV_COLUMNS] });
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `career_ideas_YYYYMMDD_HHMM.csv`, local time. */
export function ideasExportFileName(now: Date): string {
  const day = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  return `career_ideas_${day}_${pad(now.getHours())}${pad(now.getMinutes())}.csv`;
}
