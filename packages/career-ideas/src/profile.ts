import { z } from 'zod';

export const GRADE_OPTIONS = ['9th', '10th', '11th', '12th', 'Other'] as const;

export const POST_SCHOOL_OPTIONS = [
  '4-year college',
  '2-year college',
  'Trade/Apprenticeship',
  'Go straight to work',
  'Undecided',
] as const;

export const WORK_STYLE_OPTIONS = [
  'Hands-on',
  'Creative',
  'People-facing',
  'Outdoors',
  'Tech-heavy',
  'Numbers/Analysis',
  'Helping others',
  'Entrepreneurial',
] as const;

export const VALUE_OPTIONS = [
  'Good pay',
  'Job stability',
  'Flexible schedule',
  'Helping community',
  'Learning new things',
  'Creative freedom',
] as const;

export const LOCATION_OPTIONS = [
  'Local (Halifax / Roanoke Rapids)',
  'North Carolina',
  'Remote / Anywhere',
  'Big city',
] as const;

export const MIN_IDEAS = 3;
export const MAX_IDEAS = 8;
export const DEFAULT_IDEAS = 5;

export const studentProfileSchema = z.object({
  grade: z.enum(GRADE_OPTIONS).default('9th'),
  postSchool: z.enum(POST_SCHOOL_OPTIONS).default('4-year college'),
  hobbies: z.string().default(''),
  subjects: z.string().default(''),
  strengths: z.string().default(''),
  workStyle: z.array(z.enum(WORK_STYLE_OPTIONS)).default(['People-facing', 'Tech-heavy']),
  values: z.array(z.enum(VALUE_OPTIONS)).default(['Good pay', 'Learning new things']),
  location: z.enum(LOCATION_OPTIONS).default('Local (Halifax / Roanoke Rapids)'),
  numIdeas: z
    .number()
    .int('How many ideas must be a whole number')
    .min(MIN_IDEAS, `Ask for at least ${MIN_IDEAS} ideas`)
    .max(MAX_IDEAS, `Ask for at most ${MAX_IDEAS} ideas`)
    .default(DEFAULT_IDEAS),
});

export type StudentProfileInput = z.input<typeof studentProfileSchema>;
export type StudentProfile = z.output<typeof studentProfileSchema>;

export interface ProfileFormOptions {
  grade: readonly string[];
  postSchool: readonly string[];
  workStyle: readonly string[];
  values: readonly string[];
  location: readonly string[];
  numIdeas: { min: number; max: number };
  defaults: StudentProfile;
}

/** Everything a form renderer needs to draw the profile sidebar. */
export function profileFormOptions(): ProfileFormOptions {
  return {
    grade: GRADE_OPTIONS,
    postSchool: POST_SCHOOL_OPTIONS,
    workStyle: WORK_STYLE_OPTIONS,
    values: VALUE_OPTIONS,
    location: LOCATION_OPTIONS,
    numIdeas: { min: MIN_IDEAS, max: MAX_IDEAS },
    defaults: studentProfileSchema.parse({}),
  };
}
