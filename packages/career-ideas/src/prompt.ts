import type { StudentProfile } from './profile.js';

export const SYSTEM_PROMPT =
  'You are a practical, upbeat career advisor for US high school students in Halifax, North Carolina. ' +
  'Give concrete, encouraging suggestions with next steps they can do within weeks, not years. ' +
  'Be specific and concise. Use plain English. Avoid long paragraphs.';

/** Rough entry-level pay bands offered to the model as `salary_hint` buckets. Illustrative only. */
export const SALARY_HINTS = {
  software: '$55k–$95k entry (US)',
  data: '$50k–$85k entry (US)',
  health: '$35k–$70k entry (US)',
  skilled: '$35k–$65k entry (US)',
  creative: '$30k–$60k entry (US)',
  business: '$40k–$70k entry (US)',
  public: '$35k–$60k entry (US)',
} as const;

const RESPONSE_SCHEMA = [
  '{',
  '  "ideas": [',
  '    {',
  '      "title": "str",',
  '      "why_fit": "str",',
  '      "starter_steps": ["str", "str", "str"],',
  '      "skills_to_learn": ["str", "str", "str"],',
  '      "local_or_free_resources": ["str", "str"],',
  '      "related_roles": ["str", "str"],',
  '      "salary_hint": "str"',
  '    }',
  '  ]',
  '}',
].join('\n');

export function renderUserPrompt(profile: StudentProfile): string {
  const salaryBuckets = Object.values(SALARY_HINTS).join(', ');

  return [
    'Student profile:',
    `- Grade: ${profile.grade}`,
    `- Post-school preference: ${profile.postSchool}`,
    `- Hobbies: ${profile.hobbies}`,
    `- Favorite subjects: ${profile.subjects}`,
    `- Strengths: ${profile.strengths}`,
    `- Work style: ${profile.workStyle.join(', ')}`,
    `- Values: ${profile.values.join(', ')}`,
    `- Location: ${profile.location}`,
    '',
    'Return STRICT JSON with this schema: ',
    RESPONSE_SCHEMA,
    '',
    'Rules:',
    `- ideas length = ${profile.numIdeas}.`,
    '- Choose roles that match preferences (college vs trade vs work).',
    '- Include at least one idea doable without a 4-year degree.',
    '- Use Halifax/NC/online resources where possible.',
    `- salary_hint: use one of these buckets (approx): ${salaryBuckets}.`,
    '',
  ].join('\n');
}
