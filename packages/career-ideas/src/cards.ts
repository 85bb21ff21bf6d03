import type { CareerIdea } from './types.js';

const LIST_LIMIT = 5;
const RELATED_ROLES_LIMIT = 4;

export const INTERVIEW_QUESTIONS = [
  'What made you interested in this path?',
  'Tell me about a time you solved a problem with limited resources.',
  'How would you keep learning new skills after graduation?',
] as const;

export interface IdeaCard {
  heading: string;
  whyFit: string;
  starterSteps: string[];
  skillsToLearn: string[];
  resources: string[];
  relatedRolesCaption: string;
  payCaption: string;
  bonus: {
    resumeBullet: string;
    interviewQuestions: readonly string[];
  };
}

export function resumeBullet(idea: CareerIdea): string {
  return (
    `Built a project related to ${idea.title || 'the role'} using free online resources; ` +
    'collaborated with 2 classmates; presented results and documented impact.'
  );
}

export function toIdeaCard(idea: CareerIdea, position: number): IdeaCard {
  return {
    heading: `${position}. ${idea.title || 'Career Idea'}`,
    whyFit: idea.why_fit,
    starterSteps: idea.starter_steps.slice(0, LIST_LIMIT),
    skillsToLearn: idea.skills_to_learn.slice(0, LIST_LIMIT),
    resources: idea.local_or_free_resources.slice(0, LIST_LIMIT),
    relatedRolesCaption: `Related roles: ${idea.related_roles.slice(0, RELATED_ROLES_LIMIT).join(', ')}`,
    payCaption: `Pay snapshot: ${idea.salary_hint} (illustrative)`,
    bonus: {
      resumeBullet: resumeBullet(idea),
      interviewQuestions: INTERVIEW_QUESTIONS,
    },
  };
}

export interface IdeaCardDeck {
  summary: string | null;
  cards: IdeaCard[];
}

export function buildIdeaCards(ideas: readonly CareerIdea[]): IdeaCardDeck {
  if (ideas.length === 0) {
    return { summary: null, cards: [] };
  }

  return {
    summary: `Here are ${ideas.length} career ideas based on your interests:`,
    cards: ideas.map((idea, index) => toIdeaCard(idea, index + 1)),
  };
}
