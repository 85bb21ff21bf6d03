import { describe, it, expect } from 'vitest';
import { buildIdeaCards, toIdeaCard } from '../src/cards.js';
import { emptyIdea } from '../src/normalize.js';
import { makeIdea } from './helpers.js';

describe('toIdeaCard', () => {
  it('caps list sections and builds captions', () => {
    const card = toIdeaCard(
      makeIdea({
        starter_steps: ['1', '2', '3', '4', '5', '6'],
        related_roles: ['Pipefitter', 'Boilermaker', 'Ironworker', 'Fabricator', 'Inspector'],
      }),
      2,
    );

    expect(card.heading).toBe('2. Welder');
    expect(card.starterSteps).toEqual(['1', '2', '3', '4', '5']);
    expect(card.relatedRolesCaption).toBe('Related roles: Pipefitter, Boilermaker, Ironworker, Fabricator');
    expect(card.payCaption).toBe('Pay snapshot: $35k–$65k entry (US) (illustrative)');
    expect(card.bonus.resumeBullet).toBe(
      'Built a project related to Welder using free online resources; collaborated with 2 classmates; presented results and documented impact.',
    );
    expect(card.bonus.interviewQuestions).toHaveLength(3);
  });

  it('uses placeholder titles for untitled ideas', () => {
    const card = toIdeaCard(emptyIdea(), 1);

    expect(card.heading).toBe('1. Career Idea');
    expect(card.bonus.resumeBullet.startsWith('Built a project related to the role using')).toBe(true);
    expect(card.relatedRolesCaption).toBe('Related roles: ');
  });
});

describe('buildIdeaCards', () => {
  it('summarizes a non-empty batch', () => {
    const deck = buildIdeaCards([makeIdea(), makeIdea({ title: 'Nurse' })]);

    expect(deck.summary).toBe('Here are 2 career ideas based on your interests:');
    expect(deck.cards.map((card) => card.heading)).toEqual(['1. Welder', '2. Nurse']);
  });

  it('has no summary without ideas', () => {
    expect(buildIdeaCards([])).toEqual({ summary: null, cards: [] });
  });
});
