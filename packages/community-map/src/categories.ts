export const PIN_CATEGORIES = [
  'Food',
  'Sports',
  'Study Spot',
  'Hangout',
  'Nature/Outdoors',
  'Volunteering',
  'Other',
] as const;

export type PinCategory = (typeof PIN_CATEGORIES)[number];

export type RgbColor = readonly [number, number, number];

export const CATEGORY_COLORS: Record<PinCategory, RgbColor> = {
  Food: [255, 99, 132],
  Sports: [54, 162, 235],
  'Study Spot': [255, 206, 86],
  Hangout: [75, 192, 192],
  'Nature/Outdoors': [153, 102, 255],
  Volunteering: [255, 159, 64],
  Other: [200, 200, 200],
};

export const FALLBACK_CATEGORY: PinCategory = 'Other';
export const FALLBACK_COLOR: RgbColor = [200, 200, 200];

const categorySet = new Set<string>(PIN_CATEGORIES);

export function isPinCategory(value: string): value is PinCategory {
  return categorySet.has(value);
}

export function colorForCategory(category: string): RgbColor {
  return isPinCategory(category) ? CATEGORY_COLORS[category] : FALLBACK_COLOR;
}
