import { isPinCategory, type PinCategory } from './categories.js';
import type { Pin, PinFilter } from './types.js';

/**
 * Keep pins whose category is selected and whose name or description contains
 * the query (case-insensitive). An empty selection means every category.
 */
export function filterPins(pins: readonly Pin[], filter: PinFilter = {}): Pin[] {
  const selected = filter.categories && filter.categories.length > 0 ? new Set<string>(filter.categories) : null;
  const query = filter.query?.trim().toLowerCase() ?? '';

  return pins.filter((pin) => {
    if (selected && !selected.has(pin.category)) {
      return false;
    }

    if (!query) {
      return true;
    }

    return pin.name.toLowerCase().includes(query) || pin.description.toLowerCase().includes(query);
  });
}

/**
 * Reduce free-form category values (query params, form fields) to known categories.
 */
export function parseCategorySelection(values: readonly string[]): PinCategory[] {
  const seen = new Set<PinCategory>();
  for (const value of values) {
    const trimmed = value.trim();
    if (isPinCategory(trimmed)) {
      seen.add(trimmed);
    }
  }

  return [...seen];
}
