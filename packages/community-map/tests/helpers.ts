import type { Pin } from '../src/types.js';

export function makePin(overrides: Partial<Pin> = {}): Pin {
  return {
    name: "Ralph's Barbecue",
    category: 'Food',
    description: 'Pulled pork and hush puppies',
    address: '1400 E 10th St',
    lat: 36.33,
    lon: -77.59,
    likes: 0,
    added_at: '2026-02-03 09:05:07',
    ...overrides,
  };
}
