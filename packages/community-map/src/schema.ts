import { z } from 'zod';
import { PIN_CATEGORIES } from './categories.js';
import { DEFAULT_CENTER } from './locale.js';

export const PIN_NAME_REQUIRED = 'Please provide a place name.';

export const pinFormSchema = z.object({
  name: z
    .string({ required_error: PIN_NAME_REQUIRED, invalid_type_error: PIN_NAME_REQUIRED })
    .trim()
    .min(1, PIN_NAME_REQUIRED),
  category: z.enum(PIN_CATEGORIES).default('Food'),
  description: z.string().trim().default(''),
  address: z.string().trim().default(''),
  lat: z.number().finite().default(DEFAULT_CENTER.lat),
  lon: z.number().finite().default(DEFAULT_CENTER.lon),
  useGeocode: z.boolean().default(true),
});

export type PinFormInput = z.input<typeof pinFormSchema>;
export type PinForm = z.output<typeof pinFormSchema>;

export const pinIdentitySchema = z.object({
  name: z.string(),
  category: z.enum(PIN_CATEGORIES),
  lat: z.number().finite(),
  lon: z.number().finite(),
});
