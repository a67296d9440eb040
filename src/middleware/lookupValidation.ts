import { z } from 'zod';
import { validate } from './validate.js';

/* ------------------------------------------------------------------ */
/*  Zod schemas                                                       */
/* ------------------------------------------------------------------ */

const coordsSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

const addressSchema = z.object({
  address: z.string().trim().min(1, 'Please enter an address.').max(200),
});

export type CoordsBody = z.infer<typeof coordsSchema>;
export type AddressBody = z.infer<typeof addressSchema>;

/* ------------------------------------------------------------------ */
/*  Exports                                                           */
/* ------------------------------------------------------------------ */

export const validateCoords = validate(coordsSchema);
export const validateAddress = validate(addressSchema);
