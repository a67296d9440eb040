import { z } from 'zod';
import { validate } from './validate.js';

/* ------------------------------------------------------------------ */
/*  Zod schemas                                                       */
/* ------------------------------------------------------------------ */

const locationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

/** One chat event: typed text, or a shared location pin. */
export const chatEventSchema = z
  .object({
    text: z.string().max(500, 'Message is too long').optional(),
    location: locationSchema.optional(),
  })
  .refine((e) => e.text !== undefined || e.location !== undefined, {
    message: 'Either text or location is required',
  });

export type ChatEvent = z.infer<typeof chatEventSchema>;

/* ------------------------------------------------------------------ */
/*  Exports                                                           */
/* ------------------------------------------------------------------ */

export const validateChat = validate(chatEventSchema);
