import { z } from 'zod';
import { InteractionStyle } from '../model/interaction-style.js';

/** One "this code uses X" fact, as supplied by a source-code scanner. */
export const UsesFactSchema = z.object({
  destination: z.string().trim().min(1, 'destination must name an element'),
  description: z.string().default(''),
  technology: z.string().default(''),
  interactionStyle: z.enum(InteractionStyle).default(InteractionStyle.Synchronous),
});

export const UsesFactListSchema = z.array(UsesFactSchema);

/** What a scanner hands over. */
export type UsesFactInput = z.input<typeof UsesFactSchema>;
/** A fact after defaults are applied. */
export type UsesFact = z.output<typeof UsesFactSchema>;
