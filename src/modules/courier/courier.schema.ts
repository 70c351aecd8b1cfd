/**
 * =============================================================================
 * COURIER MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';

export const availabilitySchema = z.object({
  available: z.boolean()
});

export type AvailabilityInput = z.infer<typeof availabilitySchema>;
