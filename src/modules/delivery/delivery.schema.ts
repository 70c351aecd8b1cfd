/**
 * =============================================================================
 * DELIVERY MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * SENT BY: Courier app every few seconds while a delivery is active
 * =============================================================================
 */

import { z } from 'zod';
import { latitudeSchema, longitudeSchema } from '../../shared/utils/validation.utils';

export const locationUpdateSchema = z.object({
  lat: latitudeSchema,
  lng: longitudeSchema
});

export type LocationUpdateInput = z.infer<typeof locationUpdateSchema>;
