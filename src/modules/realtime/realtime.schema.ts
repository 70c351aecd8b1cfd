/**
 * =============================================================================
 * REALTIME MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * Inbound WebSocket commands and the admin HTTP endpoints.
 *
 * Parsing happens in two steps so the handler can tell apart:
 *   1. malformed payload (not JSON / no string `type`) -> protocol error, close
 *   2. unknown `type`                                   -> ignored
 *   3. known `type` with bad fields                     -> error frame, stay open
 * =============================================================================
 */

import { z } from 'zod';
import { UserRole } from '../../core/constants';
import { ClientCommand } from './realtime.types';

/**
 * Minimum shape every inbound frame must have
 */
export const envelopeSchema = z.object({
  type: z.string()
}).passthrough();

const deliveryIdSchema = z.number().int().positive();
const packageIdSchema = z.number().int().positive();

export const clientCommandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe_delivery'), delivery_id: deliveryIdSchema }),
  z.object({ type: z.literal('unsubscribe_delivery'), delivery_id: deliveryIdSchema }),
  z.object({ type: z.literal('subscribe_package'), package_id: packageIdSchema }),
  z.object({ type: z.literal('unsubscribe_package'), package_id: packageIdSchema }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('get_stats') })
]);

export type ClientCommandInput = z.infer<typeof clientCommandSchema>;

export const KNOWN_COMMAND_TYPES: ReadonlySet<string> = new Set(
  clientCommandSchema.options.map(option => option.shape.type.value)
);

/**
 * Wire shape -> internal command
 */
export function toClientCommand(input: ClientCommandInput): ClientCommand {
  switch (input.type) {
    case 'subscribe_delivery':
      return { type: 'subscribe_delivery', deliveryId: input.delivery_id };
    case 'unsubscribe_delivery':
      return { type: 'unsubscribe_delivery', deliveryId: input.delivery_id };
    case 'subscribe_package':
      return { type: 'subscribe_package', packageId: input.package_id };
    case 'unsubscribe_package':
      return { type: 'unsubscribe_package', packageId: input.package_id };
    case 'ping':
      return { type: 'ping' };
    case 'get_stats':
      return { type: 'get_stats' };
  }
}

// =============================================================================
// HTTP
// =============================================================================

export const announcementSchema = z.object({
  message: z.string().trim().min(1).max(1000),
  targetRoles: z.array(z.nativeEnum(UserRole)).min(1).optional()
});

export type AnnouncementInput = z.infer<typeof announcementSchema>;

/**
 * Upgrade query string
 */
export const upgradeQuerySchema = z.object({
  token: z.string().min(1)
});
