/**
 * WebSocket helpers shared by the server gateway and the Node client.
 */

import type { RawData } from 'ws';

/**
 * Decode a ws message payload as UTF-8 text
 */
export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
