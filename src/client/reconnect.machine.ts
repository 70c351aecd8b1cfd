/**
 * =============================================================================
 * RECONNECT STATE MACHINE
 * =============================================================================
 *
 * Pure transition function for the realtime client. No timers, no sockets:
 * the driver (ReconnectingClient) performs the returned effects.
 *
 *   idle ──start──▶ connecting ──opened──▶ open
 *                      ▲   │                 │
 *                retry │   │ closed(≠1000)   │ closed(≠1000)
 *                      │   ▼                 ▼
 *                     waiting ◀──────────────┘
 *                         │ attempts exhausted
 *                         ▼
 *                       failed
 *
 *   closed(1000) -> idle (no reconnect)      stop -> stopped (from anywhere)
 *
 * Backoff: min(2^attempt * baseDelayMs, maxDelayMs); attempt resets on open.
 * =============================================================================
 */

import { WS_CLOSE_CODES } from '../core/constants';

export type ReconnectStatus = 'idle' | 'connecting' | 'open' | 'waiting' | 'failed' | 'stopped';

export type Connectivity = 'connected' | 'disconnected' | 'error';

export interface ReconnectPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 5
};

export interface ReconnectState {
  readonly status: ReconnectStatus;
  /** Reconnects scheduled since the last successful open */
  readonly attempt: number;
  /** Delay of the pending retry while `waiting` */
  readonly delayMs: number | null;
}

export type ReconnectInput =
  | { type: 'start' }
  | { type: 'opened' }
  | { type: 'closed'; code: number }
  | { type: 'retry' }
  | { type: 'stop' };

export type ReconnectEffect =
  | { type: 'open_socket' }
  | { type: 'close_socket'; code: number; reason: string }
  | { type: 'schedule_retry'; delayMs: number }
  | { type: 'cancel_retry' }
  | { type: 'resubscribe' }
  | { type: 'notify'; connectivity: Connectivity };

export interface Transition {
  state: ReconnectState;
  effects: ReconnectEffect[];
}

export const INITIAL_STATE: ReconnectState = { status: 'idle', attempt: 0, delayMs: null };

export function backoffDelay(attempt: number, policy: ReconnectPolicy): number {
  return Math.min(2 ** attempt * policy.baseDelayMs, policy.maxDelayMs);
}

export function transition(
  state: ReconnectState,
  input: ReconnectInput,
  policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY
): Transition {
  switch (input.type) {
    case 'start':
      if (state.status === 'idle' || state.status === 'stopped' || state.status === 'failed') {
        return {
          state: { status: 'connecting', attempt: 0, delayMs: null },
          effects: [{ type: 'open_socket' }]
        };
      }
      return unchanged(state);

    case 'opened':
      if (state.status !== 'connecting') return unchanged(state);
      return {
        state: { status: 'open', attempt: 0, delayMs: null },
        effects: [{ type: 'resubscribe' }, { type: 'notify', connectivity: 'connected' }]
      };

    case 'closed': {
      if (state.status !== 'open' && state.status !== 'connecting') return unchanged(state);

      if (input.code === WS_CLOSE_CODES.NORMAL) {
        return {
          state: { status: 'idle', attempt: 0, delayMs: null },
          effects: [{ type: 'notify', connectivity: 'disconnected' }]
        };
      }

      if (state.attempt >= policy.maxAttempts) {
        return {
          state: { status: 'failed', attempt: state.attempt, delayMs: null },
          effects: [{ type: 'notify', connectivity: 'error' }]
        };
      }

      const delayMs = backoffDelay(state.attempt, policy);
      return {
        state: { status: 'waiting', attempt: state.attempt + 1, delayMs },
        effects: [
          { type: 'notify', connectivity: 'disconnected' },
          { type: 'schedule_retry', delayMs }
        ]
      };
    }

    case 'retry':
      if (state.status !== 'waiting') return unchanged(state);
      return {
        state: { status: 'connecting', attempt: state.attempt, delayMs: null },
        effects: [{ type: 'open_socket' }]
      };

    case 'stop':
      if (state.status === 'stopped') return unchanged(state);
      return {
        state: { status: 'stopped', attempt: 0, delayMs: null },
        effects: [
          { type: 'cancel_retry' },
          { type: 'close_socket', code: WS_CLOSE_CODES.NORMAL, reason: 'Client closed' },
          { type: 'notify', connectivity: 'disconnected' }
        ]
      };
  }
}

function unchanged(state: ReconnectState): Transition {
  return { state, effects: [] };
}
