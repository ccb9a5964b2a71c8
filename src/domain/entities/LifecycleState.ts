import { InvariantError } from '../errors/ReconnectErrors.js';

/**
 * Lifecycle states emitted by the reconnection controller, in the order the
 * loop reaches them. Purely observational.
 */
export type LifecycleState =
  | 'connecting'
  | 'reconnecting'
  | 'connected'
  | 'disconnected'
  | 'failing'
  | 'failed'
  | 'closed';

export const LIFECYCLE_STATES: readonly LifecycleState[] = [
  'connecting',
  'reconnecting',
  'connected',
  'disconnected',
  'failing',
  'failed',
  'closed',
];

/**
 * Coarse health of a link, for dashboards and health checks.
 * CONNECTED = usable; DEGRADED = in transition or failing; OFFLINE = gone for good.
 */
export type ConnectionHealthState = 'CONNECTED' | 'DEGRADED' | 'OFFLINE';

function unknownState(state: never): never {
  throw new InvariantError(`Unknown lifecycle state: ${String(state)}`);
}

export function describeState(state: LifecycleState): string {
  switch (state) {
    case 'connecting':
      return 'Connecting';
    case 'reconnecting':
      return 'Reconnecting';
    case 'connected':
      return 'Connected';
    case 'disconnected':
      return 'Disconnected';
    case 'failing':
      return 'Failing';
    case 'failed':
      return 'Failed';
    case 'closed':
      return 'Closed';
    default:
      return unknownState(state);
  }
}

/** Closed and Failed end the loop */
export function isTerminalState(state: LifecycleState): boolean {
  return state === 'closed' || state === 'failed';
}

export function toHealthState(state: LifecycleState): ConnectionHealthState {
  switch (state) {
    case 'connected':
      return 'CONNECTED';
    case 'connecting':
    case 'reconnecting':
    case 'failing':
    case 'disconnected':
      return 'DEGRADED';
    case 'failed':
    case 'closed':
      return 'OFFLINE';
    default:
      return unknownState(state);
  }
}
