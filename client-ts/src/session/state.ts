import type { StompError } from '../errors';

export type SessionState = 'Disconnected' | 'Connecting' | 'Active' | 'Closed' | 'Failed';

/** States in which `open()` has settled */
export const SETTLED_STATES: ReadonlySet<SessionState> = new Set<SessionState>(['Active', 'Failed', 'Closed']);

export interface ConnectedInfo {
  version?: string;
  session?: string;
  server?: string;
  /** Server's heart-beat offer in ms */
  heartBeat?: { send: number; receive: number };
}

export type StompEvents = {
  state: { from: SessionState; to: SessionState };
  connected: ConnectedInfo;
  error: StompError;
  warning: StompError;
  close: { code?: number; reason?: string };
};
