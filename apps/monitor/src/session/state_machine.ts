// Monitoring session lifecycle with validated transitions.

import { MonitorError } from "../errors.js";

export type SessionState = "active" | "draining" | "stopped";

export type SessionEvent = "stop" | "deadline" | "drained";

export class InvalidSessionTransitionError extends MonitorError {
  constructor(
    public readonly sessionId: string,
    public readonly currentState: SessionState,
    public readonly attemptedEvent: SessionEvent,
  ) {
    super(
      "INVALID_SESSION_TRANSITION",
      `Invalid session transition: session=${sessionId} state=${currentState} event=${attemptedEvent}`,
    );
    this.name = "InvalidSessionTransitionError";
  }
}

export interface SessionTransition {
  readonly fromState: SessionState;
  readonly event: SessionEvent;
  readonly toState: SessionState;
  readonly timestamp: string;
}

// Transition table: Map<currentState, Map<event, nextState>>
const TRANSITION_TABLE: ReadonlyMap<SessionState, ReadonlyMap<SessionEvent, SessionState>> = new Map<
  SessionState,
  ReadonlyMap<SessionEvent, SessionState>
>([
  [
    "active",
    new Map<SessionEvent, SessionState>([
      ["stop", "draining"],
      ["deadline", "draining"],
    ]),
  ],
  [
    "draining",
    new Map<SessionEvent, SessionState>([
      ["drained", "stopped"],
      // A stop request or deadline during a drain joins the drain in progress.
      ["stop", "draining"],
      ["deadline", "draining"],
    ]),
  ],
  // stopped is terminal
  ["stopped", new Map<SessionEvent, SessionState>()],
]);

export function transition(currentState: SessionState, event: SessionEvent, sessionId: string): SessionState {
  const nextState = TRANSITION_TABLE.get(currentState)?.get(event);
  if (nextState === undefined) {
    throw new InvalidSessionTransitionError(sessionId, currentState, event);
  }
  return nextState;
}
