import type { FunnelEvent, FunnelSubscription, FunnelUser } from "./types";

/** A programming-contract violation: the generator produced a state it must never produce. */
export class InvariantError extends Error {
  constructor(message: string, public readonly context: Record<string, unknown> = {}) {
    super(message);
    this.name = "InvariantError";
  }
}

export function invariant(condition: unknown, message: string, context?: Record<string, unknown>): asserts condition {
  if (!condition) throw new InvariantError(message, context);
}

/**
 * Checks one user's timeline: nothing before signup, and each session's events
 * non-decreasing in the order they were emitted.
 */
export function assertUserTimeline(user: FunnelUser, events: readonly FunnelEvent[]): void {
  const lastBySession = new Map<string, number>();
  for (const e of events) {
    invariant(e.user_id === user.user_id, "Event attached to the wrong user", { eventId: e.event_id, userId: user.user_id });
    invariant(e.event_ts >= user.signup_ts, "Event precedes signup", { eventId: e.event_id, userId: user.user_id });
    const prev = lastBySession.get(e.session_id);
    invariant(prev === undefined || e.event_ts >= prev, "Session clock moved backward", {
      sessionId: e.session_id,
      eventId: e.event_id,
    });
    lastBySession.set(e.session_id, e.event_ts);
  }
}

export function assertSubscription(sub: FunnelSubscription): void {
  invariant(sub.churn_ts === null || sub.churn_ts > sub.subscription_start_ts, "Churn must follow subscription start", {
    userId: sub.user_id,
  });
}
