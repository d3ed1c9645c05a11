// ─── Subscription Resolver ──────────────────────────────────────────────────
// Turns a finished journey into at most one subscription record plus the
// churn and retention markers that hang off it.

import { chance } from "./rng";
import type { RandomSource } from "./rng";
import { createEvent, newSessionId } from "./funnel-events";
import { DEFAULT_FUNNEL_MODEL, pickPlan } from "./funnel-model";
import type { FunnelModel } from "./funnel-model";
import {
  CANCEL_REASONS,
  CHURN_DAYS_MAX,
  CHURN_DAYS_MIN,
  DAY,
  MINUTE,
  RETENTION_MARKERS,
} from "./funnel-tables";
import { assertSubscription, invariant } from "./invariants";
import type { JourneyState } from "./funnel-journey";
import type { EventName, FunnelEvent, FunnelSubscription, FunnelUser } from "./types";

export interface SubscriptionOutcome {
  subscription: FunnelSubscription | null;
  events: FunnelEvent[];
}

/** Whole days between two timestamps, truncated. */
export function daysBetween(from: number, to: number): number {
  return Math.floor((to - from) / DAY);
}

function markerEvent(rng: RandomSource, user: FunnelUser, name: EventName, ts: number): FunnelEvent {
  return createEvent(rng, { userId: user.user_id, ts, name, sessionId: newSessionId(rng) });
}

export function resolveSubscription(
  rng: RandomSource,
  user: FunnelUser,
  state: JourneyState,
  model: FunnelModel = DEFAULT_FUNNEL_MODEL,
): SubscriptionOutcome {
  const events: FunnelEvent[] = [];

  if (!state.subscribed) {
    // activated explorers sometimes come back a week later, never mid-journey
    if (state.activated && chance(rng, RETENTION_MARKERS.unsubscribedDay7Rate)) {
      const jitter = rng.int(0, RETENTION_MARKERS.unsubscribedDay7JitterMaxMinutes);
      const anchor = Math.max(user.signup_ts + 7 * DAY, state.lastEventTs ?? user.signup_ts);
      events.push(markerEvent(rng, user, "active_day_7", anchor + jitter * MINUTE));
    }
    return { subscription: null, events };
  }

  const start = state.subscriptionStartTs;
  invariant(start !== null, "Subscribed journey has no subscription start", { userId: user.user_id });

  const { plan, mrr } = pickPlan(user.company_size);

  let churnTs: number | null = null;
  if (chance(rng, model.churn(plan))) {
    churnTs = start + rng.int(CHURN_DAYS_MIN, CHURN_DAYS_MAX) * DAY;
    events.push(createEvent(rng, {
      userId: user.user_id,
      ts: churnTs,
      name: "cancel_subscription",
      sessionId: newSessionId(rng),
      props: { reason: rng.pick(CANCEL_REASONS) },
    }));
  }

  const subscription: FunnelSubscription = {
    user_id: user.user_id,
    plan,
    mrr,
    trial_start_ts: null,
    subscription_start_ts: start,
    churn_ts: churnTs,
  };
  assertSubscription(subscription);

  const retainedFor = (days: number): boolean => churnTs === null || daysBetween(start, churnTs) >= days;

  if (retainedFor(7) && chance(rng, RETENTION_MARKERS.subscribedDay7Rate)) {
    events.push(markerEvent(rng, user, "active_day_7", start + 7 * DAY));
  }
  if (retainedFor(30) && chance(rng, RETENTION_MARKERS.subscribedDay30Rate)) {
    events.push(markerEvent(rng, user, "active_day_30", start + 30 * DAY));
  }

  return { subscription, events };
}
