// ─── SaaS Funnel Synthetic Data Generator ───────────────────────────────────
// Generates users, events and subscriptions in memory. One seeded random
// source threads through sampler → journey → resolver for every user in turn.

import { SeededRNG } from "./rng";
import { samplePopulationUser } from "./funnel-population";
import { simulateJourney } from "./funnel-journey";
import { resolveSubscription } from "./funnel-subscription";
import { DEFAULT_FUNNEL_MODEL } from "./funnel-model";
import type { FunnelModel } from "./funnel-model";
import { DEFAULT_LOOKBACK_DAYS, DEFAULT_SEED, DEFAULT_TOTAL_USERS } from "./funnel-tables";
import { assertUserTimeline } from "./invariants";
import type { FunnelEvent, FunnelSubscription, FunnelUser, UserAttributes } from "./types";

// ═══════════════════════════════════════════════════════════════════════════════
// Config Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface FunnelSynthConfig {
  totalUsers: number;
  seed: number;
  lookbackDays: number;
  referenceTime: number;   // epoch ms; signups land in the window before it
}

export interface FunnelSynthHooks {
  model?: FunnelModel;
  userOverrides?: Partial<UserAttributes>;
  onProgress?: (done: number, total: number) => void;
}

export interface FunnelOutputStats {
  users: number;
  events: number;
  subscriptions: number;
  activatedUsers: number;
  trialUsers: number;
  churnedSubscriptions: number;
  paidConversionRate: number;  // percent of users, 2dp
  totalMrr: number;
  eventsPerUser: number;
  eventCounts: Record<string, number>;
}

export interface FunnelSynthResult {
  users: FunnelUser[];
  events: FunnelEvent[];
  subscriptions: FunnelSubscription[];
  stats: FunnelOutputStats;
}

export function getDefaultConfig(referenceTime: number = Date.now()): FunnelSynthConfig {
  return {
    totalUsers: DEFAULT_TOTAL_USERS,
    seed: DEFAULT_SEED,
    lookbackDays: DEFAULT_LOOKBACK_DAYS,
    referenceTime,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Full Generation
// ═══════════════════════════════════════════════════════════════════════════════

export function generateFunnelData(cfg: FunnelSynthConfig, hooks: FunnelSynthHooks = {}): FunnelSynthResult {
  const rng = new SeededRNG(cfg.seed);
  const model = hooks.model ?? DEFAULT_FUNNEL_MODEL;
  const referenceTime = Math.floor(cfg.referenceTime / 1000) * 1000;

  const usersOut: FunnelUser[] = [];
  const eventsOut: FunnelEvent[] = [];
  const subscriptionsOut: FunnelSubscription[] = [];

  for (let userId = 1; userId <= cfg.totalUsers; userId++) {
    const user = samplePopulationUser(rng, userId, {
      referenceTime,
      lookbackDays: cfg.lookbackDays,
      overrides: hooks.userOverrides,
    });
    usersOut.push(user);

    const journey = simulateJourney(rng, user, model);
    const outcome = resolveSubscription(rng, user, journey.state, model);

    const userEvents = [...journey.events, ...outcome.events];
    assertUserTimeline(user, userEvents);
    for (const e of userEvents) eventsOut.push(e);
    if (outcome.subscription) subscriptionsOut.push(outcome.subscription);

    hooks.onProgress?.(userId, cfg.totalUsers);
  }

  return {
    users: usersOut,
    events: eventsOut,
    subscriptions: subscriptionsOut,
    stats: computeStatsFromData(usersOut, eventsOut, subscriptionsOut),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stats (records only, so they also work on data read back from disk)
// ═══════════════════════════════════════════════════════════════════════════════

interface StatsUser { user_id: number | string }
interface StatsEvent { user_id: number | string; event_name: string }
interface StatsSubscription { mrr: number | string; churn_ts: number | string | null }

export function computeStatsFromData(
  users: readonly StatsUser[],
  events: readonly StatsEvent[],
  subscriptions: readonly StatsSubscription[],
): FunnelOutputStats {
  const N = users.length;

  const eventCounts: Record<string, number> = {};
  const activated = new Set<string>();
  const trial = new Set<string>();
  for (const e of events) {
    eventCounts[e.event_name] = (eventCounts[e.event_name] ?? 0) + 1;
    if (e.event_name === "create_first_project") activated.add(String(e.user_id));
    if (e.event_name === "trial_start") trial.add(String(e.user_id));
  }

  const totalMrr = subscriptions.reduce((s, sub) => s + Number(sub.mrr), 0);
  const churned = subscriptions.filter(s => s.churn_ts !== null && s.churn_ts !== "").length;

  return {
    users: N,
    events: events.length,
    subscriptions: subscriptions.length,
    activatedUsers: activated.size,
    trialUsers: trial.size,
    churnedSubscriptions: churned,
    paidConversionRate: N > 0 ? Math.round(subscriptions.length / N * 10000) / 100 : 0,
    totalMrr: Math.round(totalMrr * 100) / 100,
    eventsPerUser: N > 0 ? Math.round(events.length / N * 100) / 100 : 0,
    eventCounts,
  };
}
