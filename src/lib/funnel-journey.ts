// ─── Journey Simulator ──────────────────────────────────────────────────────
// Walks one user session by session through onboarding → activation → value
// moment → trial → checkout → subscription. All milestone flags live on an
// explicit `JourneyState` that every stage reads and updates.

import { chance, weightedChoice } from "./rng";
import type { RandomSource } from "./rng";
import { createEvent, newSessionId } from "./funnel-events";
import { DEFAULT_FUNNEL_MODEL } from "./funnel-model";
import type { FunnelModel } from "./funnel-model";
import {
  BROWSE_COUNT_WEIGHTS,
  BROWSING_EVENTS,
  CHECKOUT_ABANDON_AFTER_FAILURE,
  CHECKOUT_ATTEMPT_WEIGHTS,
  EMAIL_VERIFY_RATE,
  FIXED_REFERRER,
  HOUR,
  INTEGRATIONS,
  INVITE_COUNT_WEIGHTS,
  INVITE_SHARE,
  MINUTE,
  ONBOARDING_COMPLETE_RATE,
  PAID_SOCIAL_REFERRER_WEIGHTS,
  PAYMENT_ERROR_CODES,
  PRODUCT_COUNT_WEIGHTS,
  PRODUCT_EVENTS,
  RETENTION_PROXY_RATE,
  SESSION_COUNT_WEIGHTS,
  SESSION_GAP_HOURS_WEIGHTS,
  SESSION_JITTER_MAX_MINUTES,
} from "./funnel-tables";
import { invariant } from "./invariants";
import type { AcquisitionChannel, EventName, EventProperties, FunnelEvent, FunnelUser } from "./types";

export interface JourneyState {
  activated: boolean;
  valueMomentReached: boolean;
  trialStarted: boolean;
  subscribed: boolean;
  subscriptionStartTs: number | null;
  lastEventTs: number | null;
  sessions: number;
  checkoutAttempts: number;
  paymentFailures: number;
}

export function initialJourneyState(): JourneyState {
  return {
    activated: false,
    valueMomentReached: false,
    trialStarted: false,
    subscribed: false,
    subscriptionStartTs: null,
    lastEventTs: null,
    sessions: 0,
    checkoutAttempts: 0,
    paymentFailures: 0,
  };
}

export interface JourneyResult {
  state: JourneyState;
  events: FunnelEvent[];
}

/** Per-session clock. It only ever moves forward. */
export class SessionClock {
  constructor(private t: number) {}

  get now(): number { return this.t; }

  advance(rng: RandomSource, minMinutes: number, maxMinutes: number): number {
    const step = rng.int(minMinutes, maxMinutes) * MINUTE;
    invariant(step >= 0, "Session clock cannot move backward", { step });
    this.t += step;
    return this.t;
  }
}

export interface SessionContext {
  rng: RandomSource;
  model: FunnelModel;
  user: FunnelUser;
  state: JourneyState;
  events: FunnelEvent[];
  index: number;
  sessionId: string;
  referrer: string;
  clock: SessionClock;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Session setup
// ═══════════════════════════════════════════════════════════════════════════════

export function referrerFor(rng: RandomSource, channel: AcquisitionChannel): string {
  if (channel === "paid_social") return weightedChoice(rng, PAID_SOCIAL_REFERRER_WEIGHTS);
  return FIXED_REFERRER[channel];
}

export function nextSessionStart(rng: RandomSource, baseline: number): number {
  const gapHours = weightedChoice(rng, SESSION_GAP_HOURS_WEIGHTS);
  const jitter = rng.int(0, SESSION_JITTER_MAX_MINUTES);
  return baseline + gapHours * HOUR + jitter * MINUTE;
}

export function openSession(
  rng: RandomSource,
  model: FunnelModel,
  user: FunnelUser,
  state: JourneyState,
  events: FunnelEvent[],
  index: number,
  start: number,
): SessionContext {
  const sessionId = newSessionId(rng);
  const referrer = referrerFor(rng, user.acquisition_channel);
  return { rng, model, user, state, events, index, sessionId, referrer, clock: new SessionClock(start) };
}

function emit(
  ctx: SessionContext,
  name: EventName,
  opts: { withReferrer?: boolean; props?: EventProperties } = {},
): void {
  ctx.events.push(createEvent(ctx.rng, {
    userId: ctx.user.user_id,
    ts: ctx.clock.now,
    name,
    sessionId: ctx.sessionId,
    referrer: opts.withReferrer ? ctx.referrer : null,
    props: opts.props,
  }));
  ctx.state.lastEventTs = ctx.clock.now;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stages (run in this order within every session)
// ═══════════════════════════════════════════════════════════════════════════════

export function runBrowsing(ctx: SessionContext): void {
  const count = weightedChoice(ctx.rng, BROWSE_COUNT_WEIGHTS);
  for (let i = 0; i < count; i++) {
    emit(ctx, ctx.rng.pick(BROWSING_EVENTS), { withReferrer: true });
    ctx.clock.advance(ctx.rng, 1, 20);
  }
}

/** First session only. */
export function runSignupFlow(ctx: SessionContext): void {
  const { rng, model, user, clock } = ctx;
  emit(ctx, "signup", { withReferrer: true });
  clock.advance(rng, 1, 30);

  if (chance(rng, EMAIL_VERIFY_RATE)) {
    emit(ctx, "email_verified");
    clock.advance(rng, 1, 30);
  }

  if (chance(rng, model.onboardingStart(user))) {
    emit(ctx, "onboarding_start");
    clock.advance(rng, 2, 60);

    if (chance(rng, ONBOARDING_COMPLETE_RATE)) {
      emit(ctx, "onboarding_complete");
      clock.advance(rng, 2, 30);
    }
  }
}

export function runActivation(ctx: SessionContext): void {
  const { rng, model, user, state, clock } = ctx;
  if (state.activated) return;
  if (!chance(rng, model.activation(user))) return;

  emit(ctx, "create_first_project");
  clock.advance(rng, 2, 40);
  state.activated = true;

  const productEvents = weightedChoice(rng, PRODUCT_COUNT_WEIGHTS);
  for (let i = 0; i < productEvents; i++) {
    emit(ctx, rng.pick(PRODUCT_EVENTS));
    clock.advance(rng, 1, 25);
  }

  if (chance(rng, model.valueMoment(user))) {
    if (chance(rng, INVITE_SHARE)) {
      emit(ctx, "invite_teammate", { props: { invite_count: weightedChoice(rng, INVITE_COUNT_WEIGHTS) } });
    } else {
      emit(ctx, "connect_integration", { props: { integration: rng.pick(INTEGRATIONS) } });
    }
    clock.advance(rng, 2, 45);
    state.valueMomentReached = true;
  }
}

export function runTrialAndCheckout(ctx: SessionContext): void {
  const { rng, model, user, state, clock } = ctx;
  if (state.trialStarted) return;
  if (!chance(rng, model.trialStart(user, state.activated))) return;

  emit(ctx, "trial_start");
  clock.advance(rng, 1, 30);
  state.trialStarted = true;

  // A failure usually ends the sequence early; not every sampled attempt runs.
  const attempts = weightedChoice(rng, CHECKOUT_ATTEMPT_WEIGHTS);
  for (let attempt = 1; attempt <= attempts; attempt++) {
    emit(ctx, "checkout_start", { props: { attempt } });
    clock.advance(rng, 1, 10);
    state.checkoutAttempts++;

    if (chance(rng, model.paymentFailure(user))) {
      emit(ctx, "payment_failed", { props: { error_code: rng.pick(PAYMENT_ERROR_CODES) } });
      clock.advance(rng, 3, 25);
      state.paymentFailures++;
      if (chance(rng, CHECKOUT_ABANDON_AFTER_FAILURE)) break;
      continue;
    }

    if (!state.subscribed && chance(rng, model.trialToPaid(user, state.activated))) {
      emit(ctx, "subscription_created");
      state.subscribed = true;
      state.subscriptionStartTs = clock.now;
    }
    clock.advance(rng, 1, 15);
    break;
  }
}

export function runRetentionProxy(ctx: SessionContext): void {
  const { rng, state, clock } = ctx;
  if (!state.activated) return;
  const p = state.subscribed ? RETENTION_PROXY_RATE.subscribed : RETENTION_PROXY_RATE.unsubscribed;
  if (chance(rng, p)) {
    emit(ctx, "dashboard_view");
    clock.advance(rng, 1, 20);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Full journey
// ═══════════════════════════════════════════════════════════════════════════════

export function simulateJourney(
  rng: RandomSource,
  user: FunnelUser,
  model: FunnelModel = DEFAULT_FUNNEL_MODEL,
): JourneyResult {
  const state = initialJourneyState();
  const events: FunnelEvent[] = [];
  const sessionCount = weightedChoice(rng, SESSION_COUNT_WEIGHTS);

  let baseline = user.signup_ts;
  let previousEnd = user.signup_ts;
  for (let s = 0; s < sessionCount; s++) {
    // a session never opens before the previous one has finished
    const start = Math.max(nextSessionStart(rng, baseline), previousEnd);
    invariant(start >= baseline, "Session baseline moved backward", { userId: user.user_id, session: s });
    baseline = start;

    const ctx = openSession(rng, model, user, state, events, s, start);
    runBrowsing(ctx);
    if (ctx.index === 0) runSignupFlow(ctx);
    runActivation(ctx);
    runTrialAndCheckout(ctx);
    runRetentionProxy(ctx);
    state.sessions++;
    previousEnd = ctx.clock.now;
  }

  return { state, events };
}
