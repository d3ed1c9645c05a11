// ─── Funnel conditional-probability model ───────────────────────────────────
// Each gate is a deterministic function of the user's static attributes and
// the milestones reached so far. The journey simulator only talks to the
// `FunnelModel` interface so tests can pin any gate to a constant.

import { clamp } from "./rng";
import {
  ACTIVATION_BASE_BY_CHANNEL,
  CHURN_BY_PLAN,
  ONBOARDING_START_BY_CHANNEL,
  PLAN_BY_COMPANY_SIZE,
  PLAN_PRICES,
  VALUE_MOMENT_BY_PERSONA,
} from "./funnel-tables";
import type {
  AcquisitionChannel,
  CompanySize,
  Country,
  Device,
  FunnelUser,
  Persona,
  PlanTier,
} from "./types";

export function onboardingStartProbability(channel: AcquisitionChannel): number {
  return ONBOARDING_START_BY_CHANNEL[channel];
}

export function activationProbability(
  channel: AcquisitionChannel,
  device: Device,
  persona: Persona,
  companySize: CompanySize,
): number {
  let p = ACTIVATION_BASE_BY_CHANNEL[channel];
  if (device === "mobile") p -= 0.05;
  if (persona === "maker" || persona === "agency") p += 0.03;
  else if (persona === "analyst") p += 0.01;
  if (companySize === "51-200") p -= 0.02;
  return clamp(p);
}

export function valueMomentProbability(persona: Persona): number {
  return VALUE_MOMENT_BY_PERSONA[persona];
}

export function trialStartProbability(activated: boolean, channel: AcquisitionChannel): number {
  let p = activated ? 0.62 : 0.07;
  if (channel === "referral" || channel === "organic") p += 0.03;
  if (channel === "paid_social") p -= 0.02;
  return clamp(p);
}

export function paymentFailureProbability(device: Device, country: Country): number {
  let p = device === "web" ? 0.045 : 0.12;
  if (country === "IN") p += 0.04;
  return clamp(p);
}

export function trialToPaidProbability(
  activated: boolean,
  channel: AcquisitionChannel,
  companySize: CompanySize,
): number {
  let p = activated ? 0.42 : 0.06;
  if (channel === "referral") p += 0.05;
  else if (channel === "organic") p += 0.03;
  else if (channel === "paid_social") p -= 0.05;
  if (companySize === "11-50" || companySize === "51-200") p += 0.04;
  return clamp(p);
}

export function churnProbability(plan: PlanTier): number {
  return CHURN_BY_PLAN[plan];
}

export function pickPlan(companySize: CompanySize): { plan: PlanTier; mrr: number } {
  const plan = PLAN_BY_COMPANY_SIZE[companySize];
  return { plan, mrr: PLAN_PRICES[plan] };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Model interface + overrides
// ═══════════════════════════════════════════════════════════════════════════════

export interface FunnelModel {
  onboardingStart(user: FunnelUser): number;
  activation(user: FunnelUser): number;
  valueMoment(user: FunnelUser): number;
  trialStart(user: FunnelUser, activated: boolean): number;
  paymentFailure(user: FunnelUser): number;
  trialToPaid(user: FunnelUser, activated: boolean): number;
  churn(plan: PlanTier): number;
}

export type FunnelGate = keyof FunnelModel;
export type ProbabilityOverrides = Partial<Record<FunnelGate, number>>;

export const DEFAULT_FUNNEL_MODEL: FunnelModel = {
  onboardingStart: (u) => onboardingStartProbability(u.acquisition_channel),
  activation: (u) => activationProbability(u.acquisition_channel, u.device, u.persona, u.company_size),
  valueMoment: (u) => valueMomentProbability(u.persona),
  trialStart: (u, activated) => trialStartProbability(activated, u.acquisition_channel),
  paymentFailure: (u) => paymentFailureProbability(u.device, u.country),
  trialToPaid: (u, activated) => trialToPaidProbability(activated, u.acquisition_channel, u.company_size),
  churn: (plan) => churnProbability(plan),
};

/** Pins the named gates to a constant; the rest fall through to `base`. */
export function withProbabilityOverrides(base: FunnelModel, overrides: ProbabilityOverrides): FunnelModel {
  const fixed = (gate: FunnelGate): number | undefined => {
    const v = overrides[gate];
    return v === undefined ? undefined : clamp(v);
  };
  return {
    onboardingStart: (u) => fixed("onboardingStart") ?? base.onboardingStart(u),
    activation: (u) => fixed("activation") ?? base.activation(u),
    valueMoment: (u) => fixed("valueMoment") ?? base.valueMoment(u),
    trialStart: (u, activated) => fixed("trialStart") ?? base.trialStart(u, activated),
    paymentFailure: (u) => fixed("paymentFailure") ?? base.paymentFailure(u),
    trialToPaid: (u, activated) => fixed("trialToPaid") ?? base.trialToPaid(u, activated),
    churn: (plan) => fixed("churn") ?? base.churn(plan),
  };
}
