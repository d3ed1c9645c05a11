import { describe, it, expect } from "@jest/globals";
import {
  DEFAULT_FUNNEL_MODEL,
  activationProbability,
  churnProbability,
  onboardingStartProbability,
  paymentFailureProbability,
  pickPlan,
  trialStartProbability,
  trialToPaidProbability,
  valueMomentProbability,
  withProbabilityOverrides,
} from "@/lib/funnel-model";
import type { FunnelUser } from "@/lib/types";

const user: FunnelUser = {
  user_id: 1,
  signup_ts: Date.UTC(2024, 8, 1),
  acquisition_channel: "referral",
  device: "mobile",
  country: "IN",
  company_size: "11-50",
  persona: "agency",
  is_b2b_email: true,
};

describe("stage probabilities", () => {
  it("uses the channel table for onboarding start", () => {
    expect(onboardingStartProbability("organic")).toBe(0.88);
    expect(onboardingStartProbability("paid_search")).toBe(0.85);
    expect(onboardingStartProbability("paid_social")).toBe(0.78);
    expect(onboardingStartProbability("partner")).toBe(0.82);
    expect(onboardingStartProbability("referral")).toBe(0.90);
  });

  it("adjusts activation for device, persona and company size", () => {
    expect(activationProbability("organic", "web", "startup_ops", "solo")).toBeCloseTo(0.52, 10);
    expect(activationProbability("paid_social", "mobile", "maker", "51-200")).toBeCloseTo(0.24, 10);
    expect(activationProbability("referral", "web", "analyst", "2-10")).toBeCloseTo(0.59, 10);
    expect(activationProbability("partner", "web", "agency", "11-50")).toBeCloseTo(0.41, 10);
  });

  it("maps personas to value-moment rates", () => {
    expect(valueMomentProbability("maker")).toBe(0.35);
    expect(valueMomentProbability("startup_ops")).toBe(0.45);
    expect(valueMomentProbability("analyst")).toBe(0.30);
    expect(valueMomentProbability("agency")).toBe(0.50);
  });

  it("scores trial start by activation and channel", () => {
    expect(trialStartProbability(true, "referral")).toBeCloseTo(0.65, 10);
    expect(trialStartProbability(true, "partner")).toBeCloseTo(0.62, 10);
    expect(trialStartProbability(false, "paid_social")).toBeCloseTo(0.05, 10);
    expect(trialStartProbability(false, "organic")).toBeCloseTo(0.10, 10);
  });

  it("raises payment failure on mobile and in IN", () => {
    expect(paymentFailureProbability("web", "US")).toBeCloseTo(0.045, 10);
    expect(paymentFailureProbability("web", "IN")).toBeCloseTo(0.085, 10);
    expect(paymentFailureProbability("mobile", "IN")).toBeCloseTo(0.16, 10);
  });

  it("scores trial-to-paid by activation, channel and company size", () => {
    expect(trialToPaidProbability(true, "referral", "11-50")).toBeCloseTo(0.51, 10);
    expect(trialToPaidProbability(true, "organic", "51-200")).toBeCloseTo(0.49, 10);
    expect(trialToPaidProbability(true, "paid_search", "2-10")).toBeCloseTo(0.42, 10);
    expect(trialToPaidProbability(false, "paid_social", "solo")).toBeCloseTo(0.01, 10);
  });

  it("churns cheaper plans more often", () => {
    expect(churnProbability("starter")).toBe(0.30);
    expect(churnProbability("pro")).toBe(0.18);
    expect(churnProbability("business")).toBe(0.10);
  });
});

describe("pickPlan", () => {
  it("derives plan and price from company size", () => {
    expect(pickPlan("solo")).toEqual({ plan: "starter", mrr: 29 });
    expect(pickPlan("2-10")).toEqual({ plan: "pro", mrr: 79 });
    expect(pickPlan("11-50")).toEqual({ plan: "pro", mrr: 79 });
    expect(pickPlan("51-200")).toEqual({ plan: "business", mrr: 199 });
  });
});

describe("DEFAULT_FUNNEL_MODEL", () => {
  it("reads the user's attributes", () => {
    expect(DEFAULT_FUNNEL_MODEL.activation(user)).toBeCloseTo(0.58 - 0.05 + 0.03, 10);
    expect(DEFAULT_FUNNEL_MODEL.paymentFailure(user)).toBeCloseTo(0.16, 10);
    expect(DEFAULT_FUNNEL_MODEL.trialToPaid(user, false)).toBeCloseTo(0.06 + 0.05 + 0.04, 10);
    expect(DEFAULT_FUNNEL_MODEL.onboardingStart(user)).toBe(0.90);
  });
});

describe("withProbabilityOverrides", () => {
  it("pins only the named gates", () => {
    const model = withProbabilityOverrides(DEFAULT_FUNNEL_MODEL, { activation: 1, churn: 0 });
    expect(model.activation(user)).toBe(1);
    expect(model.churn("starter")).toBe(0);
    expect(model.trialStart(user, true)).toBeCloseTo(0.65, 10);
    expect(model.valueMoment(user)).toBe(0.50);
  });

  it("clamps pinned values", () => {
    const model = withProbabilityOverrides(DEFAULT_FUNNEL_MODEL, { trialToPaid: 3, paymentFailure: -1 });
    expect(model.trialToPaid(user, false)).toBe(1);
    expect(model.paymentFailure(user)).toBe(0);
  });
});
