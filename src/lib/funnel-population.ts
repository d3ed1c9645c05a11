import { chance, weightedChoice } from "./rng";
import type { RandomSource } from "./rng";
import {
  B2B_EMAIL_RATE,
  CHANNEL_WEIGHTS,
  COMPANY_SIZE_WEIGHTS,
  COUNTRY_WEIGHTS,
  DAY,
  DEVICE_WEIGHTS,
  MINUTE,
  SIGNUP_MINUTE_JITTER_MAX,
} from "./funnel-tables";
import { PERSONAS } from "./types";
import type { FunnelUser, UserAttributes } from "./types";

export interface PopulationOptions {
  referenceTime: number;
  lookbackDays: number;
  /** Pins attributes after sampling; the draws still happen. */
  overrides?: Partial<UserAttributes>;
}

export function sampleSignupTime(rng: RandomSource, referenceTime: number, lookbackDays: number): number {
  const days = rng.int(0, lookbackDays);
  const minutes = rng.int(0, SIGNUP_MINUTE_JITTER_MAX);
  return referenceTime - days * DAY - minutes * MINUTE;
}

export function samplePopulationUser(rng: RandomSource, userId: number, opts: PopulationOptions): FunnelUser {
  const signupTs = sampleSignupTime(rng, opts.referenceTime, opts.lookbackDays);

  const sampled: UserAttributes = {
    acquisition_channel: weightedChoice(rng, CHANNEL_WEIGHTS),
    device: weightedChoice(rng, DEVICE_WEIGHTS),
    country: weightedChoice(rng, COUNTRY_WEIGHTS),
    company_size: weightedChoice(rng, COMPANY_SIZE_WEIGHTS),
    persona: rng.pick(PERSONAS),
    is_b2b_email: chance(rng, B2B_EMAIL_RATE),
  };

  return {
    user_id: userId,
    signup_ts: signupTs,
    ...sampled,
    ...opts.overrides,
  };
}
