// ─── Funnel probability tables ──────────────────────────────────────────────
// Single source of truth for every distribution the generator samples from.

import type { Weighted } from "./rng";
import type {
  AcquisitionChannel,
  BrowsingEventName,
  CompanySize,
  Country,
  Device,
  EventName,
  Persona,
  PlanTier,
  ProductEventName,
} from "./types";

export const DEFAULT_TOTAL_USERS = 20000;
export const DEFAULT_SEED = 42;
export const DEFAULT_LOOKBACK_DAYS = 90;

export const MINUTE = 60000;
export const HOUR = 3600000;
export const DAY = 86400000;

// ═══════════════════════════════════════════════════════════════════════════════
// Population
// ═══════════════════════════════════════════════════════════════════════════════

export const CHANNEL_WEIGHTS: Weighted<AcquisitionChannel> = [
  ["organic", 0.30],
  ["paid_search", 0.20],
  ["paid_social", 0.25],
  ["partner", 0.15],
  ["referral", 0.10],
];

export const DEVICE_WEIGHTS: Weighted<Device> = [
  ["web", 0.70],
  ["mobile", 0.30],
];

export const COUNTRY_WEIGHTS: Weighted<Country> = [
  ["US", 0.40],
  ["IN", 0.25],
  ["UK", 0.15],
  ["CA", 0.10],
  ["AU", 0.10],
];

export const COMPANY_SIZE_WEIGHTS: Weighted<CompanySize> = [
  ["solo", 0.35],
  ["2-10", 0.30],
  ["11-50", 0.20],
  ["51-200", 0.15],
];

export const B2B_EMAIL_RATE = 0.65;
export const SIGNUP_MINUTE_JITTER_MAX = 1440;

// ═══════════════════════════════════════════════════════════════════════════════
// Sessions
// ═══════════════════════════════════════════════════════════════════════════════

export const SESSION_COUNT_WEIGHTS: Weighted<number> = [[1, 0.45], [2, 0.28], [3, 0.16], [4, 0.08], [5, 0.03]];
export const SESSION_GAP_HOURS_WEIGHTS: Weighted<number> = [[0, 0.20], [1, 0.20], [3, 0.20], [8, 0.15], [24, 0.18], [48, 0.07]];
export const SESSION_JITTER_MAX_MINUTES = 120;

export const PAID_SOCIAL_REFERRER_WEIGHTS: Weighted<string> = [
  ["linkedin", 0.55],
  ["instagram", 0.25],
  ["facebook", 0.20],
];

export const FIXED_REFERRER: Record<Exclude<AcquisitionChannel, "paid_social">, string> = {
  organic: "google",
  paid_search: "google",
  partner: "partner_site",
  referral: "direct",
};

// ═══════════════════════════════════════════════════════════════════════════════
// Event vocabularies
// ═══════════════════════════════════════════════════════════════════════════════

export const BROWSING_EVENTS: readonly BrowsingEventName[] = [
  "landing_page_view",
  "pricing_view",
  "case_study_view",
  "docs_view",
  "faq_view",
];

export const PRODUCT_EVENTS: readonly ProductEventName[] = [
  "dashboard_view",
  "settings_view",
  "project_view",
  "task_create",
  "task_update",
  "search",
];

export const EVENT_PAGES: Record<EventName, string> = {
  landing_page_view: "/",
  pricing_view: "/pricing",
  case_study_view: "/customers",
  docs_view: "/docs",
  faq_view: "/faq",
  signup: "/signup",
  email_verified: "/verify",
  onboarding_start: "/onboarding",
  onboarding_complete: "/onboarding/done",
  create_first_project: "/app/new_project",
  dashboard_view: "/app",
  settings_view: "/app",
  project_view: "/app",
  task_create: "/app",
  task_update: "/app",
  search: "/app",
  invite_teammate: "/app/invite",
  connect_integration: "/app/integrations",
  trial_start: "/app/billing",
  checkout_start: "/checkout",
  payment_failed: "/checkout",
  subscription_created: "/checkout/success",
  cancel_subscription: "/app/billing",
  active_day_7: "/app",
  active_day_30: "/app",
};

export const BROWSE_COUNT_WEIGHTS: Weighted<number> = [[1, 0.35], [2, 0.35], [3, 0.20], [4, 0.10]];
export const PRODUCT_COUNT_WEIGHTS: Weighted<number> = [[1, 0.20], [2, 0.35], [3, 0.30], [4, 0.15]];
export const INVITE_COUNT_WEIGHTS: Weighted<number> = [[1, 0.55], [2, 0.30], [3, 0.15]];
export const CHECKOUT_ATTEMPT_WEIGHTS: Weighted<number> = [[1, 0.70], [2, 0.22], [3, 0.08]];

export const INTEGRATIONS = ["slack", "google_drive", "github"] as const;
export const PAYMENT_ERROR_CODES = ["PMT_001", "PMT_002", "PMT_003", "PMT_NET", "PMT_3DS"] as const;
export const CANCEL_REASONS = ["price", "low_value", "unknown", "competitor"] as const;

// ═══════════════════════════════════════════════════════════════════════════════
// Stage probabilities
// ═══════════════════════════════════════════════════════════════════════════════

export const EMAIL_VERIFY_RATE = 0.78;
export const ONBOARDING_COMPLETE_RATE = 0.70;
export const INVITE_SHARE = 0.55; // remainder connects an integration
export const CHECKOUT_ABANDON_AFTER_FAILURE = 0.65;
export const RETENTION_PROXY_RATE = { subscribed: 0.55, unsubscribed: 0.40 } as const;

export const ONBOARDING_START_BY_CHANNEL: Record<AcquisitionChannel, number> = {
  organic: 0.88,
  paid_search: 0.85,
  paid_social: 0.78,
  partner: 0.82,
  referral: 0.90,
};

export const ACTIVATION_BASE_BY_CHANNEL: Record<AcquisitionChannel, number> = {
  organic: 0.52,
  paid_search: 0.42,
  paid_social: 0.28,
  partner: 0.38,
  referral: 0.58,
};

export const VALUE_MOMENT_BY_PERSONA: Record<Persona, number> = {
  maker: 0.35,
  startup_ops: 0.45,
  analyst: 0.30,
  agency: 0.50,
};

// ═══════════════════════════════════════════════════════════════════════════════
// Billing
// ═══════════════════════════════════════════════════════════════════════════════

export const PLAN_PRICES: Record<PlanTier, number> = {
  starter: 29,
  pro: 79,
  business: 199,
};

export const PLAN_BY_COMPANY_SIZE: Record<CompanySize, PlanTier> = {
  solo: "starter",
  "2-10": "pro",
  "11-50": "pro",
  "51-200": "business",
};

export const CHURN_BY_PLAN: Record<PlanTier, number> = {
  starter: 0.30,
  pro: 0.18,
  business: 0.10,
};

export const CHURN_DAYS_MIN = 30;
export const CHURN_DAYS_MAX = 75;

export const RETENTION_MARKERS = {
  unsubscribedDay7Rate: 0.18,
  unsubscribedDay7JitterMaxMinutes: 600,
  subscribedDay7Rate: 0.60,
  subscribedDay30Rate: 0.45,
} as const;
