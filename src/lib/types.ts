export const ACQUISITION_CHANNELS = ["organic", "paid_search", "paid_social", "partner", "referral"] as const;
export const DEVICES = ["web", "mobile"] as const;
export const COUNTRIES = ["US", "IN", "UK", "CA", "AU"] as const;
export const COMPANY_SIZES = ["solo", "2-10", "11-50", "51-200"] as const;
export const PERSONAS = ["maker", "startup_ops", "analyst", "agency"] as const;
export const PLAN_TIERS = ["starter", "pro", "business"] as const;

export type AcquisitionChannel = (typeof ACQUISITION_CHANNELS)[number];
export type Device = (typeof DEVICES)[number];
export type Country = (typeof COUNTRIES)[number];
export type CompanySize = (typeof COMPANY_SIZES)[number];
export type Persona = (typeof PERSONAS)[number];
export type PlanTier = (typeof PLAN_TIERS)[number];

export type BrowsingEventName = "landing_page_view" | "pricing_view" | "case_study_view" | "docs_view" | "faq_view";
export type ProductEventName = "dashboard_view" | "settings_view" | "project_view" | "task_create" | "task_update" | "search";

export type EventName =
  | BrowsingEventName
  | ProductEventName
  | "signup"
  | "email_verified"
  | "onboarding_start"
  | "onboarding_complete"
  | "create_first_project"
  | "invite_teammate"
  | "connect_integration"
  | "trial_start"
  | "checkout_start"
  | "payment_failed"
  | "subscription_created"
  | "cancel_subscription"
  | "active_day_7"
  | "active_day_30";

export type EventProperties = Record<string, string | number>;

// Timestamps are epoch milliseconds until the assembler renders them.
export interface FunnelUser {
  user_id: number;
  signup_ts: number;
  acquisition_channel: AcquisitionChannel;
  device: Device;
  country: Country;
  company_size: CompanySize;
  persona: Persona;
  is_b2b_email: boolean;
}

export type UserAttributes = Omit<FunnelUser, "user_id" | "signup_ts">;

export interface FunnelEvent {
  event_id: string;
  user_id: number;
  event_ts: number;
  session_id: string;
  event_name: EventName;
  page: string | null;
  referrer: string | null;
  event_properties: EventProperties | null;
}

export interface FunnelSubscription {
  user_id: number;
  plan: PlanTier;
  mrr: number;
  trial_start_ts: null; // reserved, never populated
  subscription_start_ts: number;
  churn_ts: number | null;
}

// ─── CSV rows (what the assembler writes and reads back) ────────────────────

export interface UserCsvRow {
  user_id: string;
  signup_ts: string;
  acquisition_channel: string;
  device: string;
  country: string;
  company_size: string;
  persona: string;
  is_b2b_email: string;
}

export interface EventCsvRow {
  event_id: string;
  user_id: string;
  event_ts: string;
  session_id: string;
  event_name: string;
  page: string;
  referrer: string;
  event_properties: string;
}

export interface SubscriptionCsvRow {
  user_id: string;
  plan: string;
  mrr: string;
  trial_start_ts: string;
  subscription_start_ts: string;
  churn_ts: string;
}
