// ─── Dataset Assembler ──────────────────────────────────────────────────────
// Normalizes timestamps, orders events and persists the three tables as CSV.

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import Papa from "papaparse";
import { computeStatsFromData } from "./funnel-synth-engine";
import type { FunnelOutputStats, FunnelSynthResult } from "./funnel-synth-engine";
import type {
  EventCsvRow,
  FunnelEvent,
  FunnelSubscription,
  FunnelUser,
  SubscriptionCsvRow,
  UserCsvRow,
} from "./types";

export const USER_COLUMNS: (keyof UserCsvRow)[] = [
  "user_id", "signup_ts", "acquisition_channel", "device", "country", "company_size", "persona", "is_b2b_email",
];
export const EVENT_COLUMNS: (keyof EventCsvRow)[] = [
  "event_id", "user_id", "event_ts", "session_id", "event_name", "page", "referrer", "event_properties",
];
export const SUBSCRIPTION_COLUMNS: (keyof SubscriptionCsvRow)[] = [
  "user_id", "plan", "mrr", "trial_start_ts", "subscription_start_ts", "churn_ts",
];

export const DATASET_FILES = {
  users: "users.csv",
  events: "events.csv",
  subscriptions: "subscriptions.csv",
} as const;

export class DatasetWriteError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Failed to write dataset file ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "DatasetWriteError";
  }
}

export interface AssembledDataset {
  users: UserCsvRow[];
  events: EventCsvRow[];
  subscriptions: SubscriptionCsvRow[];
}

export function ts(ms: number): string { return new Date(ms).toISOString().replace(".000Z", "Z"); }

// ═══════════════════════════════════════════════════════════════════════════════
// Row normalization
// ═══════════════════════════════════════════════════════════════════════════════

/** Stable sort by (user_id, event_ts); events with equal keys keep emission order. */
export function sortEvents(events: readonly FunnelEvent[]): FunnelEvent[] {
  return [...events].sort((a, b) => a.user_id - b.user_id || a.event_ts - b.event_ts);
}

export function toUserRow(u: FunnelUser): UserCsvRow {
  return {
    user_id: String(u.user_id),
    signup_ts: ts(u.signup_ts),
    acquisition_channel: u.acquisition_channel,
    device: u.device,
    country: u.country,
    company_size: u.company_size,
    persona: u.persona,
    is_b2b_email: String(u.is_b2b_email),
  };
}

export function toEventRow(e: FunnelEvent): EventCsvRow {
  return {
    event_id: e.event_id,
    user_id: String(e.user_id),
    event_ts: ts(e.event_ts),
    session_id: e.session_id,
    event_name: e.event_name,
    page: e.page ?? "",
    referrer: e.referrer ?? "",
    event_properties: JSON.stringify(e.event_properties ?? {}),
  };
}

export function toSubscriptionRow(s: FunnelSubscription): SubscriptionCsvRow {
  return {
    user_id: String(s.user_id),
    plan: s.plan,
    mrr: s.mrr.toFixed(2),
    trial_start_ts: "",
    subscription_start_ts: ts(s.subscription_start_ts),
    churn_ts: s.churn_ts === null ? "" : ts(s.churn_ts),
  };
}

export function assembleDataset(result: Pick<FunnelSynthResult, "users" | "events" | "subscriptions">): AssembledDataset {
  return {
    users: result.users.map(toUserRow),
    events: sortEvents(result.events).map(toEventRow),
    subscriptions: result.subscriptions.map(toSubscriptionRow),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CSV Serialization
// ═══════════════════════════════════════════════════════════════════════════════

export function serializeCsv<T extends object>(rows: T[], columns: (keyof T & string)[]): string {
  // unparse drops the header for an empty table
  if (rows.length === 0) return columns.join(",");
  return Papa.unparse(rows, { columns, newline: "\n", header: true });
}

export function serializeDataset(dataset: AssembledDataset): Record<keyof typeof DATASET_FILES, string> {
  return {
    users: serializeCsv(dataset.users, USER_COLUMNS),
    events: serializeCsv(dataset.events, EVENT_COLUMNS),
    subscriptions: serializeCsv(dataset.subscriptions, SUBSCRIPTION_COLUMNS),
  };
}

export interface WrittenDataset {
  outputDir: string;
  files: Record<keyof typeof DATASET_FILES, string>;
}

export async function writeDataset(outputDir: string, dataset: AssembledDataset): Promise<WrittenDataset> {
  const dir = path.resolve(outputDir);
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new DatasetWriteError(dir, err);
  }

  const csv = serializeDataset(dataset);
  const files = {
    users: path.join(dir, DATASET_FILES.users),
    events: path.join(dir, DATASET_FILES.events),
    subscriptions: path.join(dir, DATASET_FILES.subscriptions),
  };

  const keys = ["users", "events", "subscriptions"] as const;
  await Promise.all(keys.map(async (key) => {
    try {
      await writeFile(files[key], csv[key], "utf-8");
    } catch (err) {
      throw new DatasetWriteError(files[key], err);
    }
  }));

  return { outputDir: dir, files };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Read-back (verifies written files)
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCsv<T>(text: string): T[] {
  const parsed = Papa.parse<T>(text, { header: true, skipEmptyLines: true, delimiter: "," });
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`Malformed CSV at row ${first.row ?? "?"}: ${first.message}`);
  }
  return parsed.data;
}

export async function readDataset(outputDir: string): Promise<AssembledDataset> {
  const dir = path.resolve(outputDir);
  const [users, events, subscriptions] = await Promise.all([
    readFile(path.join(dir, DATASET_FILES.users), "utf-8"),
    readFile(path.join(dir, DATASET_FILES.events), "utf-8"),
    readFile(path.join(dir, DATASET_FILES.subscriptions), "utf-8"),
  ]);
  return {
    users: parseCsv<UserCsvRow>(users),
    events: parseCsv<EventCsvRow>(events),
    subscriptions: parseCsv<SubscriptionCsvRow>(subscriptions),
  };
}

export async function readDatasetSummary(outputDir: string): Promise<FunnelOutputStats> {
  const { users, events, subscriptions } = await readDataset(outputDir);
  return computeStatsFromData(users, events, subscriptions);
}
