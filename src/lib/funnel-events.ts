import { randomHexId } from "./rng";
import type { RandomSource } from "./rng";
import { EVENT_PAGES } from "./funnel-tables";
import type { EventName, EventProperties, FunnelEvent } from "./types";

export function newSessionId(rng: RandomSource): string {
  return `sess_${randomHexId(rng).slice(0, 10)}`;
}

export interface EventInit {
  userId: number;
  ts: number;
  name: EventName;
  sessionId: string;
  referrer?: string | null;
  props?: EventProperties | null;
}

/** Builds an event with a fresh id; the page comes from the event vocabulary. */
export function createEvent(rng: RandomSource, init: EventInit): FunnelEvent {
  return {
    event_id: `evt_${randomHexId(rng)}`,
    user_id: init.userId,
    event_ts: init.ts,
    session_id: init.sessionId,
    event_name: init.name,
    page: EVENT_PAGES[init.name],
    referrer: init.referrer ?? null,
    event_properties: init.props ?? null,
  };
}
