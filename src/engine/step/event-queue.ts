import { type GameTime } from "../../types/timestamp";

// Internal timed events. At most one of each kind is pending at a time.
export type InternalEvent =
  | { readonly kind: "LineClear" }
  | { readonly kind: "Lock" }
  | { readonly kind: "HardDrop" }
  | { readonly kind: "SonicDrop" }
  | { readonly kind: "SoftDrop" }
  | { readonly kind: "Fall" }
  | { readonly kind: "MoveSlow" }
  | { readonly kind: "MoveFast" }
  | { readonly kind: "Rotate"; readonly turns: number }
  | { readonly kind: "Spawn" };

export type InternalEventKind = InternalEvent["kind"];

export type ScheduledEvent = {
  readonly event: InternalEvent;
  readonly time: GameTime;
};

// Sorted by (time, priority)
export type EventQueue = ReadonlyArray<ScheduledEvent>;

// Tie-break at equal times, lower first: lock resolution before gravity before spawn
export const EVENT_PRIORITY: Readonly<Record<InternalEventKind, number>> = {
  Fall: 5,
  HardDrop: 2,
  LineClear: 0,
  Lock: 1,
  MoveFast: 7,
  MoveSlow: 6,
  Rotate: 8,
  SoftDrop: 4,
  SonicDrop: 3,
  Spawn: 9,
};

export const EMPTY_QUEUE: EventQueue = [];

function before(a: ScheduledEvent, b: ScheduledEvent): boolean {
  if (a.time !== b.time) return a.time < b.time;
  return EVENT_PRIORITY[a.event.kind] < EVENT_PRIORITY[b.event.kind];
}

// Insert an event, replacing any pending event of the same kind
export function schedule(
  queue: EventQueue,
  event: InternalEvent,
  time: GameTime,
): EventQueue {
  const entry: ScheduledEvent = { event, time };
  const rest = queue.filter((e) => e.event.kind !== event.kind);
  const at = rest.findIndex((e) => before(entry, e));
  if (at === -1) return [...rest, entry];
  return [...rest.slice(0, at), entry, ...rest.slice(at)];
}

export function cancel(queue: EventQueue, kind: InternalEventKind): EventQueue {
  return queue.some((e) => e.event.kind === kind)
    ? queue.filter((e) => e.event.kind !== kind)
    : queue;
}

export function isPending(queue: EventQueue, kind: InternalEventKind): boolean {
  return queue.some((e) => e.event.kind === kind);
}

export function peek(queue: EventQueue): ScheduledEvent | undefined {
  return queue[0];
}

export function pop(queue: EventQueue): EventQueue {
  return queue.slice(1);
}
