import type { DomainEvent, EventSource } from "@capvault/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  source: EventSource = "vault",
): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${String(counter)}`,
      timestamp: "2024-01-15T10:00:00.000Z",
      actor: "test",
      correlationId: `corr-${String(counter)}`,
      source,
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${String(i + 1)}`));
}
