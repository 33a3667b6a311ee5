import type { DomainEvent } from "@concord/types";

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: "corr-1",
      source: "registry",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}
