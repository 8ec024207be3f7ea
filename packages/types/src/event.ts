/**
 * Event Types
 *
 * Append-only event architecture.
 * Every observable outcome of a vault operation is captured as a
 * DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Events are for observability; ledger correctness never depends on them
 */

/** Which CapVault subsystem emitted an event. */
export type EventSource = "vault" | "ledger" | "admin";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events (one per vault operation) */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event in the CapVault system.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.deposit.completed") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (amounts as base-unit strings) */
  readonly payload: Readonly<Record<string, unknown>>;
}
