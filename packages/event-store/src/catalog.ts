/**
 * @capvault/event-store — Event Catalog.
 *
 * Registry of every domain event type the vault emits:
 * - Typed event definitions (type string → payload schema)
 * - Schema versioning (each event type tracks its schema version)
 * - Runtime payload validation before an event is appended
 *
 * Unknown event types fail validation; the store itself accepts any
 * event, so the catalog is the gate producers go through.
 */

import type { z } from "zod";
import type { DomainEvent, EventSource } from "@capvault/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema<TPayload extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Event type string (e.g., "vault.deposit.completed") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  readonly payload: TPayload;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _entries = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same type and version
   * is a no-op; a different version replaces the schema.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${String(schema.version)}`,
      );
    }
    const existing = this._entries.get(schema.type);
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._entries.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._entries.get(eventType);
  }

  has(eventType: string): boolean {
    return this._entries.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._entries.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._entries.values()].filter((s) => s.source === source);
  }

  /**
   * True if the payload matches the registered schema. Unregistered
   * types are never valid.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._entries.get(eventType);
    return schema !== undefined && schema.payload.safeParse(payload).success;
  }

  /**
   * Throw a CatalogError unless the event is registered, its source
   * matches the schema, and its payload validates.
   */
  assertValid(event: DomainEvent): void {
    const schema = this._entries.get(event.type);
    if (schema === undefined) {
      throw new CatalogError(`Unknown event type "${event.type}"`);
    }
    if (schema.source !== event.metadata.source) {
      throw new CatalogError(
        `Event "${event.type}" must come from "${schema.source}", got "${event.metadata.source}"`,
      );
    }
    const parsed = schema.payload.safeParse(event.payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new CatalogError(
        `Invalid payload for "${event.type}"${where}: ${issue?.message ?? "schema mismatch"}`,
      );
    }
  }

  get size(): number {
    return this._entries.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
