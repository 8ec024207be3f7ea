/**
 * VaultEventLog — Writes vault domain events to the event store.
 *
 * Every event is checked against the vault catalog before it is
 * appended, so the stream only ever holds well-formed payloads.
 */

import { randomUUID } from "node:crypto";
import type { Address, DomainEvent } from "@capvault/types";
import type { EventCatalog, EventStore, VaultEventType } from "@capvault/event-store";
import { createVaultCatalog } from "@capvault/event-store";

export const VAULT_STREAM = "vault";

export class VaultEventLog {
  private readonly catalog: EventCatalog;

  constructor(
    readonly store: EventStore,
    private readonly now: () => Date = () => new Date(),
    catalog?: EventCatalog,
  ) {
    this.catalog = catalog ?? createVaultCatalog();
  }

  record(
    type: VaultEventType,
    actor: Address,
    correlationId: string,
    payload: Readonly<Record<string, string>>,
  ): void {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this.now().toISOString(),
        actor,
        correlationId,
        source: this.catalog.getSchema(type)?.source ?? "vault",
      },
      payload,
    };
    this.catalog.assertValid(event);
    this.store.append(VAULT_STREAM, [event]);
  }
}
