/**
 * @capvault/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - The HTTP node and the demo, whose state lives for the process
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - No durability guarantees
 */

import type { DomainEvent } from "@capvault/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `appendedAt`. Default: the system clock. */
  readonly now?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  /** Current version of each stream */
  private readonly _versions = new Map<string, number>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _now: () => Date;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const fromVersion = (this._versions.get(streamId) ?? 0) + 1;
    const appendedAt = this._now().toISOString();
    let previousHash = this._lastHash;
    const stored: HashedStoredEvent[] = events.map((event, i) => {
      const base = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      const linked = { ...base, hash, previousHash };
      previousHash = hash;
      return linked;
    });

    const toVersion = fromVersion + stored.length - 1;
    this._lastHash = previousHash;
    this._versions.set(streamId, toVersion);
    this._globalLog.push(...stored);

    return {
      streamId,
      fromVersion,
      toVersion,
      count: stored.length,
      globalPosition: this._globalLog.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const result =
      (options?.direction ?? "forward") === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }
}

function limit<T>(events: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
