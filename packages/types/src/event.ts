/**
 * Event Types
 *
 * Append-only event architecture.
 * Every settled donation is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Payload values are JSON-safe: amounts travel as decimal strings
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event (caller address, service name) */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events (lock and its finalize share one) */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "reconciler" | "nav" | "across";
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "pool.tokens.received") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
