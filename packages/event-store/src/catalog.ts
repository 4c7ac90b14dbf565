/**
 * @popchain/event-store: Event Catalog.
 *
 * Formalizes the audit events into a catalog with:
 * - Typed event definitions (type string → payload shape)
 * - A schema version per event type
 * - Runtime payload validation
 *
 * Unknown event types never validate: the host ledger refuses to
 * publish an event the catalog doesn't know.
 */

import type { EventMetadata } from "@popchain/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "certificate.minted") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventMetadata["source"];

  /** Returns true if the payload is valid for this version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Registry of domain event types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "certificate.minted",
 *   version: 1,
 *   description: "A certificate was minted",
 *   source: "certificates",
 *   validate: (p) => typeof p === "object" && p !== null && "certificateId" in p,
 * });
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   * Re-registering a type replaces its schema (version upgrade).
   */
  register(schema: EventSchema): void {
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.validate(payload);
  }
}
