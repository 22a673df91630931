/**
 * Core Strikewatch types
 *
 * Shared by the store, the ingest pipeline, retention, scheduling and the
 * exporters. Timestamps crossing module boundaries are `Date`; timestamps
 * at rest are canonical ISO 8601 strings (`2024-06-01T00:10:00.000Z`).
 */

/**
 * Injectable source of "now". Every component that reasons about time
 * takes one so tests can pin the wall clock.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * A stored lightning strike.
 *
 * `quality` is the provider's maximal circular gap (degrees, integer);
 * lower is better.
 */
export interface StrikeRow {
  readonly timestamp: string;
  readonly lat: number | null;
  readonly lon: number | null;
  readonly quality: number | null;
}

/**
 * One decoded payload record, before it is attached to a slot timestamp
 */
export interface StrikeRecord {
  readonly lat: number | null;
  readonly lon: number | null;
  readonly quality: number | null;
}

export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
}

export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export const EVENT_KINDS = [
  'download_attempt',
  'download_success',
  'download_error',
  'purge',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export function isEventKind(value: string): value is EventKind {
  return EVENT_KINDS.some((kind) => kind === value);
}

/**
 * Audit trail entry.
 *
 * `period` is the ISO instant that ends the data period the event is
 * about: the end of an ingested range, or a purge's deletion bound.
 * Event retention keeps anything whose period is still inside the
 * strike retention window.
 */
export interface AuditEvent {
  readonly id: number;
  readonly timestamp: string;
  readonly kind: string;
  readonly details: unknown;
  readonly period: string | null;
}
