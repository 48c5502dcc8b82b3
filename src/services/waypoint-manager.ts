import type { Waypoint } from '../types/orchestration.js';
import type { WaypointRecord } from '../types/session.js';

export const DEFAULT_MIN_KEEP = 4;

/**
 * User-placed summarization stop points. Answers where summarization should
 * stop when asked; never decides whether it runs.
 */
export class WaypointManager {
  #waypoints: Waypoint[] = [];

  get count(): number {
    return this.#waypoints.length;
  }

  list(): Waypoint[] {
    return [...this.#waypoints]
      .sort((a, b) => a.messageIndex - b.messageIndex)
      .map((waypoint) => ({ ...waypoint }));
  }

  /** Idempotent per index: re-adding returns the existing waypoint. */
  add(messageIndex: number, createdAt: Date = new Date()): Waypoint {
    if (!Number.isInteger(messageIndex) || messageIndex < 0) {
      throw new RangeError(`Waypoint index must be a non-negative integer, got ${messageIndex}.`);
    }
    const existing = this.#waypoints.find((waypoint) => waypoint.messageIndex === messageIndex);
    if (existing) {
      return { ...existing };
    }
    const waypoint: Waypoint = { messageIndex, createdAt };
    this.#waypoints.push(waypoint);
    return { ...waypoint };
  }

  remove(messageIndex: number): boolean {
    const before = this.#waypoints.length;
    this.#waypoints = this.#waypoints.filter((waypoint) => waypoint.messageIndex !== messageIndex);
    return this.#waypoints.length < before;
  }

  has(messageIndex: number): boolean {
    return this.#waypoints.some((waypoint) => waypoint.messageIndex === messageIndex);
  }

  /** Highest waypoint at or below `totalMessages - minKeep`, or null when none qualifies. */
  getBoundary(totalMessages: number, minKeep: number = DEFAULT_MIN_KEEP): number | null {
    const ceiling = totalMessages - minKeep;
    let boundary: number | null = null;
    for (const waypoint of this.#waypoints) {
      if (waypoint.messageIndex <= ceiling && (boundary === null || waypoint.messageIndex > boundary)) {
        boundary = waypoint.messageIndex;
      }
    }
    return boundary;
  }

  /** Drops every waypoint at or below `boundary`; returns how many went. */
  clearSummarizedPast(boundary: number): number {
    const before = this.#waypoints.length;
    this.#waypoints = this.#waypoints.filter((waypoint) => waypoint.messageIndex > boundary);
    return before - this.#waypoints.length;
  }

  /** Drops waypoints that point at or past `length`, after the tail of history is removed. */
  discardFrom(length: number): number {
    const before = this.#waypoints.length;
    this.#waypoints = this.#waypoints.filter((waypoint) => waypoint.messageIndex < length);
    return before - this.#waypoints.length;
  }

  /**
   * Shifts indices down after `removedCount` leading messages are physically
   * discarded. Waypoints on discarded messages are dropped.
   */
  adjustIndices(removedCount: number): void {
    if (removedCount <= 0) {
      return;
    }
    this.#waypoints = this.#waypoints
      .filter((waypoint) => waypoint.messageIndex >= removedCount)
      .map((waypoint) => ({ ...waypoint, messageIndex: waypoint.messageIndex - removedCount }));
  }

  clear(): void {
    this.#waypoints = [];
  }

  toRecords(): WaypointRecord[] {
    return this.list().map((waypoint) => ({
      messageIndex: waypoint.messageIndex,
      createdAt: waypoint.createdAt.toISOString(),
    }));
  }

  restore(records: readonly WaypointRecord[]): void {
    this.clear();
    for (const record of records) {
      const createdAt = new Date(record.createdAt);
      this.add(record.messageIndex, Number.isNaN(createdAt.getTime()) ? new Date() : createdAt);
    }
  }
}
