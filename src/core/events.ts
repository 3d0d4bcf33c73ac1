/**
 * Event System for the Perp Liquidity Analyzer
 *
 * Central event bus for per-venue progress during an analysis.
 * Uses typed events for compile-time safety.
 */

import { EventEmitter } from 'eventemitter3';
import type {
  SystemEvent,
  SystemEventType,
  VenueAnalysis,
  VenueName,
} from './types.js';

// ============================================================================
// EVENT PAYLOAD TYPES
// ============================================================================

export interface EventPayloads {
  ANALYSIS_STARTED: { requestId: string; instrument: string; venues: VenueName[] };
  BOOK_FETCHED: {
    venue: VenueName;
    instrument: string;
    durationMs: number;
    bidLevels: number;
    askLevels: number;
  };
  VENUE_FAILED: {
    venue: VenueName;
    instrument: string;
    code: string;
    error: string;
    durationMs?: number;
  };
  VENUE_ANALYZED: { requestId: string; analysis: VenueAnalysis };
  ANALYSIS_COMPLETED: {
    requestId: string;
    instrument: string;
    succeeded: VenueName[];
    failed: VenueName[];
    durationMs: number;
  };
}

// ============================================================================
// TYPED EVENT BUS
// ============================================================================

type EventHandler<T extends SystemEventType> = (event: SystemEvent<EventPayloads[T]>) => void;
type AnyEventHandler = (event: SystemEvent) => void;

const ANY_EVENT = '*';
const HISTORY_LIMIT = 200;

/**
 * eventemitter3 wrapper keyed by SystemEventType. Keeps the last
 * HISTORY_LIMIT events so a finished analysis can be inspected.
 */
class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly recent: SystemEvent[] = [];

  emit<T extends SystemEventType>(type: T, payload: EventPayloads[T]): void {
    const event: SystemEvent<EventPayloads[T]> = { type, payload, timestamp: new Date() };

    this.recent.push(event);
    if (this.recent.length > HISTORY_LIMIT) this.recent.shift();

    this.emitter.emit(type, event);
    this.emitter.emit(ANY_EVENT, event);
  }

  on<T extends SystemEventType>(type: T, handler: EventHandler<T>): void {
    this.emitter.on(type, handler);
  }

  off<T extends SystemEventType>(type: T, handler: EventHandler<T>): void {
    this.emitter.off(type, handler);
  }

  onAll(handler: AnyEventHandler): void {
    this.emitter.on(ANY_EVENT, handler);
  }

  offAll(handler: AnyEventHandler): void {
    this.emitter.off(ANY_EVENT, handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }

  /** Oldest first, optionally one type only */
  getHistory(type?: SystemEventType): SystemEvent[] {
    return type ? this.recent.filter(e => e.type === type) : [...this.recent];
  }

  clearHistory(): void {
    this.recent.length = 0;
  }
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

export const eventBus = new EventBus();

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

/**
 * Subscribe to an event for the duration of a task, then unsubscribe
 */
export async function withEventHandler<T extends SystemEventType, R>(
  type: T,
  handler: EventHandler<T>,
  task: () => Promise<R>
): Promise<R> {
  eventBus.on(type, handler);
  try {
    return await task();
  } finally {
    eventBus.off(type, handler);
  }
}

/**
 * Log all events (for debugging). Returns an unsubscribe function.
 */
export function enableEventLogging(log: (msg: string) => void): () => void {
  const handler = (event: SystemEvent) => {
    log(`[EVENT] ${event.type} at ${event.timestamp.toISOString()}`);
  };

  eventBus.onAll(handler);

  return () => {
    eventBus.offAll(handler);
  };
}

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type { EventHandler };
