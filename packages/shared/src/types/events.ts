/**
 * Base interface for all roster events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the CLI invocation that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a filesystem scan starts.
 */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    /** Root directories the scan walks */
    roots: string[];
    concurrency: number;
  };
}

/** Emitted when a filesystem scan finished without being aborted */
export interface ScanCompleted extends BaseEvent {
  type: 'ScanCompleted';
  payload: {
    repositoryCount: number;
    warningCount: number;
    directoriesVisited: number;
    durationMs: number;
  };
}

/** Emitted after the persisted repository set has been read */
export interface CacheLoaded extends BaseEvent {
  type: 'CacheLoaded';
  payload: {
    cachePath: string;
    repositoryCount: number;
  };
}

/** Emitted when merge dropped cached paths that no longer hold a repository */
export interface CachePruned extends BaseEvent {
  type: 'CachePruned';
  payload: {
    pruned: string[];
  };
}

/** Emitted after the repository set has been atomically written */
export interface CacheSaved extends BaseEvent {
  type: 'CacheSaved';
  payload: {
    cachePath: string;
    repositoryCount: number;
  };
}

/** Emitted once a status report has been assembled */
export interface ReportBuilt extends BaseEvent {
  type: 'ReportBuilt';
  payload: {
    total: number;
    accessible: number;
    inaccessible: number;
    dirty: number;
  };
}

export type RosterEvent =
  | ScanStarted
  | ScanCompleted
  | CacheLoaded
  | CachePruned
  | CacheSaved
  | ReportBuilt;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Fills in the metadata shared by every event.
 */
export function createEvent<E extends RosterEvent>(
  type: E['type'],
  runId: string,
  payload: E['payload'],
  now: Date = new Date(),
): { schemaVersion: number; timestamp: string; runId: string; type: E['type']; payload: E['payload'] } {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: now.toISOString(),
    runId,
    type,
    payload,
  };
}
