/**
 * Structured engine events.  The engine itself performs no I/O: it hands each
 * event to the injected logger, which defaults to a silent sink.
 */

export type EngineStage = 'sizing' | 'candidates' | 'winding' | 'validation';

export interface EngineEvent {
  event_type: string;
  timestamp: string;
  stage: EngineStage;
  payload: Record<string, unknown>;
}

export interface EngineLogger {
  debug(event: EngineEvent): void;
  info(event: EngineEvent): void;
  warn(event: EngineEvent): void;
}

export function makeEngineEvent(
  stage: EngineStage,
  eventType: string,
  payload: Record<string, unknown>,
): EngineEvent {
  return {
    event_type: eventType,
    timestamp: new Date().toISOString(),
    stage,
    payload,
  };
}

export const silentLogger: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

/** One JSON line per event; warn goes to stderr. */
export const consoleLogger: EngineLogger = {
  debug: event => console.debug(JSON.stringify(event)),
  info: event => console.info(JSON.stringify(event)),
  warn: event => console.warn(JSON.stringify(event)),
};
