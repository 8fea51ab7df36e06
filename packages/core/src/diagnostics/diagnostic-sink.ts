/**
 * Lifecycle audit trail for level-1 messages.
 *
 * A message records `created` when it is constructed and `destroyed` when it
 * finalizes. Sinks decide what to do with the events; the default discards them.
 */

export type LifecycleEventName = 'created' | 'destroyed';

export interface LifecycleEvent {
  event: LifecycleEventName;
  messageId: string;
  sourceName: string;
  messageType: string;
}

export interface DiagnosticSink {
  record(event: LifecycleEvent): void;
}

export type DiagnosticLogger = Pick<Console, 'log'>;

/** Format an event as `created,<id>,<source>,<type>` */
export function formatLifecycleEvent(event: LifecycleEvent): string {
  return [event.event, event.messageId, event.sourceName, event.messageType].join(',');
}

export const silentDiagnosticSink: DiagnosticSink = {
  record: () => {},
};

export function createConsoleSink(logger: DiagnosticLogger = console): DiagnosticSink {
  return {
    record: (event) => logger.log(formatLifecycleEvent(event)),
  };
}

export const consoleDiagnosticSink: DiagnosticSink = createConsoleSink();

export interface MemorySink extends DiagnosticSink {
  readonly events: LifecycleEvent[];
  clear(): void;
}

/** Collects events in memory, mostly for tests. */
export function createMemorySink(): MemorySink {
  const events: LifecycleEvent[] = [];
  return {
    events,
    record: (event) => {
      events.push({ ...event });
    },
    clear: () => {
      events.length = 0;
    },
  };
}

let currentSink: DiagnosticSink = silentDiagnosticSink;

/** Sink used by messages constructed without an explicit one. */
export function getDiagnosticSink(): DiagnosticSink {
  return currentSink;
}

/** Replace the process-wide sink. Returns the previous one so callers can restore it. */
export function setDiagnosticSink(sink: DiagnosticSink): DiagnosticSink {
  const previous = currentSink;
  currentSink = sink;
  return previous;
}
