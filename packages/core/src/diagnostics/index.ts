export {
  formatLifecycleEvent,
  silentDiagnosticSink,
  consoleDiagnosticSink,
  createConsoleSink,
  createMemorySink,
  getDiagnosticSink,
  setDiagnosticSink,
} from './diagnostic-sink.js';
export type {
  LifecycleEvent,
  LifecycleEventName,
  DiagnosticSink,
  DiagnosticLogger,
  MemorySink,
} from './diagnostic-sink.js';
