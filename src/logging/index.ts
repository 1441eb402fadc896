export {
  createStderrLogger,
  formatContext,
  silentLogger,
  LOG_LEVELS,
  type EngineLogger,
  type LogContext,
  type LogLevel,
} from './engine-logger.js';
export {
  RunEventLog,
  RunEventSchema,
  nullEventSink,
  type RunEvent,
  type RunEventEnvelope,
  type RunEventSink,
} from './run-event-log.js';
