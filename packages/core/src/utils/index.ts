/**
 * Utility exports
 */
export {
  logger,
  createLogger,
  silentLogger,
  createAuditEvent,
  formatAuditEvent,
  setLogAggregator,
  getLogAggregator,
  MemoryLogAggregator,
  LogLevel,
  type Logger,
  type LogEntry,
  type LogAggregator,
  type AuditEvent,
  type AuditEventType,
  type AuditResult,
} from './logger.js'
