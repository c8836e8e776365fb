/**
 * Logger Utility with Audit Support
 *
 * Structured, namespaced logging with an audit trail for catalog writes.
 * Output verbosity is environment-driven; every entry is also kept in the
 * active log aggregator.
 */

/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  AUDIT = 4,
}

/**
 * Audit event types
 */
export type AuditEventType =
  | 'entity.create'
  | 'entity.update'
  | 'entity.delete'
  | 'association.change'
  | 'session.commit'
  | 'session.rollback'

export type AuditResult = 'success' | 'duplicate' | 'error'

/**
 * Audit event structure
 */
export interface AuditEvent {
  eventType: AuditEventType
  timestamp: string
  /** Component that performed the action */
  actor: string
  /** Resource being changed, e.g. `tag:12` */
  resource: string
  action: string
  result: AuditResult
  metadata?: Record<string, unknown>
}

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel
  timestamp: string
  namespace?: string
  message: string
  context?: Record<string, unknown>
  error?: Error
}

/**
 * Destination for log entries and audit events
 */
export interface LogAggregator {
  add(entry: LogEntry): void
  addAudit(event: AuditEvent): void
  getLogs(): LogEntry[]
  getAuditEvents(): AuditEvent[]
  clear(): void
}

/**
 * Logger interface with audit support
 */
export interface Logger {
  warn: (message: string, context?: Record<string, unknown>) => void
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void
  info: (message: string, context?: Record<string, unknown>) => void
  debug: (message: string, context?: Record<string, unknown>) => void
  auditLog: (event: AuditEvent) => void
}

/**
 * In-memory log aggregator, bounded to `maxSize` entries per stream
 */
export class MemoryLogAggregator implements LogAggregator {
  private logs: LogEntry[] = []
  private auditEvents: AuditEvent[] = []
  private maxSize: number

  constructor(maxSize = 10000) {
    this.maxSize = maxSize
  }

  add(entry: LogEntry): void {
    this.logs.push(entry)
    if (this.logs.length > this.maxSize) {
      this.logs.shift()
    }
  }

  addAudit(event: AuditEvent): void {
    this.auditEvents.push(event)
    if (this.auditEvents.length > this.maxSize) {
      this.auditEvents.shift()
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  getAuditEvents(): AuditEvent[] {
    return [...this.auditEvents]
  }

  clear(): void {
    this.logs = []
    this.auditEvents = []
  }
}

let globalAggregator: LogAggregator = new MemoryLogAggregator()

export function setLogAggregator(aggregator: LogAggregator): void {
  globalAggregator = aggregator
}

export function getLogAggregator(): LogAggregator {
  return globalAggregator
}

function formatLogEntry(entry: LogEntry, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify({
      level: LogLevel[entry.level],
      timestamp: entry.timestamp,
      namespace: entry.namespace,
      message: entry.message,
      context: entry.context,
      error: entry.error
        ? {
            message: entry.error.message,
            stack: entry.error.stack,
          }
        : undefined,
    })
  }

  const prefix = entry.namespace ? `[quotebook:${entry.namespace}]` : '[quotebook]'
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : ''
  return `${prefix} ${entry.message}${contextStr}`
}

/**
 * Format audit event for output
 */
export function formatAuditEvent(event: AuditEvent, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify(event)
  }

  const metaStr = event.metadata ? ` ${JSON.stringify(event.metadata)}` : ''
  return `[AUDIT] ${event.eventType} | ${event.actor} -> ${event.action} on ${event.resource} = ${event.result}${metaStr}`
}

function createLoggerInstance(namespace?: string): Logger {
  const useJson = process.env.LOG_FORMAT === 'json'
  const minLevel = process.env.LOG_LEVEL ? parseInt(process.env.LOG_LEVEL, 10) : LogLevel.WARN

  const shouldLog = (level: LogLevel): boolean => {
    // Keep test output clean; errors still show
    if (process.env.NODE_ENV === 'test' && level === LogLevel.WARN) {
      return false
    }
    if (level === LogLevel.DEBUG || level === LogLevel.INFO) {
      return !!process.env.DEBUG
    }
    return level >= minLevel
  }

  const createLogEntry = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry => ({
    level,
    timestamp: new Date().toISOString(),
    namespace,
    message,
    context,
    error,
  })

  return {
    warn: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.WARN, message, context)
      if (shouldLog(LogLevel.WARN)) {
        console.warn(formatLogEntry(entry, useJson))
      }
      globalAggregator.add(entry)
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.ERROR, message, context, error)
      if (shouldLog(LogLevel.ERROR)) {
        console.error(formatLogEntry(entry, useJson))
        if (error && !useJson) {
          console.error(error)
        }
      }
      globalAggregator.add(entry)
    },

    info: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.INFO, message, context)
      if (shouldLog(LogLevel.INFO)) {
        console.info(formatLogEntry(entry, useJson))
      }
      globalAggregator.add(entry)
    },

    debug: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.DEBUG, message, context)
      if (shouldLog(LogLevel.DEBUG)) {
        console.debug(formatLogEntry(entry, useJson))
      }
      globalAggregator.add(entry)
    },

    auditLog: (event: AuditEvent) => {
      const entry = createLogEntry(LogLevel.AUDIT, formatAuditEvent(event, false))
      if (shouldLog(LogLevel.AUDIT) || process.env.AUDIT_LOG === 'true') {
        console.log(formatAuditEvent(event, useJson))
      }
      globalAggregator.add(entry)
      globalAggregator.addAudit(event)
    },
  }
}

/**
 * Default logger instance
 *
 * Environment variables:
 * - NODE_ENV=test: Suppress warn output
 * - DEBUG=true: Enable info and debug output
 * - LOG_FORMAT=json: Output logs in JSON format
 * - LOG_LEVEL=0-4: Minimum log level to output
 * - AUDIT_LOG=true: Enable audit log output
 */
export const logger: Logger = createLoggerInstance()

/**
 * Create a namespaced logger
 *
 * @example
 * ```typescript
 * const log = createLogger('CatalogService')
 * log.warn('Duplicate rejected', { kind: 'tag', existingId: 4 })
 * ```
 */
export function createLogger(namespace: string): Logger {
  return createLoggerInstance(namespace)
}

/**
 * No-op logger for testing or silent operation
 */
export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
  auditLog: () => {},
}

/**
 * Helper to create audit events with current timestamp
 */
export function createAuditEvent(
  eventType: AuditEventType,
  actor: string,
  resource: string,
  action: string,
  result: AuditResult,
  metadata?: Record<string, unknown>
): AuditEvent {
  return {
    eventType,
    timestamp: new Date().toISOString(),
    actor,
    resource,
    action,
    result,
    metadata,
  }
}
