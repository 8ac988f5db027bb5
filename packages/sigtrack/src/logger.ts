/**
 * Leveled logger used to report per-target outcomes.
 *
 * The library never writes to the console itself; the CLI supplies a sink.
 *
 * @packageDocumentation
 */

/** Ordered log levels. A message is emitted when its level is at or above the threshold. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

/** Receives every message that passes the threshold. */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, message: string) => void

/** @public */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to `'info'`. */
  level?: LogLevel | undefined
  /** Destination for messages. Defaults to discarding them. */
  sink?: LogSink | undefined
}

/** @public */
export class Logger {
  readonly level: LogLevel
  readonly #sink: LogSink | undefined

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? 'info'
    this.#sink = options?.sink
  }

  debug(message: string): void {
    this.#log('debug', message)
  }

  info(message: string): void {
    this.#log('info', message)
  }

  warn(message: string): void {
    this.#log('warn', message)
  }

  error(message: string): void {
    this.#log('error', message)
  }

  /** `true` when messages at `level` would be emitted. */
  enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return this.#sink !== undefined && LEVEL_RANK[level] >= LEVEL_RANK[this.level]
  }

  #log(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (this.enabled(level)) {
      this.#sink?.(level, message)
    }
  }
}

/** A logger that discards everything. */
export const silentLogger = new Logger({ level: 'silent' })
