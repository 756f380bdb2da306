/**
 * Logger
 *
 * Leveled console logging with an optional context prefix.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export class Logger {
  private readonly level: LogLevel
  private readonly context: string
  private readonly silent: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? "debug" : "info")
    this.context = options.context ?? ""
    this.silent = options.silent ?? false
  }

  /**
   * `[level] (context) message`, followed by indented JSON data when given.
   */
  format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const prefix = this.context ? `[${level}] (${this.context})` : `[${level}]`
    const output = `${prefix} ${message}`
    return data ? `${output}\n${JSON.stringify(data, null, 2)}` : output
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level]
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) {
      console.log(this.format("debug", message, data))
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("info")) {
      console.log(this.format("info", message, data))
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, data))
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("error")) {
      console.error(this.format("error", message, data))
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
    })
  }
}

export function createLogger(context?: string, options: Omit<LoggerOptions, "context"> = {}): Logger {
  return new Logger({ ...options, context })
}
