/**
 * Structured logger used by clients, fixtures and emulators.
 *
 * Text output reads `[timestamp] [service] LEVEL: message {context}`;
 * JSON output emits one LogEntry per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export type LogFormat = 'json' | 'text'

/**
 * Destination for formatted log lines
 */
export interface LogOutput {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerConfig {
  /** @default 'info' */
  level?: LogLevel
  /** @default 'text' */
  format?: LogFormat
  output?: LogOutput
  /** Context merged into every entry */
  context?: Record<string, unknown>
  /** @default true */
  timestamp?: boolean
  service?: string
}

export interface LogEntry {
  timestamp?: string
  level: LogLevel
  message: string
  service?: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    code?: string
  }
}

const consoleOutput: LogOutput = {
  debug: (msg) => console.debug(msg),
  info: (msg) => console.info(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
}

/**
 * Process-wide defaults applied to loggers created without explicit
 * level/format. Updated once configuration is loaded.
 */
const defaults: { level: LogLevel; format: LogFormat; output: LogOutput } = {
  level: 'info',
  format: 'text',
  output: consoleOutput,
}

export function setLogDefaults(options: Partial<typeof defaults>): void {
  Object.assign(defaults, options)
}

export class Logger {
  private readonly config: LoggerConfig

  constructor(config: LoggerConfig = {}) {
    this.config = { ...config }
  }

  private get level(): LogLevel {
    return this.config.level ?? defaults.level
  }

  private get format(): LogFormat {
    return this.config.format ?? defaults.format
  }

  private get output(): LogOutput {
    return this.config.output ?? defaults.output
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level]
  }

  private render(entry: LogEntry): string {
    if (this.format === 'json') {
      return JSON.stringify(entry)
    }

    const parts: string[] = []
    if (entry.timestamp) parts.push(`[${entry.timestamp}]`)
    if (entry.service) parts.push(`[${entry.service}]`)
    parts.push(`${entry.level.toUpperCase()}:`)
    parts.push(entry.message)
    if (entry.context) parts.push(JSON.stringify(entry.context))
    if (entry.error) {
      const code = entry.error.code ? ` [${entry.error.code}]` : ''
      parts.push(`(${entry.error.name}${code}: ${entry.error.message})`)
    }
    return parts.join(' ')
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return
    }

    const entry: LogEntry = { level, message }
    if (this.config.timestamp ?? true) {
      entry.timestamp = new Date().toISOString()
    }
    if (this.config.service) {
      entry.service = this.config.service
    }

    const merged = { ...this.config.context, ...context }
    if (Object.keys(merged).length > 0) {
      entry.context = merged
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
      entry.error = { name: error.name, message: error.message, ...(code ? { code } : {}) }
    }

    this.output[level](this.render(entry))
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.write('warn', message, context, error)
  }

  /**
   * Log an error. The second argument may be the Error itself when there is
   * no extra context.
   */
  error(message: string, contextOrError?: Record<string, unknown> | Error, error?: Error): void {
    if (contextOrError instanceof Error) {
      this.write('error', message, undefined, contextOrError)
    } else {
      this.write('error', message, contextOrError, error)
    }
  }

  /**
   * Derive a logger that adds the given context to every entry
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    })
  }

  setLevel(level: LogLevel): void {
    this.config.level = level
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config)
}
