/**
 * Logging type definitions
 */

// ═══════════════════════════════════════════════════════════════
// LEVELS
// ═══════════════════════════════════════════════════════════════

export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Level constants, passed in so the pure helpers stay config-free
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Start every sink; resolves with one report per sink that needed starting */
  initialize(): Promise<SinkReport[]>;
}

export interface LoggerConfig {
  level: LogLevel;
  /** INFO is suppressed after this many hours of uptime; 0 keeps it forever */
  demoteHours: number;
}

/**
 * A sink and the lowest level routed to it
 */
export interface SinkRoute {
  sink: LogSink;
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  /** Current time in seconds; uptime for demotion is measured with it */
  timeSource: () => number;
  routes: SinkRoute[];
}

/**
 * Result of starting one sink
 */
export interface SinkReport {
  sink: string;
  ok: boolean;
  message: string;
}

// ═══════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════

/**
 * Receives lines that already passed level filtering
 */
export interface LogSink {
  readonly name: string;
  write(line: string): void;
  initialize?(): Promise<SinkReport>;
}

export interface TimerAPI {
  set(delayMs: number, repeat: boolean, callback: () => void): void;
}

export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

export interface ConsoleSink extends LogSink {
  initialize(): Promise<SinkReport>;
  getBufferSize(): number;
  /** Write out everything still buffered (before the process exits) */
  flush(): void;
}

export interface ConsoleSinkConfig {
  /** Lines held before new ones are dropped */
  bufferSize: number;
  /** Milliseconds between drained lines */
  drainInterval: number;
  /** Colour lines by level tag */
  colorize: boolean;
}

export type HttpPost = (url: string, body: string) => Promise<{ ok: boolean; status: number }>;

export interface SlackSink extends LogSink {
  initialize(): Promise<SinkReport>;
  /** Messages waiting for a retry */
  getBufferSize(): number;
}

export interface SlackSinkConfig {
  enabled: boolean;
  /** Incoming webhook URL (from SLACK_WEBHOOK_URL), null when unset */
  webhookUrl: string | null;
  /** Retry queue length; the oldest message goes first when full */
  bufferSize: number;
  /** First retry delay; doubles per failure up to a minute */
  retryDelayMs: number;
  /** Attempts per message before it is dropped */
  maxRetries: number;
}

/**
 * What shouldLog needs to know about the logger at call time
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** Seconds since the logger was created */
  uptime: number;
  demoteHours: number;
}
