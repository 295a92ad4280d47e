/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * Log lines go to stderr so stdout stays reserved for command output.
 * 'info', 'warn' and 'error' are always shown; 'debug' only with the
 * --debug flag or OBSB_DEBUG=1.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 *
 * @returns True if debug mode is active
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['OBSB_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility and prefix of log messages.
 *
 * - 'error' / 'warn': Always shown, prefixed with the level name
 * - 'info': Always shown (key milestones such as connect/disconnect)
 * - 'debug': Only shown in debug mode (frame traces, handshake details)
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext = 'obsb' | 'connection' | 'receiver' | 'broadcast' | 'settings' | 'bridge';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /** Unexpected failures that were handled (connection lost, reconnect failed). */
  error: (message: string) => void;

  /** Degraded but recoverable situations (malformed frame, late response). */
  warn: (message: string) => void;

  /** Important user-facing messages and key milestones. */
  info: (message: string) => void;

  /** Verbose internal state, only shown in debug mode. */
  debug: (message: string) => void;

  /**
   * Log a message at debug level.
   */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

function formatLine(context: LogContext, message: string, level: LogLevel): string {
  if (level === 'error' || level === 'warn') {
    return `[${context}] ${level}: ${message}`;
  }
  return `[${context}] ${message}`;
}

/**
 * Create a logger instance for a specific context.
 *
 * @param context - Component context for log prefix
 * @returns Logger instance with level methods
 *
 * @example
 * ```typescript
 * const log = createLogger('connection');
 *
 * log.info('Connected to OBS at ws://127.0.0.1:4455');
 * log.warn('Received malformed frame');
 * log.debug('Sending Identify (rpcVersion 1)');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    log(context, message, level);
  };

  return Object.assign((message: string) => logMessage(message, 'debug'), {
    error: (message: string) => logMessage(message, 'error'),
    warn: (message: string) => logMessage(message, 'warn'),
    info: (message: string) => logMessage(message, 'info'),
    debug: (message: string) => logMessage(message, 'debug'),
  });
}

/**
 * Log a message with a specific context (one-off usage).
 *
 * @param context - Component context for log prefix
 * @param message - Log message
 * @param level - Log level (defaults to 'debug' - only shown with --debug)
 */
export function log(context: LogContext, message: string, level: LogLevel = 'debug'): void {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  console.error(formatLine(context, message, level));
}
