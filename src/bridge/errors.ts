/**
 * @file Bridge Error Types
 * @description Error classes for the JTAG VPI bridge. Every failure inside the
 * bridge degrades to one of these; none of them is fatal to the host process.
 * @module bridge/errors
 */

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all bridge errors.
 */
export class BridgeError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param context - Optional additional context
   */
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Error thrown when configuration is invalid or cannot be loaded.
 */
export class ConfigurationError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Framing Errors
// ============================================================================

/**
 * A command the bridge cannot execute: unknown command byte, or a bit count
 * outside the accepted range. Answered in the minimal dialect, ignored in the
 * full one; never closes the connection.
 */
export class FramingError extends BridgeError {
  /** Raw command value as received */
  readonly command: number;
  /** Length or bit count as received */
  readonly length: number;

  constructor(message: string, command: number, length: number) {
    super(message, 'FRAMING_ERROR', { command, length });
    this.name = 'FramingError';
    this.command = command;
    this.length = length;
  }

  static unknownCommand(command: number, length: number): FramingError {
    return new FramingError(`Unknown command 0x${command.toString(16)}`, command, length);
  }

  static badLength(command: number, length: number): FramingError {
    return new FramingError(
      `Implausible length ${length} for command 0x${command.toString(16)}`,
      command,
      length
    );
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * Why a transport stopped being usable.
 */
export type DisconnectReason = 'eof' | 'socket-error' | 'stop-simulation';

/**
 * Error raised when the client connection can no longer be used. Caught by
 * the connection manager, which tears the connection down.
 */
export class TransportError extends BridgeError {
  readonly reason: DisconnectReason;
  /** errno-style code from the socket, when there is one */
  readonly errno?: string;

  constructor(message: string, reason: DisconnectReason, errno?: string) {
    super(message, 'TRANSPORT_ERROR', { reason, errno });
    this.name = 'TransportError';
    this.reason = reason;
    if (errno !== undefined) {
      this.errno = errno;
    }
  }

  static peerClosed(): TransportError {
    return new TransportError('Client disconnected', 'eof');
  }

  static fromSocket(errno: string, message: string): TransportError {
    return new TransportError(`Socket error (${errno}): ${message}`, 'socket-error', errno);
  }

  static stopRequested(): TransportError {
    return new TransportError('Client requested simulation stop', 'stop-simulation');
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isFramingError(error: unknown): error is FramingError {
  return error instanceof FramingError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Wraps an unknown error in a BridgeError if it isn't already one.
 */
export function wrapError(
  error: unknown,
  defaultMessage = 'An unknown error occurred'
): BridgeError {
  if (isBridgeError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new BridgeError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }
  return new BridgeError(defaultMessage, 'UNKNOWN_ERROR', { originalValue: String(error) });
}

/**
 * Gets a printable message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
