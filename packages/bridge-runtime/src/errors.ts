/**
 * @module @cmdbridge/runtime/errors
 *
 * Error classes for the dispatch layer.
 *
 * Every error that ends an invocation is reported to the caller as a single
 * terminal error payload (`error.message`). None of them escape the dispatch
 * path.
 */

export type BridgeErrorCode =
  | 'PLUGIN_NOT_FOUND'
  | 'COMMAND_NOT_FOUND'
  | 'HANDLER_ERROR'
  | 'INVALID_ARGS'
  | 'QUEUE_FULL'
  | 'QUEUE_CLOSED'
  | 'PLUGIN_REGISTRATION'
  | 'PLUGINS_MISSING'
  | 'INVALID_OPTIONS'
  | 'UNKNOWN_ERROR';

/**
 * Serialized form of a bridge error.
 */
export interface SerializedBridgeError {
  name: string;
  message: string;
  code: BridgeErrorCode;
  details?: Record<string, unknown>;
}

/**
 * Base bridge error.
 */
export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: BridgeErrorCode = 'UNKNOWN_ERROR',
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedBridgeError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/**
 * Requested plugin name is absent from the registry.
 */
export class PluginNotFoundError extends BridgeError {
  readonly pluginName: string;

  constructor(pluginName: string) {
    super(`Plugin ${pluginName} not initialized`, 'PLUGIN_NOT_FOUND', { pluginName });
    this.name = 'PluginNotFoundError';
    this.pluginName = pluginName;
  }
}

/**
 * Plugin exists but exposes no handler for the command.
 * The message embeds the plugin's command directory.
 */
export class CommandNotFoundError extends BridgeError {
  readonly pluginName: string;
  readonly command: string;

  constructor(pluginName: string, command: string, directory: string) {
    super(
      `No command ${command} found for plugin ${pluginName}.\nAvailable commands:\n${directory}`,
      'COMMAND_NOT_FOUND',
      { pluginName, command }
    );
    this.name = 'CommandNotFoundError';
    this.pluginName = pluginName;
    this.command = command;
  }
}

/**
 * The matched handler signaled failure.
 */
export class HandlerError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'HANDLER_ERROR', details);
    this.name = 'HandlerError';
  }
}

/**
 * Request payload is not JSON or does not match the handler's schema.
 */
export class InvalidArgsError extends BridgeError {
  readonly command: string;

  constructor(command: string, reason: string) {
    super(`Invalid arguments for command ${command}: ${reason}`, 'INVALID_ARGS', { command });
    this.name = 'InvalidArgsError';
    this.command = command;
  }
}

export class QueueFullError extends BridgeError {
  readonly queueSize: number;
  readonly maxQueueSize: number;

  constructor(queueSize: number, maxQueueSize: number) {
    super(
      `Invocation queue full: ${queueSize}/${maxQueueSize} pending`,
      'QUEUE_FULL',
      { queueSize, maxQueueSize }
    );
    this.name = 'QueueFullError';
    this.queueSize = queueSize;
    this.maxQueueSize = maxQueueSize;
  }
}

export class QueueClosedError extends BridgeError {
  constructor() {
    super('Invocation queue closed', 'QUEUE_CLOSED');
    this.name = 'QueueClosedError';
  }
}

/**
 * Registration rejected: bad name or the plugin refused its configuration.
 */
export class PluginRegistrationError extends BridgeError {
  readonly pluginName: string;

  constructor(pluginName: string, reason: string) {
    super(`Cannot register plugin ${JSON.stringify(pluginName)}: ${reason}`, 'PLUGIN_REGISTRATION', {
      pluginName,
    });
    this.name = 'PluginRegistrationError';
    this.pluginName = pluginName;
  }
}

/**
 * Startup precondition failed: plugins expected by the host are not registered.
 */
export class MissingPluginsError extends BridgeError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Plugins not registered: ${missing.join(', ')}`, 'PLUGINS_MISSING', { missing });
    this.name = 'MissingPluginsError';
    this.missing = missing;
  }
}

export class InvalidOptionsError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_OPTIONS', details);
    this.name = 'InvalidOptionsError';
  }
}
