/**
 * Error classes thrown by the store, the runtime and the config parser
 */

/**
 * Base error class with a stable machine-readable code
 */
export class ActionFlowError extends Error {
  constructor(
    message: string,
    public code: string = 'ACTIONFLOW_ERROR'
  ) {
    super(message);
    this.name = 'ActionFlowError';
  }
}

/**
 * Store errors
 */
export class InvalidActionError extends ActionFlowError {
  constructor(message = 'Invalid action') {
    super(message, 'INVALID_ACTION');
    this.name = 'InvalidActionError';
  }
}

export class DispatchInProgressError extends ActionFlowError {
  constructor(message = 'Reducers may not dispatch actions') {
    super(message, 'DISPATCH_IN_PROGRESS');
    this.name = 'DispatchInProgressError';
  }
}

export class ReducerError extends ActionFlowError {
  constructor(
    public actionType: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Reducer failed on ${actionType}: ${reason}`, 'REDUCER_FAILED');
    this.name = 'ReducerError';
    this.cause = cause;
  }
}

/**
 * Runtime errors
 */
export class PluginError extends ActionFlowError {
  constructor(message = 'Plugin error') {
    super(message, 'PLUGIN_ERROR');
    this.name = 'PluginError';
  }
}

export class ConfigError extends ActionFlowError {
  constructor(message = 'Configuration error') {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
