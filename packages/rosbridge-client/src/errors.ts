/**
 * Error types raised by the rosbridge client.
 */

/** Base error for all rosbridge client errors */
export class RosBridgeError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'RosBridgeError';
  }
}

/** Transport could not be used (missing socket, socket failure) */
export class BridgeConnectionError extends RosBridgeError {
  constructor(message: string, public readonly bridgeUrl?: string) {
    super(message, 'BRIDGE_CONNECTION_ERROR');
    this.name = 'BridgeConnectionError';
  }
}

/** The connection did not become ready in time */
export class ConnectionTimeoutError extends RosBridgeError {
  constructor(public readonly bridgeUrl: string, public readonly timeoutMs: number) {
    super(`Connection to ${bridgeUrl} not ready after ${timeoutMs}ms`, 'CONNECTION_TIMEOUT');
    this.name = 'ConnectionTimeoutError';
  }
}

/** A pending request was failed because the client was terminated */
export class ConnectionClosedError extends RosBridgeError {
  constructor(message = 'Connection terminated before a reply arrived') {
    super(message, 'CONNECTION_CLOSED');
    this.name = 'ConnectionClosedError';
  }
}

/** An inbound frame could not be decoded into an envelope */
export class ProtocolError extends RosBridgeError {
  constructor(message: string, public readonly op?: string) {
    super(message, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
  }
}

/** No handler exists for an inbound operation */
export class UnhandledOperationError extends RosBridgeError {
  constructor(public readonly op: string) {
    super(`No handler registered for operation "${op}"`, 'UNHANDLED_OPERATION');
    this.name = 'UnhandledOperationError';
  }
}

/** A reply arrived for a request id that is not pending */
export class UnmatchedReplyError extends RosBridgeError {
  constructor(public readonly requestId: string) {
    super(`No pending request for reply id "${requestId}"`, 'UNMATCHED_REPLY');
    this.name = 'UnmatchedReplyError';
  }
}

/** A request id was registered twice */
export class DuplicateRequestIdError extends RosBridgeError {
  constructor(public readonly requestId: string) {
    super(`Request id "${requestId}" is already pending`, 'DUPLICATE_REQUEST_ID');
    this.name = 'DuplicateRequestIdError';
  }
}

/** A blocking service call hit its deadline */
export class ServiceTimeoutError extends RosBridgeError {
  constructor(public readonly service: string, public readonly timeoutMs: number) {
    super(`Service "${service}" did not respond within ${timeoutMs}ms`, 'SERVICE_TIMEOUT');
    this.name = 'ServiceTimeoutError';
  }
}

/** The bridge answered a service call with result=false */
export class ServiceError extends RosBridgeError {
  constructor(public readonly service: string, public readonly values: unknown) {
    super(
      `Service "${service}" failed${typeof values === 'string' ? `: ${values}` : ''}`,
      'SERVICE_ERROR'
    );
    this.name = 'ServiceError';
  }
}

/** Waiting for an action goal result hit its deadline */
export class GoalTimeoutError extends RosBridgeError {
  constructor(public readonly goalId: string, public readonly timeoutMs: number) {
    super(`Goal "${goalId}" did not finish within ${timeoutMs}ms`, 'GOAL_TIMEOUT');
    this.name = 'GoalTimeoutError';
  }
}

/** The bridge reported a failed action goal */
export class ActionError extends RosBridgeError {
  constructor(public readonly action: string, public readonly result: unknown) {
    super(`Action "${action}" failed`, 'ACTION_ERROR');
    this.name = 'ActionError';
  }
}

/** Invalid argument supplied by the caller */
export class ValidationError extends RosBridgeError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** Configuration could not be loaded */
export class ConfigError extends RosBridgeError {
  constructor(message: string, public readonly filePath?: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
