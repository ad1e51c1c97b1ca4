// src/errors.ts

/**
 * Base class for all gauge errors
 */
export class GaugeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GaugeError';
  }
}

/**
 * Error class for a command the gauge answered with the `E` token
 */
export class GaugeCommandRejectedError extends GaugeError {
  readonly command: string;

  constructor(command: string) {
    super(`Invalid command: ${command}`);
    this.name = 'GaugeCommandRejectedError';
    this.command = command;
  }
}

/**
 * Error class for an acknowledgement other than `R`
 */
export class GaugeAckMismatchError extends GaugeError {
  readonly command: string;
  readonly response: string;

  constructor(command: string, response: string, action: string = `execute ${command}`) {
    super(`Cannot ${action}, got response: ${JSON.stringify(response)}`);
    this.name = 'GaugeAckMismatchError';
    this.command = command;
    this.response = response;
  }
}

/**
 * Error class for a measure response outside the record grammar
 */
export class GaugeParseError extends GaugeError {
  readonly response: string;

  constructor(response: string, options?: ErrorOptions) {
    super(`Cannot parse measure response: ${JSON.stringify(response)}`, options);
    this.name = 'GaugeParseError';
    this.response = response;
  }
}

/**
 * Error class for a wire code missing from its table
 */
export class GaugeUnknownCodeError extends GaugeError {
  readonly table: string;
  readonly code: string;

  constructor(table: string, code: string) {
    super(`Unknown ${table} code: ${JSON.stringify(code)}`);
    this.name = 'GaugeUnknownCodeError';
    this.table = table;
    this.code = code;
  }
}

/**
 * Error class for a reply that did not end with the terminator before the read timeout
 */
export class GaugeResponseTimeoutError extends GaugeError {
  readonly command: string;
  readonly partial: string;

  constructor(command: string, partial: string, timeout: number) {
    super(
      `No complete response to ${command} within ${timeout}ms (received ${JSON.stringify(partial)})`
    );
    this.name = 'GaugeResponseTimeoutError';
    this.command = command;
    this.partial = partial;
  }
}

/**
 * Error class for an operation the handler's lifecycle does not allow
 */
export class GaugeStateError extends GaugeError {
  constructor(message: string) {
    super(message);
    this.name = 'GaugeStateError';
  }
}

/**
 * Error class for any call made after power off
 */
export class GaugePoweredOffError extends GaugeStateError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Gauge was powered off, ${operation}() is not allowed anymore`);
    this.name = 'GaugePoweredOffError';
    this.operation = operation;
  }
}

/**
 * Error class for invalid configuration
 */
export class GaugeConfigError extends GaugeError {
  constructor(message: string = 'Invalid gauge configuration') {
    super(message);
    this.name = 'GaugeConfigError';
  }
}

// --- Transport errors ---

/**
 * Base class for link failures (as opposed to the device disagreeing)
 */
export class TransportError extends GaugeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Error class for Node Serial transport errors
 */
export class NodeSerialTransportError extends TransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NodeSerialTransportError';
  }
}

/**
 * Error class for Node Serial connection errors
 */
export class NodeSerialConnectionError extends NodeSerialTransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NodeSerialConnectionError';
  }
}

/**
 * Error class for Node Serial read errors
 */
export class NodeSerialReadError extends NodeSerialTransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NodeSerialReadError';
  }
}

/**
 * Error class for Node Serial write errors
 */
export class NodeSerialWriteError extends NodeSerialTransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NodeSerialWriteError';
  }
}
