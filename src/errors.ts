/**
 * Base class for failures of the radio link: connecting, writing or waiting
 * for a notification. Device sessions retry these.
 */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Error thrown when a BLE link could not be established or was lost.
 */
export class ConnectionError extends TransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/**
 * Error thrown when a write or notification did not complete in time.
 */
export class TransportTimeoutError extends TransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportTimeoutError";
  }
}

/**
 * Base class for frames that failed validation.
 */
export class FrameError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FrameError";
  }
}

/**
 * Error thrown when a frame has the wrong size, prefix or terminator.
 */
export class MalformedFrameError extends FrameError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedFrameError";
  }
}

/**
 * Error thrown when a response echoes a different command than was sent.
 */
export class UnexpectedCommandError extends FrameError {
  constructor(
    message: string,
    public readonly expected: { kind: number; code: number },
    public readonly received: { kind: number; code: number }
  ) {
    super(message);
    this.name = "UnexpectedCommandError";
  }
}

/**
 * Error thrown when a device could not be reached within the retry budget.
 */
export class DeviceUnreachableError extends Error {
  constructor(
    message: string,
    public readonly deviceId: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "DeviceUnreachableError";
  }
}

/**
 * Error thrown when a device keeps answering with frames that fail to decode.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly deviceId: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/**
 * Error thrown when a caller gave up waiting. The device operation itself may
 * still complete.
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Error thrown when scanning for devices failed.
 */
export class DiscoveryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DiscoveryError";
  }
}

/**
 * Error thrown for a command name or parameter the device does not accept.
 */
export class InvalidCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCommandError";
  }
}

/**
 * Error thrown when the gateway configuration is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
