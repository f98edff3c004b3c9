import {
  DeviceUnreachableError,
  DiscoveryError,
  InvalidCommandError,
  ProtocolError,
  TimeoutError,
} from "../errors.ts";

/**
 * Error with an HTTP status, for problems with the request itself.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    name: string,
    message: string
  ) {
    super(message);
    this.name = name;
  }
}

export interface ErrorBody {
  error: string;
  message: string;
}

export function statusFor(error: unknown): number {
  if (error instanceof HttpError) return error.status;
  if (error instanceof InvalidCommandError) return 400;
  if (error instanceof ProtocolError) return 502;
  if (error instanceof DeviceUnreachableError || error instanceof DiscoveryError) return 503;
  if (error instanceof TimeoutError) return 504;
  return 500;
}

export function errorBody(error: unknown): ErrorBody {
  if (error instanceof Error) return { error: error.name, message: error.message };
  return { error: "Error", message: String(error) };
}
