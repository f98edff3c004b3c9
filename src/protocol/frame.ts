import {
  FRAME_PREFIX,
  FrameKind,
  HEADER_SIZE,
  MAX_PARAMETERS_SIZE,
  MAX_REQUEST_SIZE,
  MAX_RESPONSE_SIZE,
  QUERY_FRAME_SIZE,
  QUERY_TERMINATOR,
} from "./constants.ts";
import { MalformedFrameError, UnexpectedCommandError } from "../errors.ts";

/**
 * A validated frame. Request frames carry parameters in `body`; `bytes` is
 * the whole frame, which response payload offsets count from.
 */
export interface Frame {
  kind: number;
  code: number;
  body: Uint8Array;
  bytes: Uint8Array;
}

export interface FrameHeader {
  kind: number;
  code: number;
}

const hex = (value: number) => `0x${value.toString(16).padStart(2, "0")}`;

function checkPrefix(bytes: Uint8Array) {
  if (bytes[0] !== FRAME_PREFIX[0] || bytes[1] !== FRAME_PREFIX[1]) {
    throw new MalformedFrameError(`Bad frame prefix ${hex(bytes[0] ?? 0)} ${hex(bytes[1] ?? 0)}`);
  }
}

/**
 * Builds a request frame.
 *
 * Control commands are `[0xBE 0xEF][0x04][code][parameters...]`, queries are
 * `[0xBE 0xEF][0x05][code][00 00 00 00][0x5A]`.
 *
 * @throws RangeError for parameters a frame of this kind cannot carry
 */
export function encodeFrame(kind: number, code: number, parameters: Uint8Array = new Uint8Array()): Uint8Array {
  if (kind === FrameKind.QUERY) {
    if (parameters.length > 0) throw new RangeError("Queries take no parameters");
    const frame = new Uint8Array(QUERY_FRAME_SIZE);
    frame.set(FRAME_PREFIX, 0);
    frame[2] = kind;
    frame[3] = code;
    frame[QUERY_FRAME_SIZE - 1] = QUERY_TERMINATOR;
    return frame;
  }
  if (kind !== FrameKind.COMMAND) throw new RangeError(`Unknown frame kind ${hex(kind)}`);
  if (parameters.length > MAX_PARAMETERS_SIZE) {
    throw new RangeError(`${parameters.length} parameter bytes exceed ${MAX_PARAMETERS_SIZE}`);
  }

  const frame = new Uint8Array(HEADER_SIZE + parameters.length);
  frame.set(FRAME_PREFIX, 0);
  frame[2] = kind;
  frame[3] = code;
  frame.set(parameters, HEADER_SIZE);
  return frame;
}

/**
 * Validates and splits a request frame, the inverse of `encodeFrame`.
 *
 * @throws MalformedFrameError on bad size, prefix, padding or terminator
 */
export function decodeRequest(bytes: Uint8Array): Frame {
  if (bytes.length < HEADER_SIZE || bytes.length > MAX_REQUEST_SIZE) {
    throw new MalformedFrameError(`Request length ${bytes.length} outside ${HEADER_SIZE}..${MAX_REQUEST_SIZE}`);
  }
  checkPrefix(bytes);

  const kind = bytes[2]!;
  const code = bytes[3]!;
  if (kind !== FrameKind.QUERY) {
    return { kind, code, body: bytes.slice(HEADER_SIZE), bytes: bytes.slice() };
  }

  if (bytes.length !== QUERY_FRAME_SIZE) {
    throw new MalformedFrameError(`Query frame must be ${QUERY_FRAME_SIZE} bytes, got ${bytes.length}`);
  }
  for (let i = HEADER_SIZE; i < QUERY_FRAME_SIZE - 1; i++) {
    if (bytes[i] !== 0) throw new MalformedFrameError(`Query padding byte ${i} is ${hex(bytes[i]!)}`);
  }
  const terminator = bytes[QUERY_FRAME_SIZE - 1]!;
  if (terminator !== QUERY_TERMINATOR) {
    throw new MalformedFrameError(`Query terminator is ${hex(terminator)}, expected ${hex(QUERY_TERMINATOR)}`);
  }
  return { kind, code, body: new Uint8Array(), bytes: bytes.slice() };
}

/**
 * Validates a response frame: `[0xBE 0xEF][kind][code][payload...]`.
 *
 * When `expected` is given, the frame must echo that kind and code; pairing a
 * response with its request is up to the caller.
 *
 * @throws MalformedFrameError on bad size or prefix
 * @throws UnexpectedCommandError when the echo does not match `expected`
 */
export function decodeFrame(bytes: Uint8Array, expected?: FrameHeader): Frame {
  if (bytes.length < HEADER_SIZE || bytes.length > MAX_RESPONSE_SIZE) {
    throw new MalformedFrameError(`Frame length ${bytes.length} outside ${HEADER_SIZE}..${MAX_RESPONSE_SIZE}`);
  }
  checkPrefix(bytes);

  const kind = bytes[2]!;
  const code = bytes[3]!;
  if (expected && (expected.kind !== kind || expected.code !== code)) {
    throw new UnexpectedCommandError(
      `Expected response to ${hex(expected.kind)}/${hex(expected.code)}, got ${hex(kind)}/${hex(code)}`,
      expected,
      { kind, code }
    );
  }

  return { kind, code, body: bytes.slice(HEADER_SIZE), bytes: bytes.slice() };
}

/**
 * Builds a response frame around a payload laid out from the frame start.
 * The first `HEADER_SIZE` bytes of the payload are replaced by the header.
 *
 * @throws RangeError if the payload cannot hold a header or exceeds a characteristic
 */
export function encodeResponseFrame(kind: number, code: number, payload: Uint8Array): Uint8Array {
  if (payload.length < HEADER_SIZE || payload.length > MAX_RESPONSE_SIZE) {
    throw new RangeError(`Response of ${payload.length} bytes outside ${HEADER_SIZE}..${MAX_RESPONSE_SIZE}`);
  }
  const frame = payload.slice();
  frame.set(FRAME_PREFIX, 0);
  frame[2] = kind;
  frame[3] = code;
  return frame;
}
