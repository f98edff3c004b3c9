/** Every frame starts with these two bytes */
export const FRAME_PREFIX = Uint8Array.from([0xbe, 0xef]);

/** Frame kinds (byte 2) */
export enum FrameKind {
  /** Changes device settings; answered with the state payload */
  COMMAND = 0x04,
  /** Reads data without side effects */
  QUERY = 0x05,
}

/** Codes for FrameKind.COMMAND */
export enum CommandCode {
  STOP = 0x01,
  TOGGLE_HEATING = 0x05,
  NIGHT_MODE = 0x06,
  HIGH_SPEED = 0x07,
  TOGGLE_FLOW_LOCK = 0x09,
  SET_SPEED = 0x0a,
  SPEED_DOWN = 0x0b,
  SPEED_UP = 0x0c,
  INFLOW_OFF = 0x0d,
  INFLOW_SPEED_UP = 0x0e,
  INFLOW_SPEED_DOWN = 0x0f,
  OUTFLOW_OFF = 0x10,
  OUTFLOW_SPEED_UP = 0x11,
  OUTFLOW_SPEED_DOWN = 0x12,
  TOGGLE_WINTER_MODE = 0x16,
}

/** Codes for FrameKind.QUERY */
export enum QueryCode {
  READ_STATE = 0x01,
  READ_DETAILS = 0x02,
}

/** Header of every frame: [prefix:2][kind:1][code:1] */
export const HEADER_SIZE = 4;

/** Queries are `[header][00 00 00 00][0x5A]` */
export const QUERY_PADDING = 4;
export const QUERY_TERMINATOR = 0x5a;
export const QUERY_FRAME_SIZE = HEADER_SIZE + QUERY_PADDING + 1;

/** Largest control command parameter block */
export const MAX_PARAMETERS_SIZE = 16;
export const MAX_REQUEST_SIZE = HEADER_SIZE + MAX_PARAMETERS_SIZE;

/** Largest value a GATT characteristic can hold */
export const MAX_RESPONSE_SIZE = 512;

/** Fan speed levels accepted by SET_SPEED */
export const MIN_SPEED_LEVEL = 0;
export const MAX_SPEED_LEVEL = 10;
