import { decodeFrame, decodeRequest, encodeFrame } from "./frame.ts";
import { CommandCode, FrameKind, MAX_SPEED_LEVEL, MIN_SPEED_LEVEL, QueryCode } from "./constants.ts";
import { freezeReadings, type DeviceDetails, type DeviceProfile, type DeviceReadings } from "../devices/index.ts";
import { InvalidCommandError, MalformedFrameError } from "../errors.ts";

/**
 * Base class for device commands.
 *
 * Handles frame construction and pairing the response with the request.
 */
export abstract class DeviceCommand<R> {
  /** Frame kind (control command or query) */
  readonly kind: FrameKind;

  /** Command code within the kind */
  readonly code: number;

  readonly parameters: Uint8Array;

  /** The complete frame written to the device */
  readonly frame: Uint8Array;

  /** Short name used in logs and by the HTTP API */
  abstract readonly name: string;

  constructor(kind: FrameKind, code: number, parameters: Uint8Array = new Uint8Array()) {
    this.kind = kind;
    this.code = code;
    this.parameters = parameters;
    this.frame = encodeFrame(kind, code, parameters);
  }

  /**
   * Validates a response frame and returns it whole; payload offsets count
   * from its first byte.
   *
   * @throws MalformedFrameError on corrupt frames
   * @throws UnexpectedCommandError if the response belongs to another command
   */
  decodeResponse(response: Uint8Array): Uint8Array {
    return decodeFrame(response, { kind: this.kind, code: this.code }).bytes;
  }

  /** Interprets the response payload */
  abstract parseResponse(payload: Uint8Array, profile: DeviceProfile): R;

  /** Device state carried by a parsed response, if any */
  stateFrom(_result: R): DeviceReadings | null {
    return null;
  }

  /** Answer this command from cached (frozen) readings instead of asking the device */
  answerFromCache(_readings: DeviceReadings): R | null {
    return null;
  }
}

/**
 * Commands answered with the state payload.
 */
export abstract class StateCommand extends DeviceCommand<DeviceReadings> {
  parseResponse(payload: Uint8Array, profile: DeviceProfile): DeviceReadings {
    return freezeReadings(profile.decodeReadings(payload));
  }

  override stateFrom(result: DeviceReadings): DeviceReadings {
    return result;
  }
}

/** Query 0x01: read the current state */
export class ReadState extends StateCommand {
  readonly name = "readState";

  constructor() {
    super(FrameKind.QUERY, QueryCode.READ_STATE);
  }

  override answerFromCache(readings: DeviceReadings): DeviceReadings {
    return readings;
  }
}

/** Query 0x02: model name and firmware version */
export class ReadDetails extends DeviceCommand<DeviceDetails> {
  readonly name = "readDetails";

  constructor() {
    super(FrameKind.QUERY, QueryCode.READ_DETAILS);
  }

  parseResponse(payload: Uint8Array, profile: DeviceProfile): DeviceDetails {
    return profile.decodeDetails(payload);
  }
}

/** Parameterless control commands by API name */
export const ACTIONS = {
  stop: CommandCode.STOP,
  toggleHeating: CommandCode.TOGGLE_HEATING,
  nightMode: CommandCode.NIGHT_MODE,
  highSpeed: CommandCode.HIGH_SPEED,
  toggleFlowLock: CommandCode.TOGGLE_FLOW_LOCK,
  speedDown: CommandCode.SPEED_DOWN,
  speedUp: CommandCode.SPEED_UP,
  inflowOff: CommandCode.INFLOW_OFF,
  inflowSpeedUp: CommandCode.INFLOW_SPEED_UP,
  inflowSpeedDown: CommandCode.INFLOW_SPEED_DOWN,
  outflowOff: CommandCode.OUTFLOW_OFF,
  outflowSpeedUp: CommandCode.OUTFLOW_SPEED_UP,
  outflowSpeedDown: CommandCode.OUTFLOW_SPEED_DOWN,
  toggleWinterMode: CommandCode.TOGGLE_WINTER_MODE,
} as const satisfies Record<string, CommandCode>;

export type ActionName = keyof typeof ACTIONS;

export function isActionName(name: string): name is ActionName {
  return Object.hasOwn(ACTIONS, name);
}

const ACTION_BY_CODE = new Map<number, ActionName>(
  Object.keys(ACTIONS)
    .filter(isActionName)
    .map((action) => [ACTIONS[action], action])
);

/** A parameterless control command such as `speedUp` */
export class ControlCommand extends StateCommand {
  readonly name: ActionName;

  constructor(action: ActionName) {
    super(FrameKind.COMMAND, ACTIONS[action]);
    this.name = action;
  }
}

/** Command 0x0A: set the common fan speed level */
export class SetFanSpeed extends StateCommand {
  readonly name = "setSpeed";
  readonly level: number;

  constructor(level: number) {
    if (!Number.isInteger(level) || level < MIN_SPEED_LEVEL || level > MAX_SPEED_LEVEL) {
      throw new InvalidCommandError(
        `Speed level must be an integer ${MIN_SPEED_LEVEL}-${MAX_SPEED_LEVEL}, got ${level}`
      );
    }
    super(FrameKind.COMMAND, CommandCode.SET_SPEED, Uint8Array.of(level));
    this.level = level;
  }
}

export type AnyCommand = ReadState | ReadDetails | ControlCommand | SetFanSpeed;

/** Names accepted by `createCommand` */
export const COMMAND_NAMES: readonly string[] = [...Object.keys(ACTIONS), "setSpeed"];

/**
 * Builds a state-changing command from its API name.
 *
 * @throws InvalidCommandError for unknown names or bad parameters
 */
export function createCommand(name: string, params: { level?: number } = {}): StateCommand {
  if (name === "setSpeed") {
    if (params.level === undefined) throw new InvalidCommandError("setSpeed requires a level");
    return new SetFanSpeed(params.level);
  }
  if (isActionName(name)) return new ControlCommand(name);

  throw new InvalidCommandError(`Unknown command ${name}; expected one of ${COMMAND_NAMES.join(", ")}`);
}

/**
 * Rebuilds a command from its frame, the inverse of `command.frame`.
 *
 * @throws MalformedFrameError on corrupt frames, query padding or parameters
 * @throws InvalidCommandError on codes the device does not know
 */
export function parseCommandFrame(bytes: Uint8Array): AnyCommand {
  const { kind, code, body } = decodeRequest(bytes);

  if (kind === FrameKind.QUERY) {
    if (code === QueryCode.READ_STATE) return new ReadState();
    if (code === QueryCode.READ_DETAILS) return new ReadDetails();
  } else if (kind === FrameKind.COMMAND) {
    if (code === CommandCode.SET_SPEED) {
      if (body.length !== 1) throw new MalformedFrameError(`setSpeed takes 1 parameter, got ${body.length}`);
      return new SetFanSpeed(body[0]!);
    }
    const action = ACTION_BY_CODE.get(code);
    if (action) {
      if (body.length !== 0) throw new MalformedFrameError(`${action} takes no parameters`);
      return new ControlCommand(action);
    }
  }

  throw new InvalidCommandError(`Unknown command 0x${kind.toString(16)}/0x${code.toString(16)}`);
}
