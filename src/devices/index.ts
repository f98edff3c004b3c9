import { readFileSync } from "node:fs";
import Ajv, { type JTDDataType, type SomeJTDSchemaType } from "ajv/dist/jtd";
import {
  DecimalField,
  FlagField,
  LevelField,
  StringField,
  Uint8Field,
  VersionField,
  fieldSchema,
  fromFieldJson,
  type AnyField,
} from "../fields/index.ts";
import type { Field } from "../fields/shared.ts";
import type { Advertisement } from "../bluetooth/transport.ts";
import { sameUuid } from "../bluetooth/uuid.ts";
import { MalformedFrameError } from "../errors.ts";
import type {
  DeviceDetails,
  DeviceReadings,
  FlowDirection,
  OperatingMode,
  SensorReadings,
} from "./types.ts";

export type * from "./types.ts";

const { definitions, ...fieldRest } = fieldSchema;
const schema = {
  properties: {
    type: { type: "string" },
    namePrefix: { type: "string" },
    serviceUuid: { type: "string" },
    characteristicUuid: { type: "string" },
    stateFields: { elements: { ref: "field" } },
    detailFields: { elements: { ref: "field" } },
  },
  definitions: {
    field: fieldRest,
    ...definitions,
  },
} as const satisfies SomeJTDSchemaType;

export type DeviceJson = JTDDataType<typeof schema>;

const ajv = new Ajv();
export const validateDeviceJson = ajv.compile<DeviceJson>(schema);

type Guard<F extends AnyField> = (field: AnyField) => field is F;
const isFlag: Guard<FlagField> = (field): field is FlagField => field instanceof FlagField;
const isLevel: Guard<LevelField> = (field): field is LevelField => field instanceof LevelField;
const isDecimal: Guard<DecimalField> = (field): field is DecimalField => field instanceof DecimalField;
const isUint8: Guard<Uint8Field> = (field): field is Uint8Field => field instanceof Uint8Field;
const isString: Guard<StringField> = (field): field is StringField => field instanceof StringField;
const isVersion: Guard<VersionField> = (field): field is VersionField => field instanceof VersionField;

function findField<F extends AnyField>(
  fields: readonly AnyField[],
  name: string,
  guard: Guard<F>
): F | undefined {
  const field = fields.find((candidate) => candidate.name === name);
  if (!field) return undefined;
  if (!guard(field)) throw new Error(`Profile field ${name} has unexpected type ${field.type}`);
  return field;
}

function requireField<F extends AnyField>(fields: readonly AnyField[], name: string, guard: Guard<F>): F {
  const field = findField(fields, name, guard);
  if (!field) throw new Error(`Profile is missing field ${name}`);
  return field;
}

function required<T>(value: T | undefined, field: Field<T>): T {
  if (value === undefined) {
    throw new MalformedFrameError(
      `Payload too short for ${field.name} at offset ${field.location.offset}`
    );
  }
  return value;
}

export function operatingMode(nightMode: boolean, autoMode: boolean): OperatingMode {
  if (nightMode) return "night";
  if (autoMode) return "auto";
  return "manual";
}

export function flowDirection(inflowFan: boolean, outflowFan: boolean): FlowDirection {
  if (inflowFan && outflowFan) return "balanced";
  if (inflowFan) return "inflow";
  if (outflowFan) return "outflow";
  return "off";
}

/**
 * Frozen copy of readings, sensors included. Readings that are already
 * frozen are returned as they are.
 */
export function freezeReadings(readings: DeviceReadings): DeviceReadings {
  if (Object.isFrozen(readings) && Object.isFrozen(readings.sensors)) return readings;
  return Object.freeze({ ...readings, sensors: Object.freeze({ ...readings.sensors }) });
}

/**
 * Describes where a device family keeps its values inside response frames,
 * counted from the first prefix byte, and how it advertises itself.
 */
export class DeviceProfile {
  readonly type: string;
  readonly namePrefix: string;
  readonly serviceUuid: string;
  readonly characteristicUuid: string;
  readonly stateFields: readonly AnyField[];
  readonly detailFields: readonly AnyField[];

  private readonly state;
  private readonly details;

  constructor(json: DeviceJson) {
    this.type = json.type;
    this.namePrefix = json.namePrefix;
    this.serviceUuid = json.serviceUuid;
    this.characteristicUuid = json.characteristicUuid;
    this.stateFields = json.stateFields.map(fromFieldJson);
    this.detailFields = json.detailFields.map(fromFieldJson);

    const fields = this.stateFields;
    this.state = {
      power: requireField(fields, "power", isFlag),
      heating: requireField(fields, "heating", isFlag),
      nightMode: requireField(fields, "nightMode", isFlag),
      autoMode: requireField(fields, "autoMode", isFlag),
      flowsLocked: requireField(fields, "flowsLocked", isFlag),
      speed: requireField(fields, "speed", isLevel),
      inflowFan: requireField(fields, "inflowFan", isFlag),
      inflowSpeed: requireField(fields, "inflowSpeed", isLevel),
      outflowFan: requireField(fields, "outflowFan", isFlag),
      outflowSpeed: requireField(fields, "outflowSpeed", isLevel),
      winterMode: requireField(fields, "winterMode", isFlag),
      insideTemperature: findField(fields, "insideTemperature", isDecimal),
      outsideTemperature: findField(fields, "outsideTemperature", isDecimal),
      humidity: findField(fields, "humidity", isUint8),
    };
    this.details = {
      model: requireField(this.detailFields, "model", isString),
      firmware: requireField(this.detailFields, "firmware", isVersion),
    };
  }

  /** Size of a state payload that carries every field, sensors included */
  get fullStateSize(): number {
    return Math.max(
      ...Object.values(this.state)
        .filter((field): field is NonNullable<typeof field> => field !== undefined)
        .map((field) => field.location.offset + field.byteSize)
    );
  }

  /** Smallest details payload that holds every field */
  get detailsSize(): number {
    return Math.max(...this.detailFields.map((field) => field.location.offset + field.byteSize));
  }

  /**
   * Decodes a state payload.
   *
   * @throws MalformedFrameError if the payload ends before a required field
   */
  decodeReadings(payload: Uint8Array): DeviceReadings {
    const s = this.state;
    const read = <T>(field: Field<T>) => required(field.read(payload), field);

    const sensors: SensorReadings = {};
    const inside = s.insideTemperature?.read(payload);
    if (inside !== undefined) sensors.insideTemperature = inside.toNumber();
    const outside = s.outsideTemperature?.read(payload);
    if (outside !== undefined) sensors.outsideTemperature = outside.toNumber();
    const humidity = s.humidity?.read(payload);
    if (humidity !== undefined) sensors.humidity = humidity;

    return {
      power: read(s.power),
      fanSpeed: read(s.speed),
      inflowSpeed: read(s.inflowSpeed),
      outflowSpeed: read(s.outflowSpeed),
      mode: operatingMode(read(s.nightMode), read(s.autoMode)),
      flow: flowDirection(read(s.inflowFan), read(s.outflowFan)),
      flowsLocked: read(s.flowsLocked),
      heating: read(s.heating),
      winterMode: read(s.winterMode),
      sensors,
    };
  }

  /**
   * Decodes a details payload.
   *
   * @throws MalformedFrameError if the payload is too short
   */
  decodeDetails(payload: Uint8Array): DeviceDetails {
    return {
      model: required(this.details.model.read(payload), this.details.model),
      firmware: required(this.details.firmware.read(payload), this.details.firmware),
    };
  }

  /** Whether an advertisement belongs to this device family */
  matches(advertisement: Advertisement): boolean {
    if (advertisement.localName?.startsWith(this.namePrefix)) return true;
    return advertisement.serviceUuids.some((uuid) => sameUuid(uuid, this.serviceUuid));
  }

  /** Advertised name without the family prefix */
  displayName(advertisedName: string | null): string {
    if (!advertisedName) return "";
    return advertisedName.replace(this.namePrefix, "").trim();
  }

  /**
   * Inverse of `decodeReadings`, for simulating devices. Sensors without a
   * reading and the header bytes are left zero.
   */
  encodeReadings(readings: DeviceReadings): Uint8Array {
    const s = this.state;
    const payload = new Uint8Array(this.fullStateSize);
    const write = (field: AnyField, bytes: Uint8Array) => payload.set(bytes, field.location.offset);

    write(s.power, s.power.encode(readings.power));
    write(s.heating, s.heating.encode(readings.heating));
    write(s.nightMode, s.nightMode.encode(readings.mode === "night"));
    write(s.autoMode, s.autoMode.encode(readings.mode === "auto"));
    write(s.flowsLocked, s.flowsLocked.encode(readings.flowsLocked));
    write(s.speed, s.speed.encode(readings.fanSpeed));
    write(s.inflowFan, s.inflowFan.encode(readings.flow === "balanced" || readings.flow === "inflow"));
    write(s.inflowSpeed, s.inflowSpeed.encode(readings.inflowSpeed));
    write(s.outflowFan, s.outflowFan.encode(readings.flow === "balanced" || readings.flow === "outflow"));
    write(s.outflowSpeed, s.outflowSpeed.encode(readings.outflowSpeed));
    write(s.winterMode, s.winterMode.encode(readings.winterMode));

    const { insideTemperature, outsideTemperature, humidity } = readings.sensors;
    if (s.insideTemperature && insideTemperature !== undefined) {
      write(s.insideTemperature, s.insideTemperature.encode(insideTemperature));
    }
    if (s.outsideTemperature && outsideTemperature !== undefined) {
      write(s.outsideTemperature, s.outsideTemperature.encode(outsideTemperature));
    }
    if (s.humidity && humidity !== undefined) write(s.humidity, s.humidity.encode(humidity));

    return payload;
  }

  /** Inverse of `decodeDetails` */
  encodeDetails(details: DeviceDetails): Uint8Array {
    const payload = new Uint8Array(this.detailsSize);
    const { model, firmware } = this.details;
    payload.set(model.encode(details.model), model.location.offset);
    payload.set(firmware.encode(details.firmware), firmware.location.offset);
    return payload;
  }

  /** Size of a state payload without the optional sensor fields */
  get baseStateSize(): number {
    const s = this.state;
    return Math.max(
      ...[
        s.power,
        s.heating,
        s.nightMode,
        s.autoMode,
        s.flowsLocked,
        s.speed,
        s.inflowFan,
        s.inflowSpeed,
        s.outflowFan,
        s.outflowSpeed,
        s.winterMode,
      ].map((field) => field.location.offset + field.byteSize)
    );
  }
}

/**
 * Validates profile JSON and builds the profile.
 *
 * @throws Error if the JSON does not match the profile schema
 */
export function loadDeviceProfile(json: unknown): DeviceProfile {
  if (!validateDeviceJson(json)) {
    throw new Error(`Device profile is invalid: ${ajv.errorsText(validateDeviceJson.errors)}`);
  }
  return new DeviceProfile(json);
}

const pranaJson: unknown = JSON.parse(readFileSync(new URL("./prana.json", import.meta.url), "utf8"));

export const pranaProfile = loadDeviceProfile(pranaJson);
