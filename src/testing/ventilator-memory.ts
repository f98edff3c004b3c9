import type { DeviceDetails, DeviceProfile, DeviceReadings } from "../devices/index.ts";

export const DEFAULT_READINGS: DeviceReadings = {
  power: true,
  fanSpeed: 3,
  inflowSpeed: 3,
  outflowSpeed: 3,
  mode: "manual",
  flow: "balanced",
  flowsLocked: true,
  heating: false,
  winterMode: false,
  sensors: {},
};

export const DEFAULT_DETAILS: DeviceDetails = {
  model: "PRANA-150",
  firmware: "1.05",
};

/**
 * Simulated device memory: the state and details payloads as the firmware
 * would report them.
 */
export class VentilatorMemory {
  private readonly profile: DeviceProfile;
  private state: Uint8Array;
  private details: Uint8Array;

  /** Length of the state payload sent back */
  stateSize: number;

  constructor(
    profile: DeviceProfile,
    readings: DeviceReadings = DEFAULT_READINGS,
    details: DeviceDetails = DEFAULT_DETAILS
  ) {
    this.profile = profile;
    this.state = profile.encodeReadings(readings);
    this.details = profile.encodeDetails(details);
    // Firmware without sensors sends the shorter payload
    this.stateSize = Object.keys(readings.sensors).length > 0 ? profile.fullStateSize : profile.baseStateSize;
  }

  /** The readings a device read would currently report */
  get readings(): DeviceReadings {
    return this.profile.decodeReadings(this.readState());
  }

  set readings(readings: DeviceReadings) {
    this.state = this.profile.encodeReadings(readings);
  }

  /** Applies a partial update to the current readings */
  update(changes: Partial<DeviceReadings>): DeviceReadings {
    const next = { ...this.readings, ...changes };
    this.readings = next;
    return next;
  }

  /**
   * Writes raw bytes into the state payload.
   *
   * @throws RangeError if the bytes extend past the payload
   */
  writeState(offset: number, data: Uint8Array): void {
    if (offset < 0 || offset + data.length > this.state.length) {
      throw new RangeError(`State write ${offset}+${data.length} outside ${this.state.length} bytes`);
    }
    this.state.set(data, offset);
  }

  /** A copy of the state payload, `stateSize` bytes long */
  readState(): Uint8Array {
    return this.state.slice(0, this.stateSize);
  }

  readDetails(): Uint8Array {
    return this.details.slice();
  }
}
