export type OperatingMode = "manual" | "auto" | "night";

/** Which fans are moving air */
export type FlowDirection = "balanced" | "inflow" | "outflow" | "off";

/** Sensors only newer firmware reports; absent keys were not in the payload */
export interface SensorReadings {
  /** °C */
  insideTemperature?: number;
  /** °C */
  outsideTemperature?: number;
  /** Relative humidity, % */
  humidity?: number;
}

/** Everything decoded from one state payload */
export interface DeviceReadings {
  power: boolean;
  /** Common speed level 0-10, used while flows are locked */
  fanSpeed: number;
  inflowSpeed: number;
  outflowSpeed: number;
  mode: OperatingMode;
  flow: FlowDirection;
  flowsLocked: boolean;
  heating: boolean;
  winterMode: boolean;
  sensors: SensorReadings;
}

export interface DeviceDetails {
  model: string;
  firmware: string;
}
