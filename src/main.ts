/**
 * Library entry point for the Prana BLE gateway.
 */

// Wire protocol
export { encodeFrame, decodeFrame, decodeRequest, encodeResponseFrame } from "./protocol/frame.ts";
export type { Frame, FrameHeader } from "./protocol/frame.ts";
export { FrameKind, CommandCode, QueryCode } from "./protocol/constants.ts";
export {
  DeviceCommand,
  StateCommand,
  ReadState,
  ReadDetails,
  ControlCommand,
  SetFanSpeed,
  ACTIONS,
  COMMAND_NAMES,
  createCommand,
  parseCommandFrame,
} from "./protocol/commands.ts";
export type { ActionName, AnyCommand } from "./protocol/commands.ts";

// Device profiles
export { DeviceProfile, freezeReadings, loadDeviceProfile, pranaProfile } from "./devices/index.ts";
export type * from "./devices/types.ts";

// Bluetooth
export { NobleTransport, readResponse } from "./bluetooth/noble-transport.ts";
export { NotificationQueue } from "./bluetooth/notification-queue.ts";
export { toDeviceIdentifier } from "./bluetooth/transport.ts";
export type { Advertisement, ConnectionHandle, DeviceIdentifier, Transport } from "./bluetooth/transport.ts";

// Sessions
export { DeviceSession, DEFAULT_SESSION_OPTIONS } from "./session/device-session.ts";
export type {
  ConnectionHealth,
  DeviceState,
  ExecuteOptions,
  SessionOptions,
  SessionStatus,
} from "./session/device-session.ts";
export { SessionRegistry } from "./session/registry.ts";
export type { DeviceSummary, DiscoveredDevice } from "./session/registry.ts";
export { DiscoveryScanner, DeviceDiscoveredEvent, ScanErrorEvent } from "./discovery/index.ts";

// Service
export { loadConfig, sessionOptions, DEFAULT_CONFIG } from "./config.ts";
export type { GatewayConfig } from "./config.ts";
export { createGatewayServer, createRouter } from "./server/app.ts";

export * from "./errors.ts";
