/** BLE address (or platform peripheral id), lower case */
export type DeviceIdentifier = string;

/**
 * An open connection to one device. Handles are owned by exactly one device
 * session and are useless after `disconnect`.
 */
export interface ConnectionHandle {
  /** Unique per connection, never reused */
  readonly id: string;
  /** The device this connection was negotiated with */
  readonly deviceId: DeviceIdentifier;
}

/** One advertisement seen while scanning */
export interface Advertisement {
  id: DeviceIdentifier;
  localName: string | null;
  serviceUuids: string[];
  rssi: number | null;
}

/**
 * The radio capabilities the gateway needs. Implementations must allow
 * independent concurrent connections to distinct devices; exclusivity per
 * device is enforced by the session layer.
 *
 * Failures are reported as `ConnectionError` or `TransportTimeoutError`.
 */
export interface Transport {
  connect(id: DeviceIdentifier): Promise<ConnectionHandle>;
  disconnect(handle: ConnectionHandle): Promise<void>;
  /** Writes one frame, resolving once the device acknowledged it */
  write(handle: ConnectionHandle, bytes: Uint8Array): Promise<void>;
  /** Resolves with the device's next complete response, oldest first */
  awaitNotification(handle: ConnectionHandle, timeoutMs: number): Promise<Uint8Array>;
  /** Collects advertisements for `durationMs` */
  scan(durationMs: number): Promise<Advertisement[]>;
}

/**
 * Normalizes a user or radio supplied identifier.
 */
export function toDeviceIdentifier(raw: string): DeviceIdentifier {
  return raw.trim().toLowerCase();
}
