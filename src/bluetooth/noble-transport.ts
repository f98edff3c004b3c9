import type { Characteristic, Peripheral } from "@abandonware/noble";
import { pranaProfile, type DeviceProfile } from "../devices/index.ts";
import { ConnectionError, TransportTimeoutError } from "../errors.ts";
import { describeError, nobleLog } from "../logger.ts";
import { delay } from "../utils/delay.ts";
import { withTimeout } from "../utils/withAbort.ts";
import { NotificationQueue } from "./notification-queue.ts";
import {
  toDeviceIdentifier,
  type Advertisement,
  type ConnectionHandle,
  type DeviceIdentifier,
  type Transport,
} from "./transport.ts";
import { sameUuid, shortenUuid } from "./uuid.ts";

type Noble = typeof import("@abandonware/noble");

interface Connection {
  handle: ConnectionHandle;
  peripheral: Peripheral;
  characteristic: Characteristic;
  queue: NotificationQueue;
}

export interface NobleTransportOptions {
  profile?: DeviceProfile;
  /** How long to wait for the adapter to power on (default: 10000) */
  poweredOnTimeoutMs?: number;
}

const isNoble = (value: unknown): value is Noble =>
  typeof value === "object" && value !== null && "startScanningAsync" in value;

// The package is CommonJS; depending on the loader its API is the namespace
// or its default export
async function loadNoble(): Promise<Noble> {
  let imported: unknown;
  try {
    imported = await import("@abandonware/noble");
  } catch (error) {
    throw new ConnectionError("Bluetooth support is unavailable (@abandonware/noble failed to load)", {
      cause: error,
    });
  }

  const candidate =
    typeof imported === "object" && imported !== null && "default" in imported ? imported.default : imported;
  if (isNoble(candidate)) return candidate;
  if (isNoble(imported)) return imported;
  throw new ConnectionError("@abandonware/noble did not export the expected API");
}

function waitForPoweredOn(noble: Noble, timeoutMs: number): Promise<void> {
  if (noble.state === "poweredOn") return Promise.resolve();

  let onStateChange: ((state: string) => void) | undefined;
  const poweredOn = new Promise<void>((resolve) => {
    onStateChange = (state: string) => {
      nobleLog("adapter state %s", state);
      if (state === "poweredOn") resolve();
    };
    noble.on("stateChange", onStateChange);
  });

  return withTimeout(
    poweredOn,
    timeoutMs,
    () => new ConnectionError(`Bluetooth adapter not powered on after ${timeoutMs}ms (state: ${noble.state})`)
  ).finally(() => {
    if (onStateChange) noble.removeListener("stateChange", onStateChange);
  });
}

async function wrap<T>(action: string, promise: Promise<T>): Promise<T> {
  try {
    return await promise;
  } catch (error) {
    if (error instanceof ConnectionError) throw error;
    throw new ConnectionError(`${action} failed: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Waits for the notification announcing a response, then reads the whole
 * characteristic value. A notification holds one ATT payload, so a long
 * response may arrive split across several; the read returns all of it.
 */
export function readResponse(
  queue: NotificationQueue,
  read: () => Promise<Uint8Array>,
  timeoutMs: number
): Promise<Uint8Array> {
  return withTimeout(
    queue.next(timeoutMs).then(() => read()),
    timeoutMs,
    () => new TransportTimeoutError(`No response within ${timeoutMs}ms`)
  );
}

/**
 * Transport on the host's Bluetooth adapter, through noble. Devices must have
 * been seen in a scan before they can be connected.
 */
export class NobleTransport implements Transport {
  private readonly peripherals = new Map<DeviceIdentifier, Peripheral>();
  private readonly connections = new Map<string, Connection>();
  private connectionCount = 0;

  private constructor(
    private readonly noble: Noble,
    private readonly profile: DeviceProfile
  ) {}

  static async create(options: NobleTransportOptions = {}): Promise<NobleTransport> {
    const noble = await loadNoble();
    await waitForPoweredOn(noble, options.poweredOnTimeoutMs ?? 10000);
    nobleLog("adapter powered on");
    return new NobleTransport(noble, options.profile ?? pranaProfile);
  }

  async scan(durationMs: number): Promise<Advertisement[]> {
    const seen = new Map<DeviceIdentifier, Advertisement>();
    const onDiscover = (peripheral: Peripheral) => {
      const id = toDeviceIdentifier(peripheral.id);
      this.peripherals.set(id, peripheral);
      seen.set(id, {
        id,
        localName: peripheral.advertisement.localName || null,
        serviceUuids: peripheral.advertisement.serviceUuids ?? [],
        rssi: peripheral.rssi,
      });
    };

    this.noble.on("discover", onDiscover);
    try {
      await wrap("Starting scan", this.noble.startScanningAsync([], true));
      await delay(durationMs);
    } finally {
      this.noble.removeListener("discover", onDiscover);
      await wrap("Stopping scan", this.noble.stopScanningAsync());
    }

    nobleLog("scan found %d peripherals", seen.size);
    return [...seen.values()];
  }

  async connect(id: DeviceIdentifier): Promise<ConnectionHandle> {
    const peripheral = this.peripherals.get(id);
    if (!peripheral) throw new ConnectionError(`Device ${id} has not been seen in a scan`);

    await wrap(`Connecting to ${id}`, peripheral.connectAsync());
    try {
      const { characteristics } = await wrap(
        `Discovering services of ${id}`,
        peripheral.discoverSomeServicesAndCharacteristicsAsync(
          [shortenUuid(this.profile.serviceUuid)],
          [shortenUuid(this.profile.characteristicUuid)]
        )
      );
      const characteristic = characteristics.find((candidate) =>
        sameUuid(candidate.uuid, this.profile.characteristicUuid)
      );
      if (!characteristic) throw new ConnectionError(`Device ${id} lacks the control characteristic`);

      const handle: ConnectionHandle = { id: `${id}#${++this.connectionCount}`, deviceId: id };
      const queue = new NotificationQueue();
      characteristic.on("data", (data: Buffer) => queue.push(new Uint8Array(data)));
      peripheral.once("disconnect", () => {
        nobleLog("%s disconnected", handle.id);
        queue.close(new ConnectionError(`Device ${id} disconnected`));
      });
      await wrap(`Subscribing to ${id}`, characteristic.subscribeAsync());

      this.connections.set(handle.id, { handle, peripheral, characteristic, queue });
      nobleLog("connected %s", handle.id);
      return handle;
    } catch (error) {
      await peripheral.disconnectAsync().catch((cleanupError: unknown) => {
        nobleLog("disconnecting %s after failed setup failed: %s", id, describeError(cleanupError));
      });
      throw error;
    }
  }

  async disconnect(handle: ConnectionHandle): Promise<void> {
    const connection = this.connections.get(handle.id);
    if (!connection) return;

    this.connections.delete(handle.id);
    connection.queue.close();
    connection.characteristic.removeAllListeners("data");
    await wrap(`Disconnecting ${handle.deviceId}`, connection.peripheral.disconnectAsync());
    nobleLog("disconnected %s", handle.id);
  }

  async write(handle: ConnectionHandle, bytes: Uint8Array): Promise<void> {
    const { characteristic, queue } = this.connection(handle);
    // Leftover fragments of an earlier response
    const stale = queue.discard();
    if (stale > 0) nobleLog("%s dropped %d stale notifications", handle.id, stale);
    await wrap(`Writing to ${handle.deviceId}`, characteristic.writeAsync(Buffer.from(bytes), false));
  }

  async awaitNotification(handle: ConnectionHandle, timeoutMs: number): Promise<Uint8Array> {
    const { characteristic, queue } = this.connection(handle);
    const read = async () =>
      new Uint8Array(await wrap(`Reading from ${handle.deviceId}`, characteristic.readAsync()));
    return readResponse(queue, read, timeoutMs);
  }

  private connection(handle: ConnectionHandle): Connection {
    const connection = this.connections.get(handle.id);
    if (!connection) throw new ConnectionError(`Connection ${handle.id} is closed`);
    return connection;
  }
}
