import { toDeviceIdentifier, type Advertisement, type DeviceIdentifier, type Transport } from "../bluetooth/transport.ts";
import { DiscoveryError } from "../errors.ts";
import { describeError, discoveryLog } from "../logger.ts";
import type { DiscoveredDevice, SessionRegistry } from "../session/registry.ts";

export class DeviceDiscoveredEvent extends Event {
  #device: DiscoveredDevice;

  constructor(device: DiscoveredDevice) {
    super("discovered");
    this.#device = device;
  }

  get device() {
    return this.#device;
  }
}

export class ScanErrorEvent extends Event {
  #error: DiscoveryError;

  constructor(error: DiscoveryError) {
    super("error");
    this.#error = error;
  }

  get error() {
    return this.#error;
  }
}

export interface DiscoveryScannerInit {
  transport: Transport;
  registry: SessionRegistry;
  now?: () => number;
}

/**
 * Finds devices of the registry's profile and registers them. Dispatches
 * `discovered` for devices seen for the first time and `error` for failed
 * scans.
 */
export class DiscoveryScanner extends EventTarget {
  private readonly transport: Transport;
  private readonly registry: SessionRegistry;
  private readonly now: () => number;

  private active: Promise<DeviceIdentifier[]> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(init: DiscoveryScannerInit) {
    super();
    this.transport = init.transport;
    this.registry = init.registry;
    this.now = init.now ?? Date.now;
  }

  get scanning(): boolean {
    return this.active !== null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Scans for `durationMs` and registers every matching device. A call made
   * while a scan is running joins it instead of starting another.
   *
   * @returns identifiers of the matching devices seen during the scan
   * @throws DiscoveryError if the radio scan failed
   */
  scan(durationMs: number): Promise<DeviceIdentifier[]> {
    this.active ??= this.runScan(durationMs).finally(() => {
      this.active = null;
    });
    return this.active;
  }

  /**
   * Scans now and then every `intervalMs` until `stop()`. Failures are
   * dispatched as `error` events.
   */
  start(intervalMs: number, durationMs: number): void {
    this.stop();
    discoveryLog("scanning every %dms", intervalMs);
    const tick = () => {
      this.scan(durationMs).catch((error: unknown) => {
        discoveryLog("recurring scan failed: %s", describeError(error));
      });
    };
    this.timer = setInterval(tick, intervalMs);
    this.timer.unref();
    tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async runScan(durationMs: number): Promise<DeviceIdentifier[]> {
    const profile = this.registry.profile;

    let advertisements: Advertisement[];
    try {
      advertisements = await this.transport.scan(durationMs);
    } catch (cause) {
      const error = new DiscoveryError(`Scan failed: ${describeError(cause)}`, { cause });
      this.dispatchEvent(new ScanErrorEvent(error));
      throw error;
    }

    const found = new Set<DeviceIdentifier>();
    const seenAt = this.now();
    for (const advertisement of advertisements) {
      if (!profile.matches(advertisement)) continue;

      const device: DiscoveredDevice = {
        id: toDeviceIdentifier(advertisement.id),
        name: profile.displayName(advertisement.localName),
        advertisedName: advertisement.localName,
        rssi: advertisement.rssi,
        lastSeen: seenAt,
      };
      found.add(device.id);
      if (this.registry.register(device)) {
        this.dispatchEvent(new DeviceDiscoveredEvent(device));
      }
    }

    discoveryLog("scan saw %d advertisements, %d matching", advertisements.length, found.size);
    return [...found];
  }
}
