import type { DeviceIdentifier, Transport } from "../bluetooth/transport.ts";
import { pranaProfile, type DeviceProfile } from "../devices/index.ts";
import { describeError, registryLog } from "../logger.ts";
import { DeviceSession, type DeviceState, type SessionOptions, type SessionStatus } from "./device-session.ts";

/** Advertisement data remembered for a discovered device */
export interface DiscoveredDevice {
  id: DeviceIdentifier;
  /** Advertised name with the model prefix stripped */
  name: string;
  advertisedName: string | null;
  rssi: number | null;
  /** Epoch milliseconds of the latest advertisement */
  lastSeen: number;
}

export interface DeviceSummary {
  id: DeviceIdentifier;
  name: string | null;
  rssi: number | null;
  lastSeen: number | null;
  status: SessionStatus;
  state: DeviceState | null;
}

export interface SessionRegistryInit {
  transport: Transport;
  profile?: DeviceProfile;
  sessionOptions?: Partial<SessionOptions>;
  now?: () => number;
}

/**
 * Owns every device session. A session is created the first time its device
 * is asked for and lives until it is evicted or the registry is closed.
 */
export class SessionRegistry {
  private readonly sessions = new Map<DeviceIdentifier, DeviceSession>();
  private readonly discovered = new Map<DeviceIdentifier, DiscoveredDevice>();
  private readonly init: SessionRegistryInit;
  private evictionTimer: ReturnType<typeof setInterval> | null = null;

  constructor(init: SessionRegistryInit) {
    this.init = init;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Profile of the devices this registry manages */
  get profile(): DeviceProfile {
    return this.init.profile ?? pranaProfile;
  }

  has(id: DeviceIdentifier): boolean {
    return this.sessions.has(id);
  }

  /**
   * Returns the session for a device, creating it if needed. Does not connect.
   */
  get(id: DeviceIdentifier): DeviceSession {
    let session = this.sessions.get(id);
    if (!session) {
      session = new DeviceSession(id, {
        transport: this.init.transport,
        profile: this.profile,
        options: this.init.sessionOptions,
        now: this.init.now,
      });
      this.sessions.set(id, session);
      registryLog("created session for %s", id);
    }
    return session;
  }

  /**
   * Records advertisement data for a device.
   *
   * @returns true if the device was not known before
   */
  register(device: DiscoveredDevice): boolean {
    const known = this.discovered.has(device.id);
    this.discovered.set(device.id, device);
    if (!known) registryLog("discovered %s (%s)", device.id, device.name);
    return !known;
  }

  discoveredDevice(id: DeviceIdentifier): DiscoveredDevice | undefined {
    return this.discovered.get(id);
  }

  /** Every known device, discovered or with a session */
  list(): DeviceSummary[] {
    const ids = new Set([...this.discovered.keys(), ...this.sessions.keys()]);

    return [...ids].sort().map((id) => {
      const device = this.discovered.get(id);
      const session = this.sessions.get(id);
      return {
        id,
        name: device?.name ?? null,
        rssi: device?.rssi ?? null,
        lastSeen: device?.lastSeen ?? null,
        status: session?.status ?? "disconnected",
        state: session?.snapshot() ?? null,
      };
    });
  }

  /**
   * Closes and forgets sessions idle for longer than `thresholdMs` that have
   * nothing queued. A later `get` creates a fresh session.
   *
   * @returns identifiers of the evicted sessions
   */
  async evictIdle(thresholdMs: number): Promise<DeviceIdentifier[]> {
    const evicted: DeviceSession[] = [];
    for (const [id, session] of this.sessions) {
      if (!session.isIdle(thresholdMs)) continue;
      this.sessions.delete(id);
      evicted.push(session);
    }

    await Promise.all(evicted.map((session) => session.close()));
    if (evicted.length > 0) registryLog("evicted %d idle sessions", evicted.length);
    return evicted.map((session) => session.id);
  }

  startEviction(intervalMs: number, thresholdMs: number): void {
    this.stopEviction();
    this.evictionTimer = setInterval(() => {
      this.evictIdle(thresholdMs).catch((error: unknown) => {
        registryLog("eviction failed: %s", describeError(error));
      });
    }, intervalMs);
    this.evictionTimer.unref();
  }

  stopEviction(): void {
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = null;
    }
  }

  /** Stops eviction and closes every session */
  async closeAll(): Promise<void> {
    this.stopEviction();
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map((session) => session.close()));
    registryLog("closed %d sessions", sessions.length);
  }
}
