import type { ConnectionHandle, DeviceIdentifier, Transport } from "../bluetooth/transport.ts";
import { freezeReadings, pranaProfile, type DeviceDetails, type DeviceProfile, type DeviceReadings } from "../devices/index.ts";
import {
  ConnectionError,
  DeviceUnreachableError,
  FrameError,
  ProtocolError,
  TimeoutError,
  TransportError,
  TransportTimeoutError,
} from "../errors.ts";
import { describeError, sessionLog } from "../logger.ts";
import { ReadDetails, ReadState, type DeviceCommand } from "../protocol/commands.ts";
import { backoffDelay, delay } from "../utils/delay.ts";
import { withAbort, withTimeout } from "../utils/withAbort.ts";
import { ExecutionSlot } from "./execution-slot.ts";

export type SessionStatus = "disconnected" | "connecting" | "ready" | "busy";

/**
 * Retry, timeout and caching policy for a session.
 */
export interface SessionOptions {
  /** Connection attempts before giving up (default: 3) */
  connectAttempts: number;
  /** Bound on a single connection attempt in milliseconds (default: 5000) */
  connectTimeoutMs: number;
  /** First backoff delay, doubled per attempt (default: 250) */
  backoffBaseMs: number;
  /** Backoff ceiling (default: 4000) */
  backoffMaxMs: number;
  /** Reconnect-and-resend retries after a transport failure (default: 2) */
  maxRetries: number;
  /** Resends after a frame fails to decode (default: 1) */
  protocolRetries: number;
  /** Bound on a write and on the response wait (default: 2000) */
  responseTimeoutMs: number;
  /** How long a caller waits, queueing included (default: 15000) */
  commandTimeoutMs: number;
  /** Maximum age of cached state served without a device read (default: 10000) */
  stalenessMs: number;
}

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  connectAttempts: 3,
  connectTimeoutMs: 5000,
  backoffBaseMs: 250,
  backoffMaxMs: 4000,
  maxRetries: 2,
  protocolRetries: 1,
  responseTimeoutMs: 2000,
  commandTimeoutMs: 15000,
  stalenessMs: 10000,
};

export interface ConnectionHealth {
  status: SessionStatus;
  consecutiveFailures: number;
  lastError: string | null;
}

export interface DeviceState extends DeviceReadings {
  /** Epoch milliseconds of the response the readings came from */
  lastUpdated: number;
  health: ConnectionHealth;
}

export interface ExecuteOptions {
  /** Caller wait in milliseconds, overrides `commandTimeoutMs` */
  timeout?: number;
  /** Skip the cache even if it is fresh */
  forceFresh?: boolean;
}

export interface DeviceSessionInit {
  transport: Transport;
  profile?: DeviceProfile;
  options?: Partial<SessionOptions>;
  now?: () => number;
}

/**
 * Exclusive, ordered access to one device.
 *
 * Every device interaction goes through a FIFO execution slot, so at most one
 * frame is in flight. Transport failures drop the connection and are retried
 * with backoff; frames that fail to decode are resent once. State decoded from
 * any response is cached and served to readers until it goes stale.
 */
export class DeviceSession {
  readonly id: DeviceIdentifier;

  private readonly transport: Transport;
  private readonly profile: DeviceProfile;
  private readonly options: SessionOptions;
  private readonly now: () => number;
  private readonly slot = new ExecutionSlot();

  private handle: ConnectionHandle | null = null;
  private _status: SessionStatus = "disconnected";
  /** Frozen; shared with callers of `execute` */
  private readings: DeviceReadings | null = null;
  private lastUpdated = 0;
  private refreshing: Promise<DeviceReadings> | null = null;
  private _lastActivity: number;
  private _consecutiveFailures = 0;
  private lastError: string | null = null;

  constructor(id: DeviceIdentifier, init: DeviceSessionInit) {
    this.id = id;
    this.transport = init.transport;
    this.profile = init.profile ?? pranaProfile;
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...init.options };
    this.now = init.now ?? Date.now;
    this._lastActivity = this.now();
  }

  get status(): SessionStatus {
    return this._status;
  }

  /** Whether an operation is running or queued */
  get busy(): boolean {
    return this.slot.busy;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  get consecutiveFailures(): number {
    return this._consecutiveFailures;
  }

  get health(): ConnectionHealth {
    return {
      status: this._status,
      consecutiveFailures: this._consecutiveFailures,
      lastError: this.lastError,
    };
  }

  /** Milliseconds since the last call or device response */
  idleFor(): number {
    return this.now() - this._lastActivity;
  }

  /** True when nothing is queued and the session saw no activity for `thresholdMs` */
  isIdle(thresholdMs: number): boolean {
    return !this.slot.busy && this.idleFor() > thresholdMs;
  }

  /**
   * Connects if not connected. Waits behind any queued operation.
   *
   * @throws ConnectionError once every attempt failed
   */
  ensureConnected(): Promise<void> {
    return this.slot.run(async () => {
      await this.connect();
    });
  }

  /**
   * Sends a command and returns its parsed response.
   *
   * A state read with a fresh cache is answered without touching the device
   * unless `forceFresh` is set.
   *
   * @throws DeviceUnreachableError when connecting or the retry budget failed
   * @throws ProtocolError when responses keep failing to decode
   * @throws TimeoutError when the caller's wait expired; the device operation
   *   is not cancelled once started
   */
  execute<R>(command: DeviceCommand<R>, options: ExecuteOptions = {}): Promise<R> {
    this.touch();

    if (!options.forceFresh && this.readings && this.isFresh()) {
      const cached = command.answerFromCache(this.readings);
      if (cached !== null) return Promise.resolve(cached);
    }

    const timeout = options.timeout ?? this.options.commandTimeoutMs;
    const signal = AbortSignal.timeout(timeout);
    const onTimeout = () => new TimeoutError(`${command.name} on ${this.id} timed out after ${timeout}ms`);

    const result = this.slot.run(async () => {
      // Nobody is waiting for this any more; don't send it
      if (signal.aborted) throw onTimeout();
      return this.perform(command);
    });
    return withAbort(result, signal, onTimeout);
  }

  /**
   * Returns the cached state while fresh, otherwise reads it from the device.
   * Concurrent refreshes share a single device read.
   */
  getState(options: ExecuteOptions = {}): Promise<DeviceState> {
    this.touch();

    if (!options.forceFresh && this.readings && this.isFresh()) {
      return Promise.resolve(this.stateOf(this.readings));
    }

    this.refreshing ??= this.slot.run(() => this.perform(new ReadState())).finally(() => {
      this.refreshing = null;
    });

    const timeout = options.timeout ?? this.options.commandTimeoutMs;
    return withTimeout(
      this.refreshing.then((readings) => this.stateOf(readings)),
      timeout,
      () => new TimeoutError(`Reading state of ${this.id} timed out after ${timeout}ms`)
    );
  }

  /** Model name and firmware version */
  readDetails(options: ExecuteOptions = {}): Promise<DeviceDetails> {
    return this.execute(new ReadDetails(), options);
  }

  /** Last known state, or null if nothing was read yet */
  snapshot(): DeviceState | null {
    return this.readings ? this.stateOf(this.readings) : null;
  }

  /**
   * Releases the connection after any in-flight operation finished. Safe to
   * call repeatedly; a later `execute` reconnects.
   */
  close(): Promise<void> {
    return this.slot.run(() => this.release());
  }

  /**
   * Closes the session if it is idle. Resolves with whether it was closed.
   */
  async closeIfIdle(thresholdMs: number): Promise<boolean> {
    if (!this.isIdle(thresholdMs)) return false;
    await this.close();
    return true;
  }

  private async perform<R>(command: DeviceCommand<R>): Promise<R> {
    let transportFailures = 0;
    let frameFailures = 0;

    for (;;) {
      let handle: ConnectionHandle;
      try {
        handle = await this.connect();
      } catch (error) {
        this.recordFailure(error);
        throw new DeviceUnreachableError(`Device ${this.id} is unreachable`, this.id, { cause: error });
      }

      try {
        const result = await this.roundTrip(handle, command);
        this.recordSuccess(command.stateFrom(result));
        return result;
      } catch (error) {
        this.recordFailure(error);

        if (error instanceof FrameError) {
          this.setStatus("ready");
          frameFailures++;
          if (frameFailures > this.options.protocolRetries) {
            throw new ProtocolError(
              `Device ${this.id} sent ${frameFailures} undecodable responses to ${command.name}`,
              this.id,
              { cause: error }
            );
          }
          sessionLog("%s: %s response rejected (%s), resending", this.id, command.name, describeError(error));
          continue;
        }

        await this.release();

        if (!(error instanceof TransportError)) throw error;

        transportFailures++;
        if (transportFailures > this.options.maxRetries) {
          throw new DeviceUnreachableError(
            `Device ${this.id} failed ${transportFailures} times running ${command.name}`,
            this.id,
            { cause: error }
          );
        }
        const wait = backoffDelay(transportFailures, this.options.backoffBaseMs, this.options.backoffMaxMs);
        sessionLog("%s: %s failed (%s), retrying in %dms", this.id, command.name, describeError(error), wait);
        await delay(wait);
      }
    }
  }

  private async roundTrip<R>(handle: ConnectionHandle, command: DeviceCommand<R>): Promise<R> {
    const timeout = this.options.responseTimeoutMs;
    this.setStatus("busy");

    await withTimeout(
      this.transport.write(handle, command.frame),
      timeout,
      () => new TransportTimeoutError(`Writing ${command.name} to ${this.id} timed out`)
    );
    const response = await this.transport.awaitNotification(handle, timeout);
    const result = command.parseResponse(command.decodeResponse(response), this.profile);

    this.setStatus("ready");
    return result;
  }

  private async connect(): Promise<ConnectionHandle> {
    if (this.handle) return this.handle;

    this.setStatus("connecting");
    const attempts = this.options.connectAttempts;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        this.handle = await this.openConnection();
        this.setStatus("ready");
        return this.handle;
      } catch (error) {
        lastError = error;
        sessionLog("%s: connect attempt %d/%d failed: %s", this.id, attempt, attempts, describeError(error));
        if (attempt < attempts) {
          await delay(backoffDelay(attempt, this.options.backoffBaseMs, this.options.backoffMaxMs));
        }
      }
    }

    this.setStatus("disconnected");
    throw new ConnectionError(`Could not connect to ${this.id} after ${attempts} attempts`, {
      cause: lastError,
    });
  }

  private async openConnection(): Promise<ConnectionHandle> {
    const pending = this.transport.connect(this.id);

    let handle: ConnectionHandle;
    try {
      handle = await withTimeout(
        pending,
        this.options.connectTimeoutMs,
        () => new ConnectionError(`Connecting to ${this.id} timed out`)
      );
    } catch (error) {
      // A connection completing after the timeout must not stay open
      void pending
        .then(
          (late) => this.transport.disconnect(late),
          () => undefined // already reported as this attempt's failure
        )
        .catch((cleanupError: unknown) =>
          sessionLog("%s: releasing late connection failed: %s", this.id, describeError(cleanupError))
        );
      throw error;
    }

    if (handle.deviceId !== this.id) {
      await this.transport.disconnect(handle);
      throw new ConnectionError(`Transport returned a connection to ${handle.deviceId} for ${this.id}`);
    }
    return handle;
  }

  private async release(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.setStatus("disconnected");
    if (!handle) return;

    try {
      await this.transport.disconnect(handle);
    } catch (error) {
      sessionLog("%s: disconnect failed: %s", this.id, describeError(error));
    }
  }

  private isFresh(): boolean {
    return this.now() - this.lastUpdated < this.options.stalenessMs;
  }

  private stateOf(readings: DeviceReadings): DeviceState {
    return Object.freeze({
      ...readings,
      sensors: Object.freeze({ ...readings.sensors }),
      lastUpdated: this.lastUpdated,
      health: Object.freeze(this.health),
    });
  }

  private recordSuccess(readings: DeviceReadings | null): void {
    this._consecutiveFailures = 0;
    this.lastError = null;
    if (readings) {
      this.readings = freezeReadings(readings);
      this.lastUpdated = Math.max(this.lastUpdated, this.now());
    }
    this.touch();
  }

  private recordFailure(error: unknown): void {
    this._consecutiveFailures++;
    this.lastError = describeError(error);
    this.touch();
  }

  private touch(): void {
    this._lastActivity = this.now();
  }

  private setStatus(status: SessionStatus): void {
    if (this._status === status) return;
    sessionLog("%s: %s -> %s", this.id, this._status, status);
    this._status = status;
  }
}
