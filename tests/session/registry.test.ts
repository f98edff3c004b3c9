import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { SessionRegistry } from "../../src/session/registry.ts";
import { MockTransport, MockVentilator } from "../../src/testing/mock-transport.ts";
import { delay } from "../../src/utils/delay.ts";

const KITCHEN = "aa:bb:cc:dd:ee:01";
const BEDROOM = "aa:bb:cc:dd:ee:02";

describe("SessionRegistry", () => {
  let clock: { time: number };
  let transport: MockTransport;
  let registry: SessionRegistry;

  beforeEach(() => {
    clock = { time: 50_000 };
    transport = new MockTransport([new MockVentilator({ id: KITCHEN }), new MockVentilator({ id: BEDROOM })]);
    registry = new SessionRegistry({
      transport,
      sessionOptions: { backoffBaseMs: 1, responseTimeoutMs: 50 },
      now: () => clock.time,
    });
  });

  afterEach(async () => {
    await registry.closeAll();
  });

  test("get returns the same session for a device", () => {
    const first = registry.get(KITCHEN);

    expect(registry.get(KITCHEN)).toBe(first);
    expect(registry.get(BEDROOM)).not.toBe(first);
    expect(registry.size).toBe(2);
    expect(registry.has(KITCHEN)).toBe(true);
  });

  test("creating a session does not connect", () => {
    registry.get(KITCHEN);

    expect(transport.device(KITCHEN).connects).toBe(0);
    expect(registry.get(KITCHEN).status).toBe("disconnected");
  });

  test("register reports only new devices", () => {
    const device = { id: KITCHEN, name: "Kitchen", advertisedName: "PRNAQaq Kitchen", rssi: -70, lastSeen: 1 };

    expect(registry.register(device)).toBe(true);
    expect(registry.register({ ...device, rssi: -50, lastSeen: 2 })).toBe(false);
    expect(registry.discoveredDevice(KITCHEN)?.rssi).toBe(-50);
  });

  test("list merges discovered devices and sessions", async () => {
    registry.register({ id: BEDROOM, name: "Bedroom", advertisedName: "PRNAQaq Bedroom", rssi: -65, lastSeen: 10 });
    await registry.get(KITCHEN).getState();

    const [kitchen, bedroom] = registry.list();

    expect(registry.list().map((device) => device.id)).toEqual([KITCHEN, BEDROOM]);
    expect(bedroom).toEqual({
      id: BEDROOM,
      name: "Bedroom",
      rssi: -65,
      lastSeen: 10,
      status: "disconnected",
      state: null,
    });
    expect(kitchen?.name).toBeNull();
    expect(kitchen?.status).toBe("ready");
    expect(kitchen?.state?.fanSpeed).toBe(3);
  });

  describe("eviction", () => {
    test("closes and forgets idle sessions", async () => {
      const kitchen = registry.get(KITCHEN);
      await kitchen.getState();

      clock.time += 60_000;
      const evicted = await registry.evictIdle(30_000);

      expect(evicted).toEqual([KITCHEN]);
      expect(registry.has(KITCHEN)).toBe(false);
      expect(kitchen.status).toBe("disconnected");
      expect(transport.openConnections(KITCHEN)).toBe(0);
      const replacement = registry.get(KITCHEN);
      expect(replacement).not.toBe(kitchen);
      expect(transport.device(KITCHEN).connects).toBe(1);

      await replacement.getState();

      expect(transport.device(KITCHEN).connects).toBe(2);
      expect(replacement.status).toBe("ready");
    });

    test("keeps recently used sessions", async () => {
      await registry.get(KITCHEN).getState();
      clock.time += 60_000;
      await registry.get(BEDROOM).getState();

      const evicted = await registry.evictIdle(30_000);

      expect(evicted).toEqual([KITCHEN]);
      expect(registry.has(BEDROOM)).toBe(true);
    });

    test("skips sessions with queued work", async () => {
      transport.device(KITCHEN).responseDelayMs = 20;
      const kitchen = registry.get(KITCHEN);
      const pending = kitchen.getState();
      clock.time += 60_000;

      const evicted = await registry.evictIdle(30_000);
      await pending;

      expect(evicted).toEqual([]);
      expect(registry.get(KITCHEN)).toBe(kitchen);
      expect(kitchen.status).toBe("ready");
    });

    test("runs on an interval", async () => {
      await registry.get(KITCHEN).getState();
      clock.time += 60_000;

      registry.startEviction(5, 30_000);
      await delay(30);
      registry.stopEviction();

      expect(registry.has(KITCHEN)).toBe(false);
    });
  });

  test("closeAll releases every connection", async () => {
    await Promise.all([registry.get(KITCHEN).getState(), registry.get(BEDROOM).getState()]);

    await registry.closeAll();

    expect(registry.size).toBe(0);
    expect(transport.openConnections(KITCHEN)).toBe(0);
    expect(transport.openConnections(BEDROOM)).toBe(0);
  });
});
