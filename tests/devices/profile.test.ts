import { describe, test, expect } from "vitest";
import pranaJson from "../../src/devices/prana.json";
import {
  flowDirection,
  freezeReadings,
  loadDeviceProfile,
  operatingMode,
  pranaProfile,
} from "../../src/devices/index.ts";
import { MalformedFrameError } from "../../src/errors.ts";
import { DEFAULT_READINGS } from "../../src/testing/ventilator-memory.ts";

function statePayload(size = pranaProfile.fullStateSize): Uint8Array {
  const payload = new Uint8Array(pranaProfile.fullStateSize);
  payload[10] = 1; // power
  payload[16] = 1; // night mode
  payload[26] = 50; // speed 5
  payload[28] = 1; // inflow fan
  payload[30] = 40; // inflow speed 4
  payload[34] = 20; // outflow speed 2
  payload[42] = 1; // winter mode
  payload.set([0x00, 0xd6], 48); // 21.4 °C
  payload.set([0xff, 0xc9], 50); // -5.5 °C
  payload[52] = 45; // humidity
  return payload.slice(0, size);
}

describe("pranaProfile", () => {
  test("advertising", () => {
    expect(pranaProfile.type).toBe("prana");
    expect(pranaProfile.namePrefix).toBe("PRNAQaq");
    expect(pranaProfile.serviceUuid).toBe("0000baba-0000-1000-8000-00805f9b34fb");
    expect(pranaProfile.characteristicUuid).toBe("0000cccc-0000-1000-8000-00805f9b34fb");
  });

  test("payload sizes", () => {
    expect(pranaProfile.baseStateSize).toBe(43);
    expect(pranaProfile.fullStateSize).toBe(53);
    expect(pranaProfile.detailsSize).toBe(22);
  });
});

describe("decodeReadings", () => {
  test("decodes every field of a full payload", () => {
    expect(pranaProfile.decodeReadings(statePayload())).toEqual({
      power: true,
      fanSpeed: 5,
      inflowSpeed: 4,
      outflowSpeed: 2,
      mode: "night",
      flow: "inflow",
      flowsLocked: false,
      heating: false,
      winterMode: true,
      sensors: { insideTemperature: 21.4, outsideTemperature: -5.5, humidity: 45 },
    });
  });

  test("omits sensors the payload is too short for", () => {
    expect(pranaProfile.decodeReadings(statePayload(43)).sensors).toEqual({});
    expect(pranaProfile.decodeReadings(statePayload(49)).sensors).toEqual({});
    expect(pranaProfile.decodeReadings(statePayload(50)).sensors).toEqual({ insideTemperature: 21.4 });
    expect(pranaProfile.decodeReadings(statePayload(52)).sensors).toEqual({
      insideTemperature: 21.4,
      outsideTemperature: -5.5,
    });
  });

  test("rejects a payload that ends before a required field", () => {
    expect(() => pranaProfile.decodeReadings(statePayload(42))).toThrow(
      new MalformedFrameError("Payload too short for winterMode at offset 42")
    );
  });

  test("rejects an empty payload", () => {
    expect(() => pranaProfile.decodeReadings(new Uint8Array())).toThrow(MalformedFrameError);
  });

  test("encodeReadings inverts decodeReadings", () => {
    const readings = pranaProfile.decodeReadings(statePayload());
    expect(pranaProfile.decodeReadings(pranaProfile.encodeReadings(readings))).toEqual(readings);
  });
});

describe("freezeReadings", () => {
  test("freezes a copy, sensors included", () => {
    const readings = { ...DEFAULT_READINGS, sensors: { humidity: 40 } };
    const frozen = freezeReadings(readings);

    expect(frozen).not.toBe(readings);
    expect(frozen).toEqual(readings);
    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.sensors)).toBe(true);
    expect(Object.isFrozen(readings)).toBe(false);
  });

  test("returns frozen readings as they are", () => {
    const frozen = freezeReadings(DEFAULT_READINGS);
    expect(freezeReadings(frozen)).toBe(frozen);
  });
});

describe("modes", () => {
  test("night mode wins over auto", () => {
    expect(operatingMode(true, true)).toBe("night");
    expect(operatingMode(false, true)).toBe("auto");
    expect(operatingMode(false, false)).toBe("manual");
  });

  test("flow follows the running fans", () => {
    expect(flowDirection(true, true)).toBe("balanced");
    expect(flowDirection(true, false)).toBe("inflow");
    expect(flowDirection(false, true)).toBe("outflow");
    expect(flowDirection(false, false)).toBe("off");
  });
});

describe("details", () => {
  test("decodes model and firmware", () => {
    const payload = pranaProfile.encodeDetails({ model: "PRANA-150", firmware: "1.05" });
    expect(payload.length).toBe(22);
    expect([...payload.slice(0, 4)]).toEqual([0, 0, 0, 0]);
    expect([...payload.slice(20)]).toEqual([0x00, 0x69]);
    expect(pranaProfile.decodeDetails(payload)).toEqual({ model: "PRANA-150", firmware: "1.05" });
  });

  test("rejects a short payload", () => {
    expect(() => pranaProfile.decodeDetails(new Uint8Array(21))).toThrow(
      new MalformedFrameError("Payload too short for firmware at offset 20")
    );
  });
});

describe("advertisements", () => {
  const ad = (localName: string | null, serviceUuids: string[] = []) => ({
    id: "aa:bb:cc:dd:ee:ff",
    localName,
    serviceUuids,
    rssi: -70,
  });

  test("match by name prefix", () => {
    expect(pranaProfile.matches(ad("PRNAQaq Kitchen"))).toBe(true);
    expect(pranaProfile.matches(ad("Kitchen PRNAQaq"))).toBe(false);
  });

  test("match by advertised service in any form", () => {
    expect(pranaProfile.matches(ad(null, ["baba"]))).toBe(true);
    expect(pranaProfile.matches(ad(null, ["0000BABA-0000-1000-8000-00805F9B34FB"]))).toBe(true);
    expect(pranaProfile.matches(ad(null, ["180f"]))).toBe(false);
  });

  test("display name drops the prefix", () => {
    expect(pranaProfile.displayName("PRNAQaq  Kitchen ")).toBe("Kitchen");
    expect(pranaProfile.displayName(null)).toBe("");
  });
});

describe("loadDeviceProfile", () => {
  test("rejects JSON that does not match the schema", () => {
    expect(() => loadDeviceProfile({ type: "prana" })).toThrow(/Device profile is invalid/);
  });

  test("rejects unknown field types", () => {
    const json = structuredClone(pranaJson);
    json.stateFields.push({ type: "float", location: { offset: 60 }, name: "extra" });
    expect(() => loadDeviceProfile(json)).toThrow(/Device profile is invalid/);
  });

  test("requires every state field", () => {
    const json = structuredClone(pranaJson);
    json.stateFields = json.stateFields.filter((field) => field.name !== "power");
    expect(() => loadDeviceProfile(json)).toThrow("Profile is missing field power");
  });

  test("checks field types", () => {
    const json = structuredClone(pranaJson);
    json.stateFields = json.stateFields.map((field) =>
      field.name === "power" ? { type: "uint8", location: field.location, name: "power" } : field
    );
    expect(() => loadDeviceProfile(json)).toThrow("Profile field power has unexpected type uint8");
  });

  test("sensors are optional", () => {
    const json = structuredClone(pranaJson);
    json.stateFields = json.stateFields.filter((field) => field.location.offset < 48);
    const profile = loadDeviceProfile(json);
    expect(profile.fullStateSize).toBe(43);
    expect(profile.decodeReadings(statePayload()).sensors).toEqual({});
  });
});
