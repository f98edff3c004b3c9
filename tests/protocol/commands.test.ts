import { describe, test, expect } from "vitest";
import {
  COMMAND_NAMES,
  ControlCommand,
  ReadDetails,
  ReadState,
  SetFanSpeed,
  createCommand,
  parseCommandFrame,
} from "../../src/protocol/commands.ts";
import { FrameKind, QueryCode } from "../../src/protocol/constants.ts";
import { encodeFrame, encodeResponseFrame } from "../../src/protocol/frame.ts";
import { pranaProfile } from "../../src/devices/index.ts";
import { InvalidCommandError, MalformedFrameError, UnexpectedCommandError } from "../../src/errors.ts";
import { DEFAULT_READINGS } from "../../src/testing/ventilator-memory.ts";

const bytes = (frame: Uint8Array) => [...frame];

describe("command frames", () => {
  test("ReadState", () => {
    expect(bytes(new ReadState().frame)).toEqual([0xbe, 0xef, 0x05, 0x01, 0x00, 0x00, 0x00, 0x00, 0x5a]);
  });

  test("ReadDetails", () => {
    expect(bytes(new ReadDetails().frame)).toEqual([0xbe, 0xef, 0x05, 0x02, 0x00, 0x00, 0x00, 0x00, 0x5a]);
  });

  test("speedUp", () => {
    expect(bytes(new ControlCommand("speedUp").frame)).toEqual([0xbe, 0xef, 0x04, 0x0c]);
  });

  test("SetFanSpeed carries the level as its only parameter", () => {
    const command = new SetFanSpeed(3);
    expect(bytes(command.frame)).toEqual([0xbe, 0xef, 0x04, 0x0a, 0x03]);
    expect(command.level).toBe(3);
    expect(command.name).toBe("setSpeed");
  });
});

describe("SetFanSpeed", () => {
  test.each([-1, 11, 2.5, Number.NaN])("rejects level %s", (level) => {
    expect(() => new SetFanSpeed(level)).toThrow(InvalidCommandError);
  });

  test("accepts the bounds", () => {
    expect(new SetFanSpeed(0).level).toBe(0);
    expect(new SetFanSpeed(10).level).toBe(10);
  });
});

describe("createCommand", () => {
  test("builds parameterless actions by name", () => {
    const command = createCommand("toggleWinterMode");
    expect(command).toBeInstanceOf(ControlCommand);
    expect(command.name).toBe("toggleWinterMode");
    expect(command.code).toBe(0x16);
  });

  test("requires a level for setSpeed", () => {
    expect(() => createCommand("setSpeed")).toThrow(new InvalidCommandError("setSpeed requires a level"));
  });

  test("builds setSpeed with a level", () => {
    const command = createCommand("setSpeed", { level: 7 });
    expect(command).toBeInstanceOf(SetFanSpeed);
    expect(bytes(command.parameters)).toEqual([7]);
  });

  test("rejects unknown names", () => {
    expect(() => createCommand("turbo")).toThrow(InvalidCommandError);
  });

  test("does not treat inherited properties as commands", () => {
    expect(() => createCommand("toString")).toThrow(InvalidCommandError);
  });
});

describe("parseCommandFrame", () => {
  test("rebuilds every named command from its frame", () => {
    for (const name of COMMAND_NAMES) {
      const command = createCommand(name, { level: 4 });
      const parsed = parseCommandFrame(command.frame);
      expect(parsed.name).toBe(name);
      expect(bytes(parsed.frame)).toEqual(bytes(command.frame));
    }
  });

  test("rebuilds queries", () => {
    expect(parseCommandFrame(new ReadState().frame)).toBeInstanceOf(ReadState);
    expect(parseCommandFrame(new ReadDetails().frame)).toBeInstanceOf(ReadDetails);
  });

  test("rejects queries with data in the padding", () => {
    const frame = encodeFrame(FrameKind.QUERY, QueryCode.READ_STATE);
    frame[4] = 1;
    expect(() => parseCommandFrame(frame)).toThrow(new MalformedFrameError("Query padding byte 4 is 0x01"));
  });

  test("rejects queries with any other terminator", () => {
    for (let value = 0; value <= 0xff; value++) {
      if (value === 0x5a) continue;
      const frame = encodeFrame(FrameKind.QUERY, QueryCode.READ_DETAILS);
      frame[8] = value;
      expect(() => parseCommandFrame(frame)).toThrow(MalformedFrameError);
    }
  });

  test("rejects truncated queries", () => {
    const frame = encodeFrame(FrameKind.QUERY, QueryCode.READ_STATE).slice(0, 8);
    expect(() => parseCommandFrame(frame)).toThrow(new MalformedFrameError("Query frame must be 9 bytes, got 8"));
  });

  test("rejects setSpeed with the wrong parameter count", () => {
    const frame = encodeFrame(FrameKind.COMMAND, 0x0a, Uint8Array.of(1, 2));
    expect(() => parseCommandFrame(frame)).toThrow("setSpeed takes 1 parameter, got 2");
  });

  test("rejects actions with parameters", () => {
    const frame = encodeFrame(FrameKind.COMMAND, 0x0c, Uint8Array.of(1));
    expect(() => parseCommandFrame(frame)).toThrow(new MalformedFrameError("speedUp takes no parameters"));
  });

  test("rejects unknown codes", () => {
    expect(() => parseCommandFrame(encodeFrame(FrameKind.COMMAND, 0x02))).toThrow(
      new InvalidCommandError("Unknown command 0x4/0x2")
    );
  });
});

describe("responses", () => {
  const payload = pranaProfile.encodeReadings(DEFAULT_READINGS).slice(0, pranaProfile.baseStateSize);

  test("state commands decode the state payload", () => {
    const command = new ControlCommand("speedUp");
    const response = encodeResponseFrame(FrameKind.COMMAND, 0x0c, payload);
    const readings = command.parseResponse(command.decodeResponse(response), pranaProfile);

    expect(readings).toEqual(DEFAULT_READINGS);
    expect(command.stateFrom(readings)).toBe(readings);
  });

  test("parsed readings are frozen", () => {
    const command = new ReadState();
    const response = encodeResponseFrame(FrameKind.QUERY, 0x01, pranaProfile.encodeReadings(DEFAULT_READINGS));
    const readings = command.parseResponse(command.decodeResponse(response), pranaProfile);

    expect(Object.isFrozen(readings)).toBe(true);
    expect(Object.isFrozen(readings.sensors)).toBe(true);
  });

  test("payload offsets count from the prefix", () => {
    const command = new ControlCommand("speedUp");
    const response = encodeResponseFrame(FrameKind.COMMAND, 0x0c, payload);
    const decoded = command.decodeResponse(response);

    expect(decoded.length).toBe(pranaProfile.baseStateSize);
    expect(bytes(decoded.slice(0, 4))).toEqual([0xbe, 0xef, 0x04, 0x0c]);
    expect(decoded[10]).toBe(1);
  });

  test("a response to another command is rejected", () => {
    const command = new ControlCommand("speedUp");
    const response = encodeResponseFrame(FrameKind.COMMAND, 0x0b, payload);
    expect(() => command.decodeResponse(response)).toThrow(UnexpectedCommandError);
  });

  test("only ReadState is answered from cache", () => {
    expect(new ReadState().answerFromCache(DEFAULT_READINGS)).toBe(DEFAULT_READINGS);
    expect(new ControlCommand("stop").answerFromCache(DEFAULT_READINGS)).toBeNull();
    expect(new ReadDetails().answerFromCache(DEFAULT_READINGS)).toBeNull();
  });

  test("details carry no state", () => {
    const command = new ReadDetails();
    const response = encodeResponseFrame(
      FrameKind.QUERY,
      0x02,
      pranaProfile.encodeDetails({ model: "PRANA-200G", firmware: "2.10" })
    );
    const details = command.parseResponse(command.decodeResponse(response), pranaProfile);

    expect(details).toEqual({ model: "PRANA-200G", firmware: "2.10" });
    expect(command.stateFrom(details)).toBeNull();
  });
});
