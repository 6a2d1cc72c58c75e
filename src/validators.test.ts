import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors";
import {
  IrSignalBody,
  ReadingItem,
  ReadingsQuery,
  RegisterSensorBody,
  RoomScopeBody,
  RoomSettingsBody,
  parseOrThrow,
} from "./validators";

function issuePaths(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError && Array.isArray(err.details)) {
      return err.details.map((d: { path: string }) => d.path);
    }
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("parseOrThrow", () => {
  it("should return parsed data with defaults applied", () => {
    expect(parseOrThrow(ReadingsQuery, {})).toEqual({ limit: 100 });
    expect(parseOrThrow(ReadingsQuery, { limit: "25" })).toEqual({ limit: 25 });
    expect(parseOrThrow(RoomScopeBody, undefined)).toEqual({});
  });

  it("should report every failing field", () => {
    const paths = issuePaths(() => parseOrThrow(RegisterSensorBody, { room_id: "room-1", device_id: "  ", name: "Rack 4" }));

    expect(paths).toEqual(["room_id", "device_id"]);
  });

  it("should carry a validation_error code", () => {
    expect(() => parseOrThrow(ReadingsQuery, { limit: "5000" })).toThrow(ValidationError);
    expect(new ValidationError("bad")).toMatchObject({ status: 400, code: "validation_error" });
  });
});

describe("ReadingItem", () => {
  it("should turn an offset timestamp into a Date", () => {
    const item = parseOrThrow(ReadingItem, {
      device_id: "AA:BB:CC:00:00:01",
      temperature: 23.5,
      timestamp: "2026-03-02T14:00:00+02:00",
    });

    expect(item.timestamp?.toISOString()).toBe("2026-03-02T12:00:00.000Z");
  });

  it("should reject a timestamp without a zone", () => {
    expect(issuePaths(() => parseOrThrow(ReadingItem, { device_id: "x", timestamp: "2026-03-02T12:00:00" }))).toEqual([
      "timestamp",
    ]);
  });

  it("should reject a non-numeric temperature", () => {
    expect(issuePaths(() => parseOrThrow(ReadingItem, { device_id: "x", temperature: "hot" }))).toEqual(["temperature"]);
  });
});

describe("RoomSettingsBody", () => {
  it("should require at least one setting", () => {
    expect(() => parseOrThrow(RoomSettingsBody, {})).toThrow("At least one setting is required");
  });

  it("should bound the target temperature", () => {
    expect(issuePaths(() => parseOrThrow(RoomSettingsBody, { target_temperature: 31 }))).toEqual(["target_temperature"]);
    expect(parseOrThrow(RoomSettingsBody, { operation_mode: "manual" })).toEqual({ operation_mode: "manual" });
  });
});

describe("IrSignalBody", () => {
  it("should require a raw signal for a successful capture", () => {
    expect(issuePaths(() => parseOrThrow(IrSignalBody, { command_type: "power_on" }))).toEqual(["raw_signal"]);
  });

  it("should accept a failed capture without a signal", () => {
    expect(parseOrThrow(IrSignalBody, { command_type: "power_on", success: false, message: "no frame" })).toEqual({
      command_type: "power_on",
      raw_signal: "",
      protocol: "",
      success: false,
      message: "no frame",
    });
  });
});
