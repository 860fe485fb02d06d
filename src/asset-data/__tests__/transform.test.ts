/**
 * Asset-Data Module - Transform Tests
 *
 * Unit tests for topic classification and payload parsing.
 */
import { describe, expect, it } from "vitest";

import {
  classifyTopic,
  commandResultTopic,
  dataTopic,
  encodeCommandResult,
  encodeRecord,
  encodeValue,
  parseCommandRequest,
  parseJsonPayload,
  parseWriteValue,
} from "../transform.js";

const ROOT = "fleet/truck-01";

// =============================================================================
// Topics
// =============================================================================

describe("topic builders", () => {
  it("places pushed values under the data channel", () => {
    expect(dataTopic(ROOT, "truck.var.temp.current")).toBe(
      "fleet/truck-01/data/truck.var.temp.current",
    );
  });

  it("places command results under the command-result channel", () => {
    expect(commandResultTopic(ROOT, "truck.cmd.startFan")).toBe(
      "fleet/truck-01/command-result/truck.cmd.startFan",
    );
  });
});

describe("classifyTopic", () => {
  it("recognises setting writes", () => {
    expect(
      classifyTopic(ROOT, "fleet/truck-01/write/truck.set.temp.target"),
    ).toEqual({ type: "write", path: "truck.set.temp.target" });
  });

  it("recognises command invocations", () => {
    expect(
      classifyTopic(ROOT, "fleet/truck-01/command/truck.cmd.openDoor"),
    ).toEqual({ type: "command", path: "truck.cmd.openDoor" });
  });

  it("rejects topics for another device", () => {
    expect(
      classifyTopic(ROOT, "fleet/truck-02/write/truck.set.temp.target"),
    ).toEqual({ type: "unknown" });
  });

  it("rejects unknown channels", () => {
    expect(
      classifyTopic(ROOT, "fleet/truck-01/data/truck.var.temp.current"),
    ).toEqual({ type: "unknown" });
  });

  it("rejects extra topic levels", () => {
    expect(
      classifyTopic(ROOT, "fleet/truck-01/write/truck.set.temp.target/extra"),
    ).toEqual({ type: "unknown" });
  });

  it("rejects a channel without a path", () => {
    expect(classifyTopic(ROOT, "fleet/truck-01/write")).toEqual({
      type: "unknown",
    });
  });
});

// =============================================================================
// Inbound Payloads
// =============================================================================

describe("parseJsonPayload", () => {
  it("parses Buffer payloads", () => {
    expect(parseJsonPayload(Buffer.from('{"value":3}'))).toEqual({ value: 3 });
  });

  it("returns undefined for invalid JSON", () => {
    expect(parseJsonPayload("not json")).toBeUndefined();
  });

  it("returns undefined for non-text payloads", () => {
    expect(parseJsonPayload(42)).toBeUndefined();
  });
});

describe("parseWriteValue", () => {
  it("unwraps an object payload", () => {
    expect(parseWriteValue(JSON.stringify({ value: 3.5 }))).toBe(3.5);
  });

  it("accepts a bare scalar", () => {
    expect(parseWriteValue("10")).toBe(10);
    expect(parseWriteValue('"green"')).toBe("green");
  });

  it("returns null for objects without a value", () => {
    expect(parseWriteValue(JSON.stringify({ other: 1 }))).toBeNull();
  });

  it("returns null for arrays", () => {
    expect(parseWriteValue("[1,2]")).toBeNull();
  });

  it("returns null for invalid JSON", () => {
    expect(parseWriteValue("ten")).toBeNull();
  });
});

describe("parseCommandRequest", () => {
  const now = 1704067200000;

  it("treats an empty payload as an anonymous invocation", () => {
    expect(
      parseCommandRequest("truck.cmd.stopFan", Buffer.from(""), now),
    ).toEqual({ path: "truck.cmd.stopFan", requestId: null, receivedAt: now });
  });

  it("keeps the request id", () => {
    expect(
      parseCommandRequest(
        "truck.cmd.stopFan",
        JSON.stringify({ requestId: "req-7" }),
        now,
      ),
    ).toEqual({ path: "truck.cmd.stopFan", requestId: "req-7", receivedAt: now });
  });

  it("returns null for malformed payloads", () => {
    expect(parseCommandRequest("truck.cmd.stopFan", "{", now)).toBeNull();
    expect(
      parseCommandRequest(
        "truck.cmd.stopFan",
        JSON.stringify({ requestId: 5 }),
        now,
      ),
    ).toBeNull();
  });
});

// =============================================================================
// Outbound Payloads
// =============================================================================

describe("encoders", () => {
  it("encodes a pushed value with its timestamp", () => {
    expect(encodeValue(true, 1000)).toBe('{"value":true,"timestamp":1000}');
  });

  it("encodes a record as a sample list", () => {
    expect(
      encodeRecord([{ path: "truck.var.temp.current", value: 4.8, timestamp: 1 }]),
    ).toBe('{"samples":[{"path":"truck.var.temp.current","value":4.8,"timestamp":1}]}');
  });

  it("encodes a command result", () => {
    expect(
      encodeCommandResult(
        { path: "truck.cmd.openDoor", requestId: "abc", receivedAt: 0 },
        "OK",
      ),
    ).toBe('{"requestId":"abc","status":"OK"}');
  });
});
