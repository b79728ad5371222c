import { describe, expect, it } from "vitest";
import {
  buildRequest,
  createSequenceGenerator,
  decodeFrame,
  encodeDatagram,
  encodeFrame,
  FrameReader,
  MAX_FRAME_LENGTH,
  parseInfoMessage,
  parseQueryData,
  ProtocolError,
} from "./codec.js";
import { Command } from "./types.js";

describe("buildRequest", () => {
  it("builds an INFO request with an empty body", () => {
    expect(buildRequest(Command.Info, "1636463553873")).toEqual({
      cmd: 0,
      pv: 0,
      sn: "1636463553873",
      msg: {},
    });
  });

  it("builds a QUERY request asking for every attribute", () => {
    expect(buildRequest(Command.Query, "42")).toEqual({ cmd: 2, pv: 0, sn: "42", msg: { attr: [0] } });
  });

  it("builds a SET request listing the written datapoints", () => {
    expect(buildRequest(Command.Set, "43", { 1: 255, 4: 500 })).toEqual({
      cmd: 3,
      pv: 0,
      sn: "43",
      msg: { attr: [1, 4], data: { 1: 255, 4: 500 } },
    });
  });

  it("rejects an unknown command code", () => {
    expect(() => buildRequest(7, "1")).toThrow(new ProtocolError("unsupported command: 7"));
  });
});

describe("encodeFrame / encodeDatagram", () => {
  it("terminates TCP frames with CRLF", () => {
    const frame = encodeFrame(buildRequest(Command.Info, "100"));
    expect(frame.toString("utf-8")).toBe('{"cmd":0,"pv":0,"sn":"100","msg":{}}\r\n');
  });

  it("stringifies datapoint ids in SET bodies", () => {
    const frame = encodeFrame(buildRequest(Command.Set, "101", { 1: 0 }));
    expect(frame.toString("utf-8")).toBe('{"cmd":3,"pv":0,"sn":"101","msg":{"attr":[1],"data":{"1":0}}}\r\n');
  });

  it("leaves datagrams undelimited", () => {
    const datagram = encodeDatagram(buildRequest(Command.Info, "102"));
    expect(datagram.toString("utf-8")).toBe('{"cmd":0,"pv":0,"sn":"102","msg":{}}');
  });
});

describe("decodeFrame", () => {
  it("decodes a full response envelope", () => {
    const line = '{"cmd":0,"pv":0,"sn":"100","msg":{"did":"abc","pid":"e2s64v"},"res":0}';
    expect(decodeFrame(line)).toEqual({
      cmd: 0,
      pv: 0,
      sn: "100",
      msg: { did: "abc", pid: "e2s64v" },
      res: 0,
    });
  });

  it("accepts a response without cmd", () => {
    expect(decodeFrame('{"sn":"100","msg":{"data":{"1":255}}}')).toEqual({
      sn: "100",
      msg: { data: { "1": 255 } },
    });
  });

  it("rejects malformed JSON", () => {
    expect(() => decodeFrame("{not json")).toThrow(ProtocolError);
  });

  it("rejects JSON without an sn", () => {
    expect(() => decodeFrame('{"cmd":0,"msg":{}}')).toThrow("frame is not a response envelope");
  });

  it("rejects a non-object frame", () => {
    expect(() => decodeFrame("[1,2,3]")).toThrow("frame is not a response envelope");
  });
});

describe("message parsers", () => {
  it("reads INFO fields", () => {
    expect(parseInfoMessage({ did: "abc", pid: "e2s64v", sv: "1.2.0", rssi: -51 })).toEqual({
      did: "abc",
      pid: "e2s64v",
      sv: "1.2.0",
      rssi: -51,
    });
  });

  it("returns null for an INFO body with mistyped fields", () => {
    expect(parseInfoMessage({ did: 12 })).toBeNull();
    expect(parseInfoMessage(undefined)).toBeNull();
  });

  it("returns the raw data map of a QUERY body", () => {
    expect(parseQueryData({ data: { "1": 255, "4": "x" } })).toEqual({ "1": 255, "4": "x" });
  });

  it("returns null when a QUERY body has no data map", () => {
    expect(parseQueryData({ attr: [0] })).toBeNull();
    expect(parseQueryData({ data: [1, 2] })).toBeNull();
  });
});

describe("createSequenceGenerator", () => {
  it("uses the millisecond clock", () => {
    const next = createSequenceGenerator(() => 1636463553873);
    expect(next()).toBe("1636463553873");
  });

  it("stays strictly increasing within one millisecond", () => {
    const next = createSequenceGenerator(() => 1000);
    expect([next(), next(), next()]).toEqual(["1000", "1001", "1002"]);
  });

  it("stays strictly increasing when the clock steps back", () => {
    const times = [5000, 4000, 5001];
    const next = createSequenceGenerator(() => times.shift() ?? 0);
    expect([next(), next(), next()]).toEqual(["5000", "5001", "5002"]);
  });
});

describe("FrameReader", () => {
  it("splits frames across chunk boundaries", async () => {
    const reader = new FrameReader();
    reader.push(Buffer.from('{"sn":"1"}\r\n{"sn'));
    reader.push(Buffer.from('":"2"}\r\n'));

    expect(await reader.next(10)).toBe('{"sn":"1"}');
    expect(await reader.next(10)).toBe('{"sn":"2"}');
  });

  it("skips blank lines", async () => {
    const reader = new FrameReader();
    reader.push("\r\n  \r\n{}\r\n");

    expect(await reader.next(10)).toBe("{}");
    expect(await reader.next(10)).toBeUndefined();
  });

  it("reassembles multi-byte characters split between chunks", async () => {
    const reader = new FrameReader();
    const bytes = Buffer.from('{"name":"Küche"}\r\n', "utf-8");
    const split = bytes.indexOf(0xc3) + 1;
    reader.push(bytes.subarray(0, split));
    reader.push(bytes.subarray(split));

    expect(await reader.next(10)).toBe('{"name":"Küche"}');
  });

  it("resolves undefined when no frame arrives in time", async () => {
    const reader = new FrameReader();
    expect(await reader.next(5)).toBeUndefined();
  });

  it("fails once an undelimited run exceeds the frame limit", async () => {
    const reader = new FrameReader();
    reader.push("x".repeat(MAX_FRAME_LENGTH + 1));

    await expect(reader.next(10)).rejects.toThrow(ProtocolError);
  });

  it("measures the frame limit in bytes", async () => {
    const reader = new FrameReader();
    // 3 bytes per character in UTF-8, one code unit in the string
    reader.push("\u20ac".repeat(Math.floor(MAX_FRAME_LENGTH / 3) + 1));

    await expect(reader.next(10)).rejects.toThrow(`frame exceeds ${MAX_FRAME_LENGTH} bytes without delimiter`);
  });

  it("drops buffered frames on request", async () => {
    const reader = new FrameReader();
    reader.push("a\r\nb\r\n");

    expect(reader.discardBuffered()).toBe(2);
    expect(await reader.next(5)).toBeUndefined();
  });
});
