// ---------------------------------------------------------------------------
// Wire Codec – JSON envelopes, CRLF framing, sequence tokens
// ---------------------------------------------------------------------------
// TCP frames are one compact JSON object followed by CRLF; discovery
// datagrams carry the same envelope without the delimiter.
//
//   send:    {"cmd":0,"pv":0,"sn":"1636463553873","msg":{}}
//   receive: {"cmd":0,"pv":0,"sn":"1636463553873","msg":{"did":"...","pid":"..."},"res":0}
// ---------------------------------------------------------------------------

import { Value } from "@sinclair/typebox/value";
import { StringDecoder } from "node:string_decoder";
import { AsyncQueue } from "../infra/async-queue.js";
import {
  DeviceInfoSchema,
  QueryResponseSchema,
  ResponseEnvelopeSchema,
  type DeviceInfoMessage,
  type ResponseEnvelope,
} from "./schema.js";
import { Command, PROTOCOL_VERSION, type DatapointValues, type RequestEnvelope } from "./types.js";

export const FRAME_DELIMITER = "\r\n";

/** Longest undelimited run, in UTF-8 bytes, accepted before the stream is considered corrupt. */
export const MAX_FRAME_LENGTH = 64 * 1024;

export class ProtocolError extends Error {
  override name = "ProtocolError";
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function buildRequest(cmd: number, sn: string, payload: DatapointValues = {}): RequestEnvelope {
  switch (cmd) {
    case Command.Info:
      return { cmd: Command.Info, pv: PROTOCOL_VERSION, sn, msg: {} };
    case Command.Query:
      return { cmd: Command.Query, pv: PROTOCOL_VERSION, sn, msg: { attr: [0] } };
    case Command.Set:
      return {
        cmd: Command.Set,
        pv: PROTOCOL_VERSION,
        sn,
        msg: { attr: Object.keys(payload).map(Number), data: { ...payload } },
      };
    default:
      throw new ProtocolError(`unsupported command: ${cmd}`);
  }
}

export function encodeFrame(envelope: RequestEnvelope): Buffer {
  return Buffer.from(JSON.stringify(envelope) + FRAME_DELIMITER, "utf-8");
}

export function encodeDatagram(envelope: RequestEnvelope): Buffer {
  return Buffer.from(JSON.stringify(envelope), "utf-8");
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export function decodeFrame(line: string): ResponseEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new ProtocolError(`invalid JSON frame: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Value.Check(ResponseEnvelopeSchema, parsed)) {
    throw new ProtocolError("frame is not a response envelope");
  }
  return parsed;
}

export function parseInfoMessage(msg: unknown): DeviceInfoMessage | null {
  return Value.Check(DeviceInfoSchema, msg) ? msg : null;
}

/** Raw `msg.data` of a QUERY response, or null when the body has no data map. */
export function parseQueryData(msg: unknown): Record<string, unknown> | null {
  return Value.Check(QueryResponseSchema, msg) ? msg.data : null;
}

// ---------------------------------------------------------------------------
// Sequence tokens
// ---------------------------------------------------------------------------

/**
 * Millisecond-timestamp tokens. Two calls within the same millisecond (or a
 * clock stepping backwards) still yield strictly increasing values.
 */
export function createSequenceGenerator(nowMs: () => number = Date.now): () => string {
  let last = 0;
  return () => {
    const now = Math.floor(nowMs());
    last = now > last ? now : last + 1;
    return String(last);
  };
}

// ---------------------------------------------------------------------------
// FrameReader – CRLF splitter over a byte stream
// ---------------------------------------------------------------------------

export class FrameReader {
  private readonly decoder = new StringDecoder("utf8");
  private readonly frames = new AsyncQueue<string>();
  private pending = "";

  push(chunk: Buffer | string): void {
    this.pending += typeof chunk === "string" ? chunk : this.decoder.write(chunk);

    let idx = this.pending.indexOf(FRAME_DELIMITER);
    while (idx !== -1) {
      const line = this.pending.slice(0, idx).trim();
      this.pending = this.pending.slice(idx + FRAME_DELIMITER.length);
      if (line) {
        this.frames.push(line);
      }
      idx = this.pending.indexOf(FRAME_DELIMITER);
    }

    if (Buffer.byteLength(this.pending, "utf8") > MAX_FRAME_LENGTH) {
      this.pending = "";
      this.frames.fail(new ProtocolError(`frame exceeds ${MAX_FRAME_LENGTH} bytes without delimiter`));
    }
  }

  fail(err: Error): void {
    this.frames.fail(err);
  }

  /** Next complete frame, or `undefined` when none arrives within `timeoutMs`. */
  next(timeoutMs: number): Promise<string | undefined> {
    return this.frames.next(timeoutMs);
  }

  /** Drop complete frames nobody has read yet; returns how many were dropped. */
  discardBuffered(): number {
    return this.frames.drain().length;
  }
}
