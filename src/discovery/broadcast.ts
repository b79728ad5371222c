// ---------------------------------------------------------------------------
// Broadcast probe – INFO datagram to the LAN, collect who answers
// ---------------------------------------------------------------------------

import { createSocket, type RemoteInfo, type Socket } from "node:dgram";
import { setTimeout as sleep } from "node:timers/promises";
import { AsyncQueue } from "../infra/async-queue.js";
import type { LogFns } from "../logging.js";
import { buildRequest, createSequenceGenerator, encodeDatagram } from "../protocol/codec.js";
import { Command } from "../protocol/types.js";
import type { BroadcastOptions } from "./types.js";

const nextSn = createSequenceGenerator();

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function bindSocket(socket: Socket): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    socket.once("error", onError);
    socket.bind(0, () => {
      socket.off("error", onError);
      resolve();
    });
  });
}

function sendDatagram(socket: Socket, data: Buffer, port: number, address: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(data, port, address, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Send the INFO datagram a few times and return the distinct source
 * addresses of the replies. No reply at all is an empty list, not an error.
 */
export async function broadcastProbe(
  options: BroadcastOptions,
  log: LogFns,
  signal?: AbortSignal,
): Promise<string[]> {
  const found = new Set<string>();
  if (signal?.aborted) {
    return [];
  }

  const socket = createSocket({ type: "udp4", reuseAddr: true });
  const replies = new AsyncQueue<RemoteInfo>();
  let closed = false;

  const close = () => {
    if (!closed) {
      closed = true;
      socket.close();
    }
  };
  const onAbort = () => {
    replies.fail(new Error("broadcast probe aborted"));
    close();
  };

  socket.on("message", (_msg: Buffer, rinfo: RemoteInfo) => replies.push(rinfo));
  socket.on("error", (err) => replies.fail(err));
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    await bindSocket(socket);
    socket.setBroadcast(true);

    const datagram = encodeDatagram(buildRequest(Command.Info, nextSn()));
    for (let i = 0; i < options.sendCount; i++) {
      if (i > 0) {
        await sleep(options.sendIntervalMs, undefined, { signal });
      }
      await sendDatagram(socket, datagram, options.broadcastPort, options.broadcastAddress);
    }

    let first: RemoteInfo | undefined;
    for (let attempt = 0; attempt < options.firstReplyAttempts && !first; attempt++) {
      first = await replies.next(options.receiveTimeoutMs);
    }
    if (!first) {
      log.debug(`no broadcast replies on ${options.broadcastAddress}:${options.broadcastPort}`);
      return [];
    }

    found.add(first.address);
    while (found.size < options.maxReplies) {
      const next = await replies.next(options.receiveTimeoutMs);
      if (!next) {
        break;
      }
      found.add(next.address);
    }
  } catch (err) {
    if (signal?.aborted) {
      log.debug("broadcast probe aborted");
    } else {
      log.warn(`broadcast probe failed: ${errorMessage(err)}`);
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    close();
  }

  log.debug(`broadcast probe found ${found.size} device(s)`);
  return [...found];
}
