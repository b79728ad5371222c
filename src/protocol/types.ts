// ---------------------------------------------------------------------------
// Wire protocol – Core Types
// ---------------------------------------------------------------------------

export const Command = {
  Info: 0,
  Query: 2,
  Set: 3,
} as const;

export type CommandCode = (typeof Command)[keyof typeof Command];

export const PROTOCOL_VERSION = 0;

/** TCP service port every device listens on. */
export const DEVICE_PORT = 5555;

/** UDP port devices answer INFO broadcasts on. */
export const DISCOVERY_PORT = 6095;

/** Datapoint id -> integer value, serialised with stringified ids. */
export type DatapointValues = Record<number, number>;

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type InfoRequestMessage = Record<string, never>;
export type QueryRequestMessage = { attr: [0] };
export type SetRequestMessage = { attr: number[]; data: DatapointValues };

type Envelope<C extends CommandCode, M> = {
  cmd: C;
  pv: typeof PROTOCOL_VERSION;
  sn: string;
  msg: M;
};

export type RequestEnvelope =
  | Envelope<typeof Command.Info, InfoRequestMessage>
  | Envelope<typeof Command.Query, QueryRequestMessage>
  | Envelope<typeof Command.Set, SetRequestMessage>;
