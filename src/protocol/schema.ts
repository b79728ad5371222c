import { Type, type Static } from "@sinclair/typebox";

// Some firmware omits `cmd` in replies; correlation relies on `sn` alone.
export const ResponseEnvelopeSchema = Type.Object({
  cmd: Type.Optional(Type.Integer()),
  pv: Type.Optional(Type.Integer()),
  sn: Type.String(),
  msg: Type.Optional(Type.Unknown()),
  res: Type.Optional(Type.Integer()),
});

export type ResponseEnvelope = Static<typeof ResponseEnvelopeSchema>;

export const DeviceInfoSchema = Type.Object({
  did: Type.Optional(Type.String()),
  dtp: Type.Optional(Type.String()),
  pid: Type.Optional(Type.String()),
  mac: Type.Optional(Type.String()),
  ip: Type.Optional(Type.String()),
  rssi: Type.Optional(Type.Number()),
  sv: Type.Optional(Type.String()),
  hv: Type.Optional(Type.String()),
});

export type DeviceInfoMessage = Static<typeof DeviceInfoSchema>;

export const QueryResponseSchema = Type.Object({
  data: Type.Record(Type.String(), Type.Unknown()),
});
