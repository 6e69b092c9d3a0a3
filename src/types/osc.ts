import type { Buffer } from 'node:buffer';

// Closed set of OSC 1.0 argument types; one variant per type tag.
export type OscIntArg = { type: 'int'; value: number };
export type OscFloatArg = { type: 'float'; value: number };
export type OscStringArg = { type: 'string'; value: string };
export type OscSymbolArg = { type: 'symbol'; value: string };
export type OscBlobArg = { type: 'blob'; value: Buffer };
export type OscInt64Arg = { type: 'int64'; value: bigint };
export type OscDoubleArg = { type: 'double'; value: number };
export type OscCharArg = { type: 'char'; value: string };
export type OscColorArg = { type: 'color'; value: Rgba };
export type OscMidiArg = {
  type: 'midi';
  value: { port: number; status: number; data1: number; data2: number };
};
export type OscTrueArg = { type: 'true' };
export type OscFalseArg = { type: 'false' };
export type OscNilArg = { type: 'nil' };
export type OscImpulseArg = { type: 'impulse' };

export type OscArgument =
  | OscIntArg
  | OscFloatArg
  | OscStringArg
  | OscSymbolArg
  | OscBlobArg
  | OscInt64Arg
  | OscDoubleArg
  | OscCharArg
  | OscColorArg
  | OscMidiArg
  | OscTrueArg
  | OscFalseArg
  | OscNilArg
  | OscImpulseArg;

export type OscArgumentType = OscArgument['type'];

export type OscMessage = {
  address: string;
  args: OscArgument[];
};

/** 8-bit per channel colour. */
export type Rgba = { r: number; g: number; b: number; a: number };

export type PacketSender = { address: string; port: number; family: string };

/** One datagram off the socket. */
export type RawPacket = {
  readonly data: Buffer;
  readonly sender: PacketSender;
};
