import { Buffer } from 'node:buffer';
import { DecodeError } from '../errors.js';
import type { OscArgument, OscMessage } from '../types/osc.js';

/**
 * OSC 1.0 binary decoding for single messages.
 *
 *   address    NUL-terminated, NUL-padded to a multiple of 4 bytes
 *   type tags  "," + one char per argument, padded the same way
 *   arguments  big-endian, each 4-byte aligned
 *
 * Bundles, timetags and arrays are recognised and rejected as unsupported;
 * anything structurally wrong is malformed.
 */

export type DecodeResult = { ok: true; message: OscMessage } | { ok: false; error: DecodeError };

const BUNDLE_PREFIX = Buffer.from('#bundle\0', 'latin1');

const malformed = (message: string, offset: number): DecodeError =>
  new DecodeError('malformed', message, offset);

const unsupported = (message: string, offset: number): DecodeError =>
  new DecodeError('unsupported', message, offset);

const pad4 = (n: number): number => Math.ceil(n / 4) * 4;

class PacketReader {
  public offset = 0;

  constructor(private readonly buf: Buffer) {}

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  /** Reserve `width` bytes and return where they start. */
  take(width: number, what: string): number {
    if (width < 0 || this.remaining < width) {
      throw malformed(`truncated ${what}: need ${width} bytes, have ${this.remaining}`, this.offset);
    }
    const at = this.offset;
    this.offset += width;
    return at;
  }

  string(what: string): string {
    const start = this.offset;
    const nul = this.buf.indexOf(0, start);
    if (nul < 0) throw malformed(`unterminated ${what}`, start);
    // length is a multiple of 4, so the padded end never runs past it
    const end = pad4(nul + 1);
    this.zeroPadding(nul + 1, end, what);
    this.offset = end;
    return this.buf.toString('utf8', start, nul);
  }

  blob(): Buffer {
    const size = this.buf.readInt32BE(this.take(4, 'blob size'));
    if (size < 0) throw malformed(`negative blob size ${size}`, this.offset - 4);
    if (size > this.remaining) {
      throw malformed(`truncated blob: need ${size} bytes, have ${this.remaining}`, this.offset);
    }
    const start = this.take(pad4(size), 'blob');
    this.zeroPadding(start + size, start + pad4(size), 'blob');
    // copy so the socket's buffer is not retained
    return Buffer.from(this.buf.subarray(start, start + size));
  }

  int32(what: string): number {
    return this.buf.readInt32BE(this.take(4, what));
  }

  bytes4(what: string): [number, number, number, number] {
    const at = this.take(4, what);
    return [this.byte(at), this.byte(at + 1), this.byte(at + 2), this.byte(at + 3)];
  }

  float32(): number {
    return this.buf.readFloatBE(this.take(4, 'float argument'));
  }

  int64(): bigint {
    return this.buf.readBigInt64BE(this.take(8, 'int64 argument'));
  }

  float64(): number {
    return this.buf.readDoubleBE(this.take(8, 'double argument'));
  }

  private byte(at: number): number {
    return this.buf.readUInt8(at);
  }

  private zeroPadding(from: number, to: number, what: string): void {
    for (let i = from; i < to; i++) {
      if (this.buf[i] !== 0) throw malformed(`non-zero padding after ${what}`, i);
    }
  }
}

function readArgument(reader: PacketReader, tag: string): OscArgument {
  switch (tag) {
    case 'i':
      return { type: 'int', value: reader.int32('int argument') };
    case 'f':
      return { type: 'float', value: reader.float32() };
    case 's':
      return { type: 'string', value: reader.string('string argument') };
    case 'S':
      return { type: 'symbol', value: reader.string('symbol argument') };
    case 'b':
      return { type: 'blob', value: reader.blob() };
    case 'h':
      return { type: 'int64', value: reader.int64() };
    case 'd':
      return { type: 'double', value: reader.float64() };
    case 'c':
      return { type: 'char', value: String.fromCharCode(reader.int32('char argument')) };
    case 'r': {
      const [r, g, b, a] = reader.bytes4('color argument');
      return { type: 'color', value: { r, g, b, a } };
    }
    case 'm': {
      const [port, status, data1, data2] = reader.bytes4('midi argument');
      return { type: 'midi', value: { port, status, data1, data2 } };
    }
    case 'T':
      return { type: 'true' };
    case 'F':
      return { type: 'false' };
    case 'N':
      return { type: 'nil' };
    case 'I':
      return { type: 'impulse' };
    case 't':
      throw unsupported('timetag arguments are not supported', reader.offset);
    case '[':
    case ']':
      throw unsupported('array arguments are not supported', reader.offset);
    default:
      throw malformed(`unknown type tag '${tag}'`, reader.offset);
  }
}

function decodeMessage(buf: Buffer): OscMessage {
  if (buf.length === 0) throw malformed('empty packet', 0);
  if (buf.subarray(0, BUNDLE_PREFIX.length).equals(BUNDLE_PREFIX)) {
    throw unsupported('OSC bundles are not supported', 0);
  }
  if (buf.length % 4 !== 0) {
    throw malformed(`packet length ${buf.length} is not a multiple of 4`, buf.length);
  }
  if (buf[0] !== 0x2f) throw malformed("address must start with '/'", 0);

  const reader = new PacketReader(buf);
  const address = reader.string('address');
  if (reader.remaining === 0) throw malformed('missing type tag string', reader.offset);
  if (buf[reader.offset] !== 0x2c) throw malformed("type tag string must start with ','", reader.offset);
  const tags = reader.string('type tag string').slice(1);

  const args: OscArgument[] = [];
  for (const tag of tags) {
    args.push(readArgument(reader, tag));
  }
  if (reader.remaining > 0) {
    throw malformed(`${reader.remaining} trailing bytes after last argument`, reader.offset);
  }
  return { address, args };
}

/** Decode one datagram. Never throws for bad input. */
export function decodeOscPacket(bytes: Uint8Array): DecodeResult {
  const buf = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  try {
    return { ok: true, message: decodeMessage(buf) };
  } catch (e) {
    if (e instanceof DecodeError) return { ok: false, error: e };
    throw e;
  }
}

/** Short human-readable form of an argument, for logs. */
export function describeArgument(arg: OscArgument): string {
  switch (arg.type) {
    case 'int':
    case 'float':
    case 'double':
      return String(arg.value);
    case 'int64':
      return `${arg.value}n`;
    case 'string':
    case 'symbol':
    case 'char':
      return JSON.stringify(arg.value);
    case 'blob':
      return `<blob ${arg.value.length}B>`;
    case 'color':
      return `rgba(${arg.value.r},${arg.value.g},${arg.value.b},${arg.value.a})`;
    case 'midi':
      return `midi(${arg.value.port},${arg.value.status},${arg.value.data1},${arg.value.data2})`;
    case 'true':
    case 'false':
    case 'nil':
    case 'impulse':
      return arg.type;
    default: {
      const unreachable: never = arg;
      return String(unreachable);
    }
  }
}
