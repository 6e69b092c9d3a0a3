import { describe, it, expect } from 'vitest';
import { mapMessage } from '../gateway/FieldMapper.js';
import { decodeOscPacket } from '../gateway/OscDecoder.js';
import type { OscArgument, Rgba } from '../types/osc.js';
import { encodeMessage, type EncodableArg } from './helpers/osc.js';

const msg = (address: string, ...args: OscArgument[]) => ({ address, args });
const str = (value: string): OscArgument => ({ type: 'string', value });
const int = (value: number): OscArgument => ({ type: 'int', value });
const float = (value: number): OscArgument => ({ type: 'float', value });

describe('mapMessage', () => {
  describe('/cue and /description', () => {
    it('maps a single string', () => {
      expect(mapMessage(msg('/cue', str('12.5')))).toEqual({ field: 'cue', value: '12.5' });
      expect(mapMessage(msg('/description', str('House to half')))).toEqual({
        field: 'description',
        value: 'House to half',
      });
    });

    it('accepts a symbol argument', () => {
      expect(mapMessage(msg('/cue', { type: 'symbol', value: 'Q7' }))).toEqual({ field: 'cue', value: 'Q7' });
    });

    it('keeps an empty string', () => {
      expect(mapMessage(msg('/cue', str('')))).toEqual({ field: 'cue', value: '' });
    });

    it('ignores the wrong type or arity', () => {
      expect(mapMessage(msg('/cue', int(12)))).toBeUndefined();
      expect(mapMessage(msg('/cue'))).toBeUndefined();
      expect(mapMessage(msg('/cue', str('a'), str('b')))).toBeUndefined();
      expect(mapMessage(msg('/description', { type: 'nil' }))).toBeUndefined();
    });
  });

  it('ignores unrecognised addresses', () => {
    expect(mapMessage(msg('/unrelated', str('x')))).toBeUndefined();
    expect(mapMessage(msg('/CUE', str('x')))).toBeUndefined();
    expect(mapMessage(msg('/cue/', str('x')))).toBeUndefined();
    expect(mapMessage(msg('/cue/1', str('x')))).toBeUndefined();
  });

  describe('/color', () => {
    it('maps an RGBA colour argument', () => {
      expect(mapMessage(msg('/color', { type: 'color', value: { r: 10, g: 20, b: 30, a: 40 } }))).toEqual({
        field: 'color',
        value: { r: 10, g: 20, b: 30, a: 40 },
      });
    });

    it('unpacks a single int as 0xRRGGBBAA', () => {
      expect(mapMessage(msg('/color', int(0xff8800ff | 0)))).toEqual({
        field: 'color',
        value: { r: 255, g: 136, b: 0, a: 255 },
      });
      expect(mapMessage(msg('/color', int(0x11223344)))).toEqual({
        field: 'color',
        value: { r: 0x11, g: 0x22, b: 0x33, a: 0x44 },
      });
    });

    it('parses hex strings', () => {
      expect(mapMessage(msg('/color', str('#FF8800')))).toEqual({
        field: 'color',
        value: { r: 255, g: 136, b: 0, a: 255 },
      });
      expect(mapMessage(msg('/color', str('#ff880080')))).toEqual({
        field: 'color',
        value: { r: 255, g: 136, b: 0, a: 128 },
      });
    });

    it('maps three or four int components', () => {
      expect(mapMessage(msg('/color', int(255), int(128), int(0)))).toEqual({
        field: 'color',
        value: { r: 255, g: 128, b: 0, a: 255 },
      });
      expect(mapMessage(msg('/color', int(1), int(2), int(3), int(4)))).toEqual({
        field: 'color',
        value: { r: 1, g: 2, b: 3, a: 4 },
      });
    });

    it('scales three or four float components', () => {
      expect(mapMessage(msg('/color', float(1), float(0.5), float(0)))).toEqual({
        field: 'color',
        value: { r: 255, g: 128, b: 0, a: 255 },
      });
      expect(mapMessage(msg('/color', float(0), float(0), float(1), float(0.2)))).toEqual({
        field: 'color',
        value: { r: 0, g: 0, b: 255, a: 51 },
      });
    });

    it('treats short, long, mixed or out-of-range lists as a miss', () => {
      expect(mapMessage(msg('/color'))).toBeUndefined();
      expect(mapMessage(msg('/color', int(1), int(2)))).toBeUndefined();
      expect(mapMessage(msg('/color', int(1), int(2), int(3), int(4), int(5)))).toBeUndefined();
      expect(mapMessage(msg('/color', int(255), float(0.5), int(0)))).toBeUndefined();
      expect(mapMessage(msg('/color', int(300), int(0), int(0)))).toBeUndefined();
      expect(mapMessage(msg('/color', float(1.5), float(0), float(0)))).toBeUndefined();
      expect(mapMessage(msg('/color', str('red')))).toBeUndefined();
      expect(mapMessage(msg('/color', str('#FFF')))).toBeUndefined();
    });
  });

  describe('colour round trip through the wire format', () => {
    const samples: Rgba[] = [
      { r: 0, g: 0, b: 0, a: 255 },
      { r: 255, g: 136, b: 0, a: 255 },
      { r: 12, g: 200, b: 99, a: 7 },
    ];

    const roundTrip = (args: EncodableArg[]) => {
      const decoded = decodeOscPacket(encodeMessage('/color', args));
      if (!decoded.ok) throw decoded.error;
      return mapMessage(decoded.message);
    };

    it.each(samples)('recovers %o from every accepted shape', (c) => {
      const expected = { field: 'color', value: c };
      const packed = ((c.r << 24) | (c.g << 16) | (c.b << 8) | c.a) | 0;
      expect(roundTrip([{ tag: 'r', value: [c.r, c.g, c.b, c.a] }])).toEqual(expected);
      expect(roundTrip([{ tag: 'i', value: packed }])).toEqual(expected);
      expect(
        roundTrip([
          { tag: 'i', value: c.r },
          { tag: 'i', value: c.g },
          { tag: 'i', value: c.b },
          { tag: 'i', value: c.a },
        ]),
      ).toEqual(expected);
      expect(
        roundTrip([
          { tag: 'f', value: c.r / 255 },
          { tag: 'f', value: c.g / 255 },
          { tag: 'f', value: c.b / 255 },
          { tag: 'f', value: c.a / 255 },
        ]),
      ).toEqual(expected);
    });
  });
});
