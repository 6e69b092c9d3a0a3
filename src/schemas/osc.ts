import { z } from 'zod';
import type { Rgba } from '../types/osc.js';

// Argument-shape schemas for the recognised addresses. Input is the decoded
// OscArgument list; anything that does not parse is a mapping miss.

const TextArg = z.object({ type: z.enum(['string', 'symbol']), value: z.string() });

const Byte = z.number().int().min(0).max(255);

export const CueArgsSchema = z.tuple([TextArg]).transform(([arg]) => arg.value);

export const DescriptionArgsSchema = z.tuple([TextArg]).transform(([arg]) => arg.value);

/** 0xRRGGBBAA carried in a signed int32. */
export function unpackRgba(packed: number): Rgba {
  const v = packed >>> 0;
  return { r: (v >>> 24) & 0xff, g: (v >>> 16) & 0xff, b: (v >>> 8) & 0xff, a: v & 0xff };
}

export function parseHexColor(hex: string): Rgba {
  const digits = hex.slice(1);
  const channel = (i: number): number => Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  return { r: channel(0), g: channel(1), b: channel(2), a: digits.length === 8 ? channel(3) : 255 };
}

function fromComponents(values: number[]): Rgba {
  const [r = 0, g = 0, b = 0, a = 255] = values;
  return { r, g, b, a };
}

const RgbaArgSchema = z
  .tuple([z.object({ type: z.literal('color'), value: z.object({ r: Byte, g: Byte, b: Byte, a: Byte }) })])
  .transform(([arg]): Rgba => ({ ...arg.value }));

const PackedArgSchema = z
  .tuple([z.object({ type: z.literal('int'), value: z.number().int() })])
  .transform(([arg]) => unpackRgba(arg.value));

const HexArgSchema = z
  .tuple([
    z.object({
      type: z.enum(['string', 'symbol']),
      value: z.string().regex(/^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/),
    }),
  ])
  .transform(([arg]) => parseHexColor(arg.value));

// r, g, b[, a] as ints 0..255
const IntComponentsSchema = z
  .array(z.object({ type: z.literal('int'), value: Byte }))
  .min(3)
  .max(4)
  .transform((args) => fromComponents(args.map((a) => a.value)));

// r, g, b[, a] as floats 0..1
const FloatComponentsSchema = z
  .array(z.object({ type: z.literal('float'), value: z.number().min(0).max(1) }))
  .min(3)
  .max(4)
  .transform((args) => fromComponents(args.map((a) => Math.round(a.value * 255))));

export const ColorArgsSchema = z.union([
  RgbaArgSchema,
  PackedArgSchema,
  HexArgSchema,
  IntComponentsSchema,
  FloatComponentsSchema,
]);
