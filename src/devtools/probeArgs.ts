import { ADDR } from '../gateway/addresses.js';

export type ColorPayload =
  | { kind: 'hex'; hex: string }
  | { kind: 'ints'; values: number[] }
  | { kind: 'floats'; values: number[] }
  | { kind: 'packed'; value: number };

export type Command =
  | { kind: 'help' }
  | { kind: 'osc:text'; address: string; text: string }
  | { kind: 'osc:color'; color: ColorPayload }
  // Generic OSC send/listen
  | { kind: 'osc:send'; address: string; text?: string; floats?: number[]; ints?: number[] }
  | { kind: 'osc:listen'; host: string; port: number; durationMs?: number };

const parseCsv = (raw: string | undefined, label: string): number[] => {
  const vals = (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => Number(s));
  if (vals.length === 0 || !vals.every((n) => Number.isFinite(n)))
    throw new Error(`--${label} must be CSV of numbers`);
  return vals;
};

function parseColor(kv: Record<string, string>): ColorPayload {
  const given = ['hex', 'rgb', 'floats', 'packed'].filter((k) => k in kv);
  if (given.length !== 1) throw new Error('use exactly one of --hex, --rgb, --floats, --packed');
  const hex = kv['hex'];
  if (hex !== undefined) {
    const normalized = hex.startsWith('#') ? hex : `#${hex}`;
    if (!/^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/.test(normalized))
      throw new Error('--hex must be RRGGBB or RRGGBBAA');
    return { kind: 'hex', hex: normalized };
  }
  const packed = kv['packed'];
  if (packed !== undefined) {
    const value = Number(packed);
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff)
      throw new Error('--packed must be a 32-bit unsigned value such as 0xFF8800FF');
    // int32 on the wire
    return { kind: 'packed', value: value | 0 };
  }
  const floats = kv['floats'];
  const values = parseCsv(floats ?? kv['rgb'], floats !== undefined ? 'floats' : 'rgb');
  if (values.length < 3 || values.length > 4) throw new Error('color needs 3 or 4 components');
  return floats !== undefined ? { kind: 'floats', values } : { kind: 'ints', values };
}

export function parseArgs(argv: string[]): Command {
  const [cmd, ...rest] = argv;
  const kv: Record<string, string> = {};
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token) continue;
    if (token.startsWith('--')) {
      const key = token.slice(2);
      const next = rest[i + 1];
      const val = next !== undefined && !next.startsWith('--') ? (i++, next) : 'true';
      kv[key] = val;
    }
  }
  const has = (k: string): boolean => Object.prototype.hasOwnProperty.call(kv, k);
  switch (cmd) {
    case undefined:
    case 'help':
    case '-h':
    case '--help':
      return { kind: 'help' };
    case 'osc:cue':
    case 'cue': {
      const text = kv['text'];
      if (text === undefined) throw new Error('--text is required');
      return { kind: 'osc:text', address: ADDR.cue, text };
    }
    case 'osc:description':
    case 'description': {
      const text = kv['text'];
      if (text === undefined) throw new Error('--text is required');
      return { kind: 'osc:text', address: ADDR.description, text };
    }
    case 'osc:color':
    case 'color':
      return { kind: 'osc:color', color: parseColor(kv) };
    case 'osc:send':
    case 'osc-send': {
      const address = kv['address'];
      if (!address || !address.startsWith('/')) throw new Error("--address '/path' required");
      const text = kv['text'];
      const floats = has('floats') ? parseCsv(kv['floats'], 'floats') : undefined;
      const integers = has('ints') ? parseCsv(kv['ints'], 'ints') : undefined;
      if (typeof text === 'string' && (floats || integers))
        throw new Error('use either --text or one of --floats/--ints');
      if (floats && integers) throw new Error('use exactly one of --floats or --ints (not both)');
      if (text === undefined && !floats && !integers)
        throw new Error('one of --text, --floats, or --ints is required');
      const out: { kind: 'osc:send'; address: string } & Partial<{
        text: string;
        floats: number[];
        ints: number[];
      }> = { kind: 'osc:send', address };
      if (typeof text === 'string') out.text = text;
      if (floats) out.floats = floats;
      if (integers) out.ints = integers;
      return out;
    }
    case 'osc:listen':
    case 'osc-listen': {
      const host = kv['host'] ?? process.env['CUE_DISPLAY_OSC_HOST'] ?? '0.0.0.0';
      const port = Number(kv['port'] ?? process.env['CUE_DISPLAY_OSC_PORT'] ?? '9010');
      if (!Number.isInteger(port) || port < 0 || port > 65535)
        throw new Error('--port must be 0-65535');
      const out: { kind: 'osc:listen'; host: string; port: number; durationMs?: number } = {
        kind: 'osc:listen',
        host,
        port,
      };
      if (has('durationMs')) {
        const durationMs = Number(kv['durationMs']);
        if (!Number.isFinite(durationMs)) throw new Error('durationMs must be a number');
        out.durationMs = durationMs;
      }
      return out;
    }
    default:
      return { kind: 'help' };
  }
}

export const USAGE = `Usage: probe <command> [options]

Commands:
  osc:cue --text <s>                    (alias: cue)
  osc:description --text <s>            (alias: description)
  osc:color --hex RRGGBB[AA] | --rgb r,g,b[,a] | --floats r,g,b[,a] | --packed 0xRRGGBBAA
                                        (alias: color)
  osc:send --address /path [--text s | --floats f1,f2,... | --ints i1,i2,...] (alias: osc-send)
  osc:listen [--host 0.0.0.0] [--port 9010] [--durationMs N] (alias: osc-listen)

Env: CUE_DISPLAY_PROBE_HOST / CUE_DISPLAY_PROBE_PORT select the display to send to.
`;
