import { promises as fs } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import Mustache from 'mustache';
import type { DisplayState, DisplayStateCell } from '../gateway/DisplayState.js';
import type { ListenerStats } from '../gateway/OscListener.js';
import { scoped } from '../logging.js';
import type { RendererConfig } from '../types/config.js';
import type { Rgba } from '../types/osc.js';

const log = scoped('renderer');

const PLACEHOLDER = '—';

let TEMPLATE_CACHE: string | undefined;

export async function loadTemplate(): Promise<string> {
  if (TEMPLATE_CACHE) return TEMPLATE_CACHE;
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  const path = resolve(__dirname, '../../assets/display_template.mustache');
  const buf = await fs.readFile(path, 'utf8');
  TEMPLATE_CACHE = buf;
  return buf;
}

export type DisplayView = {
  cue: string;
  description: string;
  color: string;
  lastOsc: string;
};

const hex2 = (n: number): string => n.toString(16).toUpperCase().padStart(2, '0');

export function formatColor(color: Readonly<Rgba> | null): string {
  if (!color) return PLACEHOLDER;
  return `#${hex2(color.r)}${hex2(color.g)}${hex2(color.b)}${hex2(color.a)}`;
}

export function formatAge(lastPacketAt: number | null, now: number): string {
  if (lastPacketAt === null) return 'n/a';
  return `${(Math.max(0, now - lastPacketAt) / 1000).toFixed(1)}s ago`;
}

export function toView(state: DisplayState, lastPacketAt: number | null, now: number): DisplayView {
  return {
    cue: state.cue || PLACEHOLDER,
    description: state.description || PLACEHOLDER,
    color: formatColor(state.color),
    lastOsc: formatAge(lastPacketAt, now),
  };
}

export function renderFrame(template: string, view: DisplayView): string {
  return Mustache.render(template, view);
}

export type FrameSink = { write(chunk: string): unknown };

export type TerminalRendererOptions = RendererConfig & {
  state: DisplayStateCell;
  stats: () => ListenerStats | undefined;
  out: FrameSink;
  /** Skips loading assets/display_template.mustache. */
  template?: string;
  now?: () => number;
};

/**
 * Polls the display state on a timer and writes one line per change: a state
 * update, a new packet, or the packet age crossing a whole second.
 * Reads snapshots only; never blocks the listener.
 */
export class TerminalRenderer {
  private timer?: ReturnType<typeof setInterval>;
  private template?: string;
  private lastKey?: string;

  constructor(private readonly options: TerminalRendererOptions) {}

  async start(): Promise<void> {
    this.template = this.options.template ?? (await loadTemplate());
    this.tick();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    log.debug({ intervalMs: this.options.intervalMs }, 'renderer started');
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  /** Write a frame if anything visible changed since the last one. */
  tick(): void {
    const { state, stats, out, now = Date.now } = this.options;
    if (this.template === undefined) return;
    const at = now();
    const lastPacketAt = stats()?.lastPacketAt ?? null;
    const ageSeconds = lastPacketAt === null ? -1 : Math.floor(Math.max(0, at - lastPacketAt) / 1000);
    const key = `${state.revision}:${lastPacketAt}:${ageSeconds}`;
    if (key === this.lastKey) return;
    this.lastKey = key;
    const view = toView(state.snapshot(), lastPacketAt, at);
    out.write(`${renderFrame(this.template, view)}\n`);
  }
}
