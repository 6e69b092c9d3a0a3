import { describe, it, expect } from 'vitest';
import {
  TerminalRenderer,
  formatAge,
  formatColor,
  loadTemplate,
  renderFrame,
  toView,
} from '../display/TerminalRenderer.js';
import { DisplayStateCell } from '../gateway/DisplayState.js';
import type { ListenerStats } from '../gateway/OscListener.js';

describe('display formatting', () => {
  it('formats colours as #RRGGBBAA', () => {
    expect(formatColor(null)).toBe('—');
    expect(formatColor({ r: 255, g: 136, b: 0, a: 255 })).toBe('#FF8800FF');
    expect(formatColor({ r: 1, g: 2, b: 3, a: 4 })).toBe('#01020304');
  });

  it('formats the age of the last packet', () => {
    expect(formatAge(null, 5000)).toBe('n/a');
    expect(formatAge(1000, 3500)).toBe('2.5s ago');
    expect(formatAge(4000, 3000)).toBe('0.0s ago');
  });

  it('uses placeholders for empty fields', () => {
    expect(toView({ cue: '', description: '', color: null }, null, 0)).toEqual({
      cue: '—',
      description: '—',
      color: '—',
      lastOsc: 'n/a',
    });
  });

  it('renders the bundled template without HTML escaping', async () => {
    const template = await loadTemplate();
    const view = toView(
      { cue: '12', description: 'Fade <slow> & hold', color: { r: 255, g: 136, b: 0, a: 255 } },
      1000,
      1000,
    );
    expect(renderFrame(template, view)).toBe(
      'Cue 12 | Fade <slow> & hold | Color: #FF8800FF | Last OSC: 0.0s ago',
    );
  });
});

describe('TerminalRenderer', () => {
  it('writes a frame at start and then only when the state changes', async () => {
    const state = new DisplayStateCell();
    const lines: string[] = [];
    let stats: ListenerStats | undefined;
    const renderer = new TerminalRenderer({
      intervalMs: 10_000,
      state,
      stats: () => stats,
      out: { write: (chunk: string) => lines.push(chunk) },
      template: '{{{cue}}}/{{{description}}}/{{{color}}}/{{{lastOsc}}}',
      now: () => 2000,
    });
    await renderer.start();
    try {
      expect(lines).toEqual(['—/—/—/n/a\n']);

      renderer.tick();
      expect(lines).toHaveLength(1);

      stats = {
        received: 1,
        applied: 1,
        ignored: 0,
        malformed: 0,
        unsupported: 0,
        dropped: 0,
        lastPacketAt: 1500,
      };
      state.apply({ field: 'cue', value: 'Q9' });
      renderer.tick();
      expect(lines).toEqual(['—/—/—/n/a\n', 'Q9/—/—/0.5s ago\n']);
    } finally {
      renderer.stop();
    }
  });

  it('refreshes the packet age without a state change', async () => {
    const state = new DisplayStateCell();
    const lines: string[] = [];
    let clock = 2000;
    let lastPacketAt: number | null = null;
    const renderer = new TerminalRenderer({
      intervalMs: 10_000,
      state,
      stats: () => ({
        received: lastPacketAt === null ? 0 : 1,
        applied: 0,
        ignored: lastPacketAt === null ? 0 : 1,
        malformed: 0,
        unsupported: 0,
        dropped: 0,
        lastPacketAt,
      }),
      out: { write: (chunk: string) => lines.push(chunk) },
      template: '{{{cue}}}/{{{lastOsc}}}',
      now: () => clock,
    });
    await renderer.start();
    try {
      lastPacketAt = 1800;
      renderer.tick();
      clock = 2500;
      renderer.tick();
      clock = 2900;
      renderer.tick();
      lastPacketAt = 2800;
      clock = 3000;
      renderer.tick();
      expect(lines).toEqual(['—/n/a\n', '—/0.2s ago\n', '—/1.1s ago\n', '—/0.2s ago\n']);
    } finally {
      renderer.stop();
    }
  });
});
