/** The only OSC addresses the display reacts to. Matched exactly, case-sensitive. */
export const ADDR = {
  cue: '/cue',
  description: '/description',
  color: '/color',
} as const;
