import type { Rgba } from '../types/osc.js';
import type { FieldUpdate } from './FieldMapper.js';

export type DisplayState = {
  readonly cue: string;
  readonly description: string;
  readonly color: Readonly<Rgba> | null;
};

export const EMPTY_DISPLAY_STATE: DisplayState = Object.freeze({
  cue: '',
  description: '',
  color: null,
});

function withUpdate(state: DisplayState, update: FieldUpdate): DisplayState {
  switch (update.field) {
    case 'cue':
      return { ...state, cue: update.value };
    case 'description':
      return { ...state, description: update.value };
    case 'color':
      return { ...state, color: Object.freeze({ ...update.value }) };
  }
}

/**
 * Latest known cue, description and colour.
 *
 * One writer (the listener) and any number of readers. Every apply swaps in a
 * new frozen snapshot, so a reader holds either the old or the new value and
 * never a mix of the two.
 */
export class DisplayStateCell {
  private current: DisplayState = EMPTY_DISPLAY_STATE;
  private rev = 0;

  apply(update: FieldUpdate): void {
    this.current = Object.freeze(withUpdate(this.current, update));
    this.rev += 1;
  }

  snapshot(): DisplayState {
    return this.current;
  }

  /** Bumped on every apply; lets a renderer skip unchanged frames. */
  get revision(): number {
    return this.rev;
  }
}
