import { scoped } from '../logging.js';
import { ColorArgsSchema, CueArgsSchema, DescriptionArgsSchema } from '../schemas/osc.js';
import type { OscMessage, Rgba } from '../types/osc.js';
import { ADDR } from './addresses.js';

const log = scoped('osc-mapper');

export type FieldUpdate =
  | { field: 'cue'; value: string }
  | { field: 'description'; value: string }
  | { field: 'color'; value: Rgba };

/**
 * Turn a decoded message into a display field update. Unknown addresses and
 * wrong argument shapes return undefined; other traffic on the port is normal.
 */
export function mapMessage(message: OscMessage): FieldUpdate | undefined {
  switch (message.address) {
    case ADDR.cue: {
      const parsed = CueArgsSchema.safeParse(message.args);
      if (parsed.success) return { field: 'cue', value: parsed.data };
      break;
    }
    case ADDR.description: {
      const parsed = DescriptionArgsSchema.safeParse(message.args);
      if (parsed.success) return { field: 'description', value: parsed.data };
      break;
    }
    case ADDR.color: {
      const parsed = ColorArgsSchema.safeParse(message.args);
      if (parsed.success) return { field: 'color', value: parsed.data };
      break;
    }
    default:
      return undefined;
  }
  log.debug(
    { address: message.address, types: message.args.map((a) => a.type) },
    'argument shape not accepted',
  );
  return undefined;
}
