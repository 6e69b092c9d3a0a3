import { Client } from 'node-osc';
import { z } from 'zod';
import { scoped } from '../logging.js';
import { type OscTarget, OscTargetSchema } from '../types/config.js';

const log = scoped('osc-send');

type SendDone = (err: Error | null) => void;

/** Fire-and-forget OSC client for feeding a display from the probe CLI. */
export class OscSender {
  private readonly client: Client;

  constructor(target: OscTarget) {
    this.client = new Client(target.host, target.port);
  }

  async sendText(address: string, text: string): Promise<void> {
    await this.send(address, { text }, (done) => this.client.send(address, text, done));
  }

  async sendNumbers(address: string, ...values: number[]): Promise<void> {
    const args = values.map((v) => ({ type: 'float', value: Number(v) }));
    await this.send(address, { values }, (done) => this.client.send(address, ...args, done));
  }

  async sendIntegers(address: string, ...values: number[]): Promise<void> {
    const args = values.map((v) => ({ type: 'integer', value: Math.trunc(Number(v)) }));
    await this.send(address, { values }, (done) => this.client.send(address, ...args, done));
  }

  close(): void {
    this.client.close();
  }

  private async send(address: string, detail: object, dispatch: (done: SendDone) => void): Promise<void> {
    if (!address.startsWith('/')) {
      throw new Error(`OSC address must start with '/': ${address}`);
    }
    await new Promise<void>((resolve, reject) => {
      try {
        dispatch((err) => {
          if (err) {
            log.error({ err, address, ...detail }, 'osc send failed');
            reject(err);
            return;
          }
          log.debug({ address, ...detail }, 'osc send ok');
          resolve();
        });
      } catch (e) {
        log.error({ err: e, address, ...detail }, 'osc send threw');
        reject(e instanceof Error ? e : new Error(String(e)));
      }
    });
  }
}

export function loadOscTargetFromEnv(): OscTarget {
  const EnvSchema = OscTargetSchema.extend({
    host: z.string().trim().min(1).default('127.0.0.1'),
    port: z.coerce.number().int().min(1).max(65535).default(9010),
  });
  return EnvSchema.parse({
    host: process.env['CUE_DISPLAY_PROBE_HOST'] || undefined,
    port: process.env['CUE_DISPLAY_PROBE_PORT'] || undefined,
  });
}
