import {
  type LoggingConfig,
  LoggingConfigSchema,
  OscIngressConfigSchema,
  RendererConfigSchema,
} from '../types/config.js';
import { z } from 'zod';

/**
 * Aggregated application configuration. Parse at the boundary (process.env).
 * Per-feature schemas own the defaults and ranges.
 */
export const AppConfigSchema = z.object({
  oscIngress: OscIngressConfigSchema,
  renderer: RendererConfigSchema,
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

const num = (name: string): number | undefined => {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? undefined : Number(raw);
};

export function loadAppConfigFromEnv(): AppConfig {
  const raw = {
    oscIngress: {
      host: process.env['CUE_DISPLAY_OSC_HOST'] || undefined,
      port: num('CUE_DISPLAY_OSC_PORT'),
      queueLimit: num('CUE_DISPLAY_QUEUE_LIMIT'),
    },
    renderer: {
      intervalMs: num('CUE_DISPLAY_RENDER_INTERVAL_MS'),
    },
  } as const;
  return AppConfigSchema.parse(raw);
}

/** Read before any logger exists, so failures surface as a plain ZodError. */
export function loadLoggingConfigFromEnv(): LoggingConfig {
  return LoggingConfigSchema.parse({ level: process.env['LOG_LEVEL']?.trim().toLowerCase() || undefined });
}
