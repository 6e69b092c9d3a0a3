import { z } from 'zod';

// Centralized config schemas (code-as-contracts). Keep logic separate.

export const OscIngressConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(9010),
  queueLimit: z.number().int().min(1).max(65_536).default(1024),
});
export type OscIngressConfig = z.infer<typeof OscIngressConfigSchema>;

export const RendererConfigSchema = z.object({
  intervalMs: z.number().int().min(16).max(10_000).default(100),
});
export type RendererConfig = z.infer<typeof RendererConfigSchema>;

export const OscTargetSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});
export type OscTarget = z.infer<typeof OscTargetSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
