import { z } from 'zod';

export const SORT_COLUMNS = ['path', 'lastCommit', 'status'] as const;

export const ScanConfigSchema = z.object({
  roots: z.array(z.string().min(1)).min(1).default(['~']),
  ignore: z.array(z.string()).default([]),
  excludeHidden: z.boolean().default(true),
  followSymlinks: z.boolean().default(true),
  concurrency: z.number().int().min(1).max(256).default(16),
});

export const CacheConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

export const ReportConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(8),
  sortBy: z.enum(SORT_COLUMNS).default('path'),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scan: ScanConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  report: ReportConfigSchema.default({}),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** Shape accepted before defaults are applied, e.g. a YAML file. */
export type ConfigInput = z.input<typeof ConfigSchema>;
