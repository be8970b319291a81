// src/config.ts
import { z } from 'zod';
import { ConfigError } from './errors.js';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  DATA_DIR: z.string().min(1).default('data'),
  OUTPUT_DIR: z.string().min(1).default('.'),
  HISTOGRAM_BINS: z.coerce.number().int().min(1).max(500).default(20),
  API_KEYS: z.string().optional().default(''),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),
});

export type Config = {
  port: number;
  dataDir: string;
  outputDir: string;
  histogramBins: number;
  apiKeys: string[];
  supabase: { url: string; anonKey: string } | null;
};

/** Empty strings count as unset, the way `.env` files usually leave them. */
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') out[k] = v;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`invalid environment: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    dataDir: e.DATA_DIR,
    outputDir: e.OUTPUT_DIR,
    histogramBins: e.HISTOGRAM_BINS,
    apiKeys: e.API_KEYS.split(',').map(s => s.trim()).filter(Boolean),
    supabase: e.SUPABASE_URL && e.SUPABASE_ANON_KEY
      ? { url: e.SUPABASE_URL, anonKey: e.SUPABASE_ANON_KEY }
      : null,
  };
}
