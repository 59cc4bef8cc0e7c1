import { z } from 'zod';

export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = '127.0.0.1';

export const DEFAULT_ASSETS = {
  d3Script: 'https://cdn.jsdelivr.net/npm/d3@7/dist/d3.min.js',
  flameGraphScript: 'https://cdn.jsdelivr.net/npm/d3-flame-graph@4/dist/d3-flamegraph.min.js',
  flameGraphTooltipScript: 'https://cdn.jsdelivr.net/npm/d3-flame-graph@4/dist/d3-flamegraph-tooltip.min.js',
  flameGraphStylesheet: 'https://cdn.jsdelivr.net/npm/d3-flame-graph@4/dist/d3-flamegraph.css'
} as const;

export type PageAssets = {
  d3Script: string;
  flameGraphScript: string;
  flameGraphTooltipScript: string;
  flameGraphStylesheet: string;
};

export type ViewerConfig = {
  port: number;
  host: string;
  sampleIndex?: string; // default series when a request names none
  debug: boolean;
  assets: PageAssets;
};

const envSchema = z.object({
  FLAMEGRAPH_PORT: z.string().optional(),
  FLAMEGRAPH_HOST: z.string().optional(),
  FLAMEGRAPH_SAMPLE_INDEX: z.string().optional(),
  FLAMEGRAPH_DEBUG: z.string().optional(),
  FLAMEGRAPH_D3_URL: z.string().url().optional(),
  FLAMEGRAPH_FLAMEGRAPH_URL: z.string().url().optional(),
  FLAMEGRAPH_TOOLTIP_URL: z.string().url().optional(),
  FLAMEGRAPH_FLAMEGRAPH_CSS_URL: z.string().url().optional()
});

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Parse an integer setting, applying the default and clamping.
 *
 * @param raw textual value, usually from the environment
 * @param def default value if the setting is absent or invalid
 * @param min minimum inclusive value
 * @param max maximum inclusive value
 */
export function getNumberConfig(raw: string | undefined, def: number, min: number, max: number): number {
  const parsed = raw !== undefined && raw.trim() !== '' ? Number(raw) : NaN;
  const n = Number.isFinite(parsed) ? Math.floor(parsed) : def;
  return Math.max(min, Math.min(max, n));
}

export function getBooleanConfig(raw: string | undefined, def: boolean): boolean {
  const value = nonEmpty(raw)?.toLowerCase();
  if (value === undefined) return def;
  return /^(1|true|yes|on)$/.test(value);
}

/** Reads the viewer settings from the environment. Invalid asset URLs are rejected; anything else falls back. */
export function loadConfig(env: NodeJS.ProcessEnv): ViewerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`);
  }
  const vars = parsed.data;
  return {
    port: getNumberConfig(vars.FLAMEGRAPH_PORT, DEFAULT_PORT, 0, 65535),
    host: nonEmpty(vars.FLAMEGRAPH_HOST) ?? DEFAULT_HOST,
    sampleIndex: nonEmpty(vars.FLAMEGRAPH_SAMPLE_INDEX),
    debug: getBooleanConfig(vars.FLAMEGRAPH_DEBUG, false),
    assets: {
      d3Script: vars.FLAMEGRAPH_D3_URL ?? DEFAULT_ASSETS.d3Script,
      flameGraphScript: vars.FLAMEGRAPH_FLAMEGRAPH_URL ?? DEFAULT_ASSETS.flameGraphScript,
      flameGraphTooltipScript: vars.FLAMEGRAPH_TOOLTIP_URL ?? DEFAULT_ASSETS.flameGraphTooltipScript,
      flameGraphStylesheet: vars.FLAMEGRAPH_FLAMEGRAPH_CSS_URL ?? DEFAULT_ASSETS.flameGraphStylesheet
    }
  };
}
