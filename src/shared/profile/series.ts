import type { SampleType } from './types.js';

const INUSE_PREFIX = 'inuse_';

/**
 * Resolves a series selector: a type name, a decimal index, or a legacy `inuse_` name such as
 * `inuse_space` for a profile declaring `space`.
 */
export function resolveSeriesIndex(sampleTypes: readonly SampleType[], selector: string | undefined): number | undefined {
  const raw = selector?.trim();
  if (!raw) return undefined;

  if (/^\d+$/.test(raw)) {
    const index = Number(raw);
    return index < sampleTypes.length ? index : undefined;
  }

  const withoutInuse = raw.startsWith(INUSE_PREFIX) ? raw.slice(INUSE_PREFIX.length) : raw;
  const index = sampleTypes.findIndex(t => t.type === raw || t.type === withoutInuse);
  return index >= 0 ? index : undefined;
}

export type SeriesSelection = {
  requested?: string; // from the request, e.g. ?t=alloc
  configuredDefault?: string; // from configuration
};

/** Request, then configuration, then the first series. */
export function selectSeries(sampleTypes: readonly SampleType[], selection: SeriesSelection): number {
  return (
    resolveSeriesIndex(sampleTypes, selection.requested) ??
    resolveSeriesIndex(sampleTypes, selection.configuredDefault) ??
    0
  );
}
