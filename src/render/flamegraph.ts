import { buildFlameGraph, serializeFlameGraph } from '../shared/flameGraph/index.js';
import type { SerializedFlameGraphNode, StackSample } from '../shared/flameGraph/index.js';
import { basename, buildLegend } from '../shared/format.js';
import { selectSeries } from '../shared/profile/series.js';
import type { ProfileSnapshot } from '../shared/profile/types.js';
import { logTrace } from '../utils/logger.js';

export type FlameGraphRequest = {
  sampleType?: string; // explicit series, e.g. the `t` query parameter
};

export type FlameGraphOptions = {
  defaultSampleType?: string; // configured fallback series
};

export type FlameGraphPayload = {
  title: string;
  legend: string[];
  unit: string;
  sampleType: string;
  sampleTypes: string[];
  data: SerializedFlameGraphNode;
};

function* stacksFor(profile: ProfileSnapshot, index: number): Generator<StackSample> {
  for (const sample of profile.samples) {
    yield { frames: sample.frames, value: sample.values[index] ?? 0 };
  }
}

/**
 * Builds the flame graph for one series of the profile and gathers the text shown around it.
 *
 * @throws SerializationError when the tree holds a name or value that cannot be encoded
 */
export function renderFlameGraph(
  profile: ProfileSnapshot,
  request: FlameGraphRequest = {},
  options: FlameGraphOptions = {}
): FlameGraphPayload {
  const index = selectSeries(profile.sampleTypes, {
    requested: request.sampleType,
    configuredDefault: options.defaultSampleType
  });
  const series = profile.sampleTypes[index] ?? { type: '', unit: '' };
  logTrace('renderFlameGraph: series', index, series.type, 'samples', profile.samples.length);

  const root = buildFlameGraph(stacksFor(profile, index));
  const data = serializeFlameGraph(root);

  return {
    title: profile.mainFile ? basename(profile.mainFile) : 'unknown',
    legend: buildLegend({
      file: profile.mainFile,
      type: series.type,
      unit: series.unit,
      timeNanos: profile.timeNanos,
      durationNanos: profile.durationNanos
    }),
    unit: series.unit,
    sampleType: series.type,
    sampleTypes: profile.sampleTypes.map(t => t.type),
    data
  };
}
