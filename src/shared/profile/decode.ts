import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { Profile } from 'pprof-format';
import { logWarn } from '../../utils/logger.js';
import type { ProfileSample, ProfileSnapshot, SampleType } from './types.js';

const gunzipAsync = promisify(gunzip);

type Numeric = number | bigint;
type PprofFunction = Profile['function'][number];
type PprofLocation = Profile['location'][number];

const UNKNOWN = 'unknown';

export class ProfileLoadError extends Error {
  readonly file?: string;

  constructor(message: string, options?: { file?: string; cause?: unknown }) {
    super(options?.file ? `${message}: ${options.file}` : message, { cause: options?.cause });
    this.name = 'ProfileLoadError';
    this.file = options?.file;
  }
}

export function isGzip(buffer: Uint8Array): boolean {
  return buffer.length >= 2 && buffer[0] === 0x1f && buffer[1] === 0x8b;
}

function stringAt(strings: readonly string[], index: Numeric): string {
  return strings[Number(index)] ?? '';
}

/** Converts a decoded pprof profile into the snapshot consumed by the renderer. */
export function toSnapshot(profile: Profile): ProfileSnapshot {
  const strings = profile.stringTable.strings;
  const functions = new Map<number, PprofFunction>();
  for (const fn of profile.function) functions.set(Number(fn.id), fn);
  const locations = new Map<number, PprofLocation>();
  for (const loc of profile.location) locations.set(Number(loc.id), loc);

  const sampleTypes: SampleType[] = profile.sampleType.map(t => ({
    type: stringAt(strings, t.type),
    unit: stringAt(strings, t.unit)
  }));

  let skipped = 0;
  const samples: ProfileSample[] = profile.sample.map(sample => {
    // pprof lists the leaf location first and, within a location, the innermost inlined function first.
    const leafFirst: string[] = [];
    for (const id of sample.locationId) {
      const loc = locations.get(Number(id));
      if (!loc) {
        skipped++;
        continue;
      }
      for (const line of loc.line) {
        const fn = functions.get(Number(line.functionId));
        leafFirst.push((fn && stringAt(strings, fn.name)) || UNKNOWN);
      }
    }
    return { frames: leafFirst.reverse(), values: sample.value.map(v => Number(v)) };
  });
  if (skipped > 0) {
    logWarn(`Skipped ${skipped} frame(s) with unknown location ids`);
  }

  const mainMapping = profile.mapping[0];
  const mainFile = mainMapping ? stringAt(strings, mainMapping.filename) || undefined : undefined;
  const defaultSampleType = stringAt(strings, profile.defaultSampleType) || undefined;

  return {
    sampleTypes,
    samples,
    mainFile,
    timeNanos: Number(profile.timeNanos),
    durationNanos: Number(profile.durationNanos),
    defaultSampleType
  };
}

export async function decodeProfile(buffer: Uint8Array): Promise<ProfileSnapshot> {
  const raw = isGzip(buffer) ? await gunzipAsync(buffer) : buffer;
  return toSnapshot(Profile.decode(raw));
}

export async function loadProfile(file: string): Promise<ProfileSnapshot> {
  let buffer: Buffer;
  try {
    buffer = await readFile(file);
  } catch (e) {
    throw new ProfileLoadError('Unable to read profile', { file, cause: e });
  }
  try {
    return await decodeProfile(buffer);
  } catch (e) {
    throw new ProfileLoadError('Unable to decode profile', { file, cause: e });
  }
}
