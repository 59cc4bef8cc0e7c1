export type SampleType = {
  type: string; // e.g. cpu, alloc_space
  unit: string; // e.g. nanoseconds, bytes
};

export type ProfileSample = {
  frames: string[]; // root-first, inlined callees after their callers
  values: number[]; // one entry per sample type
};

/** A decoded profile. Read-only once loaded. */
export type ProfileSnapshot = {
  sampleTypes: SampleType[];
  samples: ProfileSample[];
  mainFile?: string;
  timeNanos: number;
  durationNanos: number;
  defaultSampleType?: string;
};
