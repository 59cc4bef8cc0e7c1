import type { ProfileSnapshot } from '../../shared/profile/types.js';

export function sampleProfile(): ProfileSnapshot {
  return {
    sampleTypes: [
      { type: 'cpu', unit: 'nanoseconds' },
      { type: 'alloc', unit: 'bytes' }
    ],
    samples: [
      { frames: ['main', 'foo'], values: [10, 100] },
      { frames: ['main', 'bar'], values: [5, 200] },
      { frames: ['main', 'foo'], values: [3, 0] }
    ],
    mainFile: '/srv/bin/app',
    timeNanos: 0,
    durationNanos: 2_000_000_000
  };
}
