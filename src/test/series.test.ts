import test from 'node:test';
import assert from 'node:assert/strict';
import { resolveSeriesIndex, selectSeries } from '../shared/profile/series.js';
import type { SampleType } from '../shared/profile/types.js';

const types: SampleType[] = [
  { type: 'cpu', unit: 'nanoseconds' },
  { type: 'alloc', unit: 'bytes' }
];

const heapTypes: SampleType[] = [
  { type: 'alloc_objects', unit: 'count' },
  { type: 'alloc_space', unit: 'bytes' },
  { type: 'objects', unit: 'count' },
  { type: 'space', unit: 'bytes' }
];

test('resolveSeriesIndex: by name', () => {
  assert.equal(resolveSeriesIndex(types, 'cpu'), 0);
  assert.equal(resolveSeriesIndex(types, 'alloc'), 1);
  assert.equal(resolveSeriesIndex(types, 'nope'), undefined);
});

test('resolveSeriesIndex: by numeric index', () => {
  assert.equal(resolveSeriesIndex(types, '1'), 1);
  assert.equal(resolveSeriesIndex(types, '2'), undefined);
});

test('resolveSeriesIndex: legacy inuse_ names', () => {
  assert.equal(resolveSeriesIndex(heapTypes, 'inuse_space'), 3);
  assert.equal(resolveSeriesIndex(heapTypes, 'inuse_objects'), 2);
  assert.equal(resolveSeriesIndex(heapTypes, 'alloc_space'), 1);
});

test('resolveSeriesIndex: blank selectors do not resolve', () => {
  assert.equal(resolveSeriesIndex(types, undefined), undefined);
  assert.equal(resolveSeriesIndex(types, ''), undefined);
  assert.equal(resolveSeriesIndex(types, '   '), undefined);
});

test('selectSeries: unknown request without a default falls back to the first series', () => {
  assert.equal(selectSeries(types, { requested: 'wall' }), 0);
});

test('selectSeries: explicit request wins over the configured default', () => {
  assert.equal(selectSeries(types, { requested: 'alloc', configuredDefault: 'cpu' }), 1);
  assert.equal(selectSeries(types, { requested: 'alloc' }), 1);
});

test('selectSeries: configured default applies when the request is absent or unknown', () => {
  assert.equal(selectSeries(types, { configuredDefault: 'alloc' }), 1);
  assert.equal(selectSeries(types, { requested: '', configuredDefault: 'alloc' }), 1);
  assert.equal(selectSeries(types, { requested: 'wall', configuredDefault: 'alloc' }), 1);
});

test('selectSeries: unresolved request and default fall back to the first series', () => {
  assert.equal(selectSeries(types, {}), 0);
  assert.equal(selectSeries(types, { requested: 'wall', configuredDefault: 'heap' }), 0);
});

test('selectSeries: no series at all still yields index 0', () => {
  assert.equal(selectSeries([], { requested: 'cpu' }), 0);
});
