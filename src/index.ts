export * from './shared/flameGraph/index.js';
export * from './shared/profile/types.js';
export { resolveSeriesIndex, selectSeries } from './shared/profile/series.js';
export type { SeriesSelection } from './shared/profile/series.js';
export { decodeProfile, loadProfile, toSnapshot, ProfileLoadError } from './shared/profile/decode.js';
export { buildLegend, formatProfileDuration, formatProfileTime } from './shared/format.js';
export { renderFlameGraph } from './render/flamegraph.js';
export type { FlameGraphOptions, FlameGraphPayload, FlameGraphRequest } from './render/flamegraph.js';
export { buildFlameGraphHtml } from './render/page.js';
export type { PageOptions } from './render/page.js';
export { createFlameGraphServer, createRequestHandler, listen } from './server.js';
export { createMcpServer } from './mcp.js';
export { loadConfig } from './utils/config.js';
export type { PageAssets, ViewerConfig } from './utils/config.js';
