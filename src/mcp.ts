import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { renderFlameGraph } from './render/flamegraph.js';
import type { ProfileSnapshot } from './shared/profile/types.js';
import type { ViewerConfig } from './utils/config.js';
import { logError } from './utils/logger.js';

export type CreateMcpServerOptions = {
  profile: ProfileSnapshot;
  config: Pick<ViewerConfig, 'sampleIndex'>;
  version?: string;
};

export function createMcpServer(options: CreateMcpServerOptions): McpServer {
  const server = new McpServer({
    name: 'pprof-flamegraph',
    version: options.version ?? '0.1.0'
  });

  server.registerTool(
    'flameGraph',
    {
      title: 'pprof Flame Graph',
      description:
        'Aggregates the loaded pprof profile into a flame graph tree for one sample type (series). ' +
        'Each node has name, value (cumulative sample value) and children. Unknown sample types fall back to ' +
        'the configured default, then to the first series. Returns the tree with its legend in structuredContent.',
      inputSchema: {
        sampleType: z.string().optional()
      },
      annotations: {
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async params => {
      try {
        const payload = renderFlameGraph(
          options.profile,
          { sampleType: params.sampleType },
          { defaultSampleType: options.config.sampleIndex }
        );
        return {
          content: [{ type: 'text', text: JSON.stringify(payload) }],
          structuredContent: payload
        };
      } catch (e) {
        logError('flameGraph tool failed', e);
        const message = e instanceof Error ? e.message : String(e);
        return {
          content: [{ type: 'text', text: `Failed to build flame graph: ${message}` }],
          isError: true
        };
      }
    }
  );

  return server;
}
