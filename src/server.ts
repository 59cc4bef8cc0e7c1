import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { renderFlameGraph } from './render/flamegraph.js';
import type { FlameGraphPayload } from './render/flamegraph.js';
import { buildFlameGraphHtml } from './render/page.js';
import { SerializationError } from './shared/flameGraph/index.js';
import type { ProfileSnapshot } from './shared/profile/types.js';
import type { ViewerConfig } from './utils/config.js';
import { logError, logTrace } from './utils/logger.js';

export const FLAMEGRAPH_PATH = '/flamegraph';
export const FLAMEGRAPH_JSON_PATH = '/flamegraph.json';

export type CreateFlameGraphServerOptions = {
  profile: ProfileSnapshot;
  config: Pick<ViewerConfig, 'sampleIndex' | 'assets'>;
};

function send(res: ServerResponse, status: number, contentType: string, body: string, headers: Record<string, string> = {}): void {
  res.writeHead(status, { 'Content-Type': contentType, 'Content-Length': Buffer.byteLength(body), ...headers });
  res.end(body);
}

export function createRequestHandler(options: CreateFlameGraphServerOptions): (req: IncomingMessage, res: ServerResponse) => void {
  const { profile, config } = options;

  const render = (url: URL): FlameGraphPayload =>
    renderFlameGraph(
      profile,
      { sampleType: url.searchParams.get('t') ?? undefined },
      { defaultSampleType: config.sampleIndex }
    );

  return (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    logTrace('http:', req.method, url.pathname + url.search);

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      send(res, 405, 'text/plain; charset=utf-8', 'method not allowed', { Allow: 'GET, HEAD' });
      return;
    }

    try {
      switch (url.pathname) {
        case '/':
          res.writeHead(302, { Location: FLAMEGRAPH_PATH });
          res.end();
          return;
        case FLAMEGRAPH_PATH: {
          const html = buildFlameGraphHtml(render(url), { baseUrl: FLAMEGRAPH_PATH, assets: config.assets });
          send(res, 200, 'text/html; charset=utf-8', html);
          return;
        }
        case FLAMEGRAPH_JSON_PATH:
          send(res, 200, 'application/json; charset=utf-8', JSON.stringify(render(url)));
          return;
        default:
          send(res, 404, 'text/plain; charset=utf-8', 'not found');
      }
    } catch (e) {
      logError('Failed to render flame graph', e);
      const message = e instanceof SerializationError ? 'error serializing flame graph' : 'internal error';
      send(res, 500, 'text/plain; charset=utf-8', message);
    }
  };
}

export function createFlameGraphServer(options: CreateFlameGraphServerOptions): http.Server {
  return http.createServer(createRequestHandler(options));
}

export function listen(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : port);
    });
  });
}
