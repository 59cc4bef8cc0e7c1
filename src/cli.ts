import process from 'node:process';
import { pathToFileURL } from 'node:url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from './mcp.js';
import { createFlameGraphServer, FLAMEGRAPH_PATH, listen } from './server.js';
import { loadProfile } from './shared/profile/decode.js';
import type { ProfileSnapshot } from './shared/profile/types.js';
import { getNumberConfig, loadConfig } from './utils/config.js';
import type { ViewerConfig } from './utils/config.js';
import { logError, logInfo, setTraceEnabled } from './utils/logger.js';

export type CliParseOptions = {
  profilePath?: string;
  port?: number;
  host?: string;
  sampleIndex?: string;
  mcp?: boolean;
  debug?: boolean;
};

export type CliParseResult = {
  options: CliParseOptions;
  showHelp?: boolean;
  showVersion?: boolean;
  error?: string;
};

export function parseArgs(argv: string[]): CliParseResult {
  const options: CliParseOptions = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';

    switch (arg) {
      case '--help':
      case '-h':
        return { options, showHelp: true };
      case '--version':
      case '-v':
        return { options, showVersion: true };
      case '--port': {
        const value = argv[index + 1];
        if (!value) {
          return { options, error: 'Missing value for --port' };
        }
        if (!/^\d+$/.test(value)) {
          return { options, error: `Invalid port: ${value}` };
        }
        options.port = getNumberConfig(value, 0, 0, 65535);
        index += 1;
        break;
      }
      case '--host': {
        const value = argv[index + 1];
        if (!value) {
          return { options, error: 'Missing value for --host' };
        }
        options.host = value;
        index += 1;
        break;
      }
      case '--sample-index': {
        const value = argv[index + 1];
        if (!value) {
          return { options, error: 'Missing value for --sample-index' };
        }
        options.sampleIndex = value;
        index += 1;
        break;
      }
      case '--mcp':
        options.mcp = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      default:
        if (arg.startsWith('-')) {
          return { options, error: `Unknown argument: ${arg}` };
        }
        if (options.profilePath) {
          return { options, error: `Unexpected argument: ${arg}` };
        }
        options.profilePath = arg;
    }
  }

  if (!options.profilePath) {
    return { options, error: 'Missing profile file' };
  }
  return { options };
}

export function formatUsage(): string {
  return [
    'Usage: pprof-flamegraph <profile.pb.gz> [options]',
    '',
    'Options:',
    '  --port <n>             HTTP port (default 8080, env FLAMEGRAPH_PORT)',
    '  --host <addr>          HTTP host (default 127.0.0.1, env FLAMEGRAPH_HOST)',
    '  --sample-index <name>  Default sample type (env FLAMEGRAPH_SAMPLE_INDEX)',
    '  --mcp                  Serve the flameGraph tool over stdio instead of HTTP',
    '  --debug                Enable debug logging',
    '  -h, --help             Show this help text',
    '  -v, --version          Show version'
  ].join('\n');
}

export function formatVersion(): string {
  const version = process.env.npm_package_version ?? '0.0.0';
  return `pprof-flamegraph ${version}`;
}

export function resolveConfig(options: CliParseOptions, env: NodeJS.ProcessEnv): ViewerConfig {
  const base = loadConfig(env);
  return {
    ...base,
    port: options.port ?? base.port,
    host: options.host ?? base.host,
    sampleIndex: options.sampleIndex ?? base.sampleIndex,
    debug: options.debug ?? base.debug
  };
}

export type CliDeps = {
  env: NodeJS.ProcessEnv;
  loadProfile: (file: string) => Promise<ProfileSnapshot>;
  serveHttp: (profile: ProfileSnapshot, config: ViewerConfig) => Promise<void>;
  serveMcp: (profile: ProfileSnapshot, config: ViewerConfig) => Promise<void>;
  log: (message: string) => void;
};

async function serveHttp(profile: ProfileSnapshot, config: ViewerConfig): Promise<void> {
  const server = createFlameGraphServer({ profile, config });
  const port = await listen(server, config.port, config.host);
  logInfo(`Serving flame graph at http://${config.host}:${port}${FLAMEGRAPH_PATH}`);
  await new Promise<void>(resolve => server.once('close', () => resolve()));
}

async function serveMcp(profile: ProfileSnapshot, config: ViewerConfig): Promise<void> {
  const server = createMcpServer({ profile, config, version: process.env.npm_package_version });
  const transport = new StdioServerTransport();
  const closed = new Promise<void>(resolve => {
    transport.onclose = () => resolve();
  });
  process.stdin.resume();
  await server.connect(transport);
  logInfo('Serving flameGraph tool over stdio');
  await closed;
}

const defaultDeps: CliDeps = {
  env: process.env,
  loadProfile,
  serveHttp,
  serveMcp,
  log: message => {
    process.stderr.write(`${message}\n`);
  }
};

export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.showHelp) {
    deps.log(formatUsage());
    return 0;
  }

  if (parsed.showVersion) {
    deps.log(formatVersion());
    return 0;
  }

  if (parsed.error || !parsed.options.profilePath) {
    deps.log(parsed.error ?? 'Missing profile file');
    deps.log(formatUsage());
    return 1;
  }

  let config: ViewerConfig;
  let profile: ProfileSnapshot;
  try {
    config = resolveConfig(parsed.options, deps.env);
    if (config.debug) setTraceEnabled(true);
    profile = await deps.loadProfile(parsed.options.profilePath);
  } catch (e) {
    logError(e);
    return 1;
  }
  logInfo(`Loaded ${profile.samples.length} samples from ${parsed.options.profilePath}`);

  if (parsed.options.mcp) {
    await deps.serveMcp(profile, config);
  } else {
    await deps.serveHttp(profile, config);
  }
  return 0;
}

function isMain(): boolean {
  if (!process.argv[1]) return false;
  return pathToFileURL(process.argv[1]).href === import.meta.url;
}

if (isMain()) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError(error);
      process.exitCode = 1;
    });
}
