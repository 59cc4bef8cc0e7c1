import process from 'node:process';

// stdout belongs to the MCP transport, so every log line goes to stderr
export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

let sink: LogSink = stderrSink;
let traceEnabled = false;

function fmt(parts: unknown[]): string {
  try {
    const mapped = parts.map(p => {
      if (p instanceof Error) {
        return `${p.name}: ${p.message}` + (p.stack ? `\n${p.stack}` : '');
      }
      if (typeof p === 'object') {
        try {
          return JSON.stringify(p);
        } catch {
          return String(p);
        }
      }
      return String(p);
    });
    return mapped.join(' ');
  } catch {
    return parts.map(p => String(p)).join(' ');
  }
}

function now(): string {
  const d = new Date();
  const pad = (n: number) => (n < 10 ? `0${n}` : String(n));
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function logInfo(...parts: unknown[]): void {
  sink(`[${now()}] INFO  ${fmt(parts)}`);
}

export function logWarn(...parts: unknown[]): void {
  sink(`[${now()}] WARN  ${fmt(parts)}`);
}

export function logError(...parts: unknown[]): void {
  sink(`[${now()}] ERROR ${fmt(parts)}`);
}

export function setTraceEnabled(enabled: boolean): void {
  traceEnabled = !!enabled;
  sink(`[${now()}] INFO  Trace logging ${traceEnabled ? 'enabled' : 'disabled'}`);
}

export function logTrace(...parts: unknown[]): void {
  if (!traceEnabled) {
    return;
  }
  sink(`[${now()}] TRACE ${fmt(parts)}`);
}

export function setLogSink(next: LogSink | undefined): void {
  sink = next ?? stderrSink;
}
