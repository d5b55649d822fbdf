import type { TraceTag } from './tags.js';
import { resetTraceFlagsForTest, traceEnabled, traceStdoutEnabled } from './flag.js';

const log: TraceTag[] = [];

export function emit(tag: TraceTag): void {
  if (!traceEnabled()) return;
  if (traceStdoutEnabled()) {
    process.stdout.write(`${JSON.stringify({ ts: Date.now(), tag })}\n`);
  }
  log.push(tag);
}

export function flushTrace(): TraceTag[] {
  const out = log.slice();
  log.length = 0;
  return out;
}

export function resetTraceForTest(): void {
  resetTraceFlagsForTest();
  log.length = 0;
}
