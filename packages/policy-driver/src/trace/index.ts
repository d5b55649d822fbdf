export * from './tags.js';
export { traceEnabled, traceStdoutEnabled } from './flag.js';
export { emit, flushTrace, resetTraceForTest } from './log.js';
export { writeTraceFile } from './sink.js';
