// Environment-driven trace switches, read once and cached.
let _trace: boolean | undefined;
let _traceStdout: boolean | undefined;

function readFlag(name: string): boolean {
  const v = (process.env[name] || '').toLowerCase();
  return v === '1' || v === 'true';
}

export function traceEnabled(): boolean {
  if (_trace === undefined) {
    _trace = readFlag('SPLITFMT_TRACE');
  }
  return _trace;
}

export function traceStdoutEnabled(): boolean {
  if (_traceStdout === undefined) {
    _traceStdout = readFlag('SPLITFMT_TRACE_STDOUT');
  }
  return _traceStdout;
}

export function resetTraceFlagsForTest(): void {
  _trace = undefined;
  _traceStdout = undefined;
}
