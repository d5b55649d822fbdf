import { createWriteStream, mkdirSync } from 'node:fs';
import path from 'node:path';

import type { TraceTag } from './tags.js';

const jsonLine = (tag: TraceTag): string => `${JSON.stringify(tag)}\n`;

/** Writes one JSON line per tag; `-` writes to stdout. */
export async function writeTraceFile(targetPath: string, tags: readonly TraceTag[]): Promise<void> {
  if (targetPath === '-' || targetPath === '') {
    for (const tag of tags) {
      process.stdout.write(jsonLine(tag));
    }
    return;
  }

  const target = path.resolve(targetPath);
  mkdirSync(path.dirname(target), { recursive: true });
  const stream = createWriteStream(target, { flags: 'w' });
  await new Promise<void>((resolve, reject) => {
    stream.once('error', reject);
    stream.once('close', () => resolve());
    for (const tag of tags) {
      stream.write(jsonLine(tag));
    }
    stream.end();
  });
}
