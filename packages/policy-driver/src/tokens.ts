import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { resolve as resolvePath } from 'node:path';

import { Ajv, type ErrorObject, type SchemaObject } from 'ajv';
import { PolicyError, type FormatToken, type Token } from '@splitfmt/policy-core';

export interface TokenStream {
  readonly tokens: readonly Token[];
}

const require = createRequire(import.meta.url);

function loadSchema(name: string): SchemaObject {
  const candidates = [`../schema/${name}`, `../../../../packages/policy-driver/schema/${name}`];
  for (const candidate of candidates) {
    try {
      return require(candidate);
    } catch {
      continue;
    }
  }
  throw new Error(`Unable to load schema ${name}`);
}

const ajv = new Ajv({ allErrors: true, strict: true });
const validateTokenStream = ajv.compile<TokenStream>(loadSchema('token-stream.schema.json'));

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return 'unknown error';
  }
  return errors
    .map((error) => {
      const instance = error.instancePath || '/';
      const message = error.message ?? 'validation error';
      return `${instance} ${message}`;
    })
    .join(', ');
}

/** Validates a token stream and checks that token ends strictly increase. */
export function parseTokenStream(value: unknown): readonly Token[] {
  if (!validateTokenStream(value)) {
    throw new PolicyError(
      'E_TOKEN_SCHEMA',
      `token stream failed validation: ${formatErrors(validateTokenStream.errors)}`,
      validateTokenStream.errors,
    );
  }
  const { tokens } = value;
  tokens.forEach((token, index) => {
    if (token.start > token.end) {
      throw new PolicyError('E_TOKEN_ORDER', `token ${index} starts at ${token.start} after its end ${token.end}`);
    }
    const previous = index > 0 ? tokens[index - 1] : undefined;
    if (previous && token.end <= previous.end) {
      throw new PolicyError('E_TOKEN_ORDER', `token ${index} ends at ${token.end}, not after ${previous.end}`);
    }
  });
  return tokens;
}

export async function loadTokenStream(filePath: string): Promise<readonly Token[]> {
  const raw = await readFile(resolvePath(filePath), 'utf8');
  return parseTokenStream(JSON.parse(raw));
}

export function pairTokens(tokens: readonly Token[]): FormatToken[] {
  const boundaries: FormatToken[] = [];
  for (let index = 0; index + 1 < tokens.length; index += 1) {
    boundaries.push(Object.freeze({ index, left: tokens[index], right: tokens[index + 1] }));
  }
  return boundaries;
}
