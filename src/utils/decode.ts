// src/utils/decode.ts

import { parse as parseYaml, YAMLParseError } from 'yaml';
import { DecodeError, errorMessage } from './errors';

export function decodeText(buffer: Buffer, encoding: BufferEncoding = 'utf8'): string {
  const text = buffer.toString(encoding);
  // Strip a UTF-8 byte order mark so JSON and YAML parse cleanly
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Parse JSON, reporting the byte offset of the failure when the engine gives one.
 */
export function decodeJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    const message = errorMessage(error);
    const match = /at position (\d+)/.exec(message);
    throw new DecodeError(
      `Invalid JSON in ${source}: ${message}`,
      match ? { offset: Number(match[1]) } : {},
      { source }
    );
  }
}

/**
 * Parse YAML, reporting line and column (1-based) of the first problem.
 */
export function decodeYaml(text: string, source: string): unknown {
  try {
    return parseYaml(text);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const start = error.linePos?.[0];
      throw new DecodeError(
        `Invalid YAML in ${source}: ${error.message}`,
        { offset: error.pos[0], line: start?.line, column: start?.col },
        { source }
      );
    }
    throw new DecodeError(`Invalid YAML in ${source}: ${errorMessage(error)}`, {}, { source });
  }
}
