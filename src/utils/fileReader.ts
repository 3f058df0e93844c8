import * as fs from 'node:fs';
import { MAX_FILE_SIZE_BYTES } from '../config';
import type { ReadErrorReason, ReadResult, TextEncodingName } from '../types/FileTypes';
import { getErrorCode, getErrorMessage } from './errors';
import { type Logger, silentLogger } from './logger';

export interface ReadOptions {
  maxBytes?: number;
  logger?: Logger;
}

interface TextDecoderStep {
  encoding: TextEncodingName;
  /** Returns null when the bytes are not valid for this encoding */
  decode: (data: Buffer) => string | null;
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

const decodeUtf8 = (data: Buffer): string | null => {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(data);
  } catch {
    return null;
  }
};

// Tried in order; the first decoder that accepts the bytes wins.
const DECODERS: readonly TextDecoderStep[] = [
  {
    encoding: 'utf-8',
    decode: (data) => (data.subarray(0, 3).equals(UTF8_BOM) ? null : decodeUtf8(data)),
  },
  {
    encoding: 'utf-8-bom',
    decode: (data) => (data.subarray(0, 3).equals(UTF8_BOM) ? decodeUtf8(data.subarray(3)) : null),
  },
  {
    // Latin-1 maps every byte, so NUL is the only thing it turns away
    encoding: 'latin1',
    decode: (data) => (data.includes(0) ? null : data.toString('latin1')),
  },
];

const PLACEHOLDERS = {
  notFound: '[Error: File not found]',
  metadata: '[Error: Could not access file metadata]',
  tooLarge: (size: number) => `[Error: File too large to include (${size} bytes)]`,
  permissionDenied: '[Error: Permission denied]',
  binary: '[Error: Binary or unsupported encoding]',
  system: (message: string) => `[Error: System error ${message}]`,
};

const failure = (reason: ReadErrorReason, placeholder: string): ReadResult => ({
  kind: 'error',
  reason,
  placeholder,
});

/**
 * Reads a file as text under the size ceiling. Never throws: every failure is
 * returned as an `error` result carrying the placeholder shown in its place.
 */
export function readFileSafe(filePath: string, options: ReadOptions = {}): ReadResult {
  const logger = options.logger ?? silentLogger;
  const maxBytes = options.maxBytes ?? MAX_FILE_SIZE_BYTES;

  let size: number;
  try {
    const stats = fs.statSync(filePath, { throwIfNoEntry: false });
    if (!stats) {
      // deleted after the scan
      logger.warn(`File not found during read: ${filePath}`);
      return failure('not-found', PLACEHOLDERS.notFound);
    }
    size = stats.size;
  } catch (error) {
    logger.error(`Could not stat file ${filePath}: ${getErrorMessage(error)}`);
    return failure('metadata', PLACEHOLDERS.metadata);
  }

  if (size > maxBytes) {
    logger.warn(`File skipped (too large: ${size} bytes): ${filePath}`);
    return failure('too-large', PLACEHOLDERS.tooLarge(size));
  }
  if (size === 0) {
    return { kind: 'empty' };
  }

  let data: Buffer;
  try {
    data = fs.readFileSync(filePath);
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      logger.error(`Permission denied reading file: ${filePath}`);
      return failure('permission-denied', PLACEHOLDERS.permissionDenied);
    }
    if (code === 'ENOENT') {
      logger.warn(`File not found during read: ${filePath}`);
      return failure('not-found', PLACEHOLDERS.notFound);
    }
    logger.error(`OS error reading file ${filePath}: ${getErrorMessage(error)}`);
    return failure('system', PLACEHOLDERS.system(getErrorMessage(error)));
  }

  for (const decoder of DECODERS) {
    const text = decoder.decode(data);
    if (text !== null) {
      if (decoder.encoding !== 'utf-8') {
        logger.debug(`Decoded ${filePath} as ${decoder.encoding}`);
      }
      return { kind: 'content', text, encoding: decoder.encoding };
    }
  }

  logger.warn(`Could not decode file: ${filePath}`);
  return failure('binary', PLACEHOLDERS.binary);
}

/** The inline form of a result: the text, an empty string, or the placeholder. */
export function renderReadResult(result: ReadResult): string {
  switch (result.kind) {
    case 'content':
      return result.text;
    case 'empty':
      return '';
    case 'error':
      return result.placeholder;
  }
}
