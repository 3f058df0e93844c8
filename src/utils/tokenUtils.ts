import { createHash } from 'node:crypto';
import { createLogger, type Logger } from './logger';

export type EncoderLike = {
  encode: (text: string) => Uint32Array | number[];
};

export type EncoderLoader = () => Promise<EncoderLike | null>;

export interface TokenCount {
  tokenCount: number;
  isTokenEstimate: boolean;
}

export interface TokenCounter {
  count: (text: string) => Promise<TokenCount>;
  clear: () => void;
}

export interface TokenCounterOptions {
  loadEncoder?: EncoderLoader;
  logger?: Logger;
}

/**
 * Rough size of `text` in LLM tokens: one token per four characters, rounded
 * down. A heuristic for display, not a tokenizer.
 */
export function estimateTokenCount(text: string): number {
  if (!text) return 0;
  return Math.floor(text.length / 4);
}

/** Cache key covering the whole text, so documents that share a long prefix never collide. */
export function hashText(text: string): string {
  return `${text.length}:${createHash('sha1').update(text).digest('base64')}`;
}

function sanitizeForEncoding(text: string): string {
  return text.replace(/<\|endoftext\|>/g, '');
}

const tokenizerLogger = createLogger('tokenizer');

async function loadTiktokenEncoder(): Promise<EncoderLike | null> {
  try {
    const mod = await import('tiktoken');
    if (mod && typeof mod.get_encoding === 'function') {
      return mod.get_encoding('o200k_base');
    }
    return null;
  } catch (error) {
    tokenizerLogger.error('Failed to initialize offline tokenizer:', error);
    return null;
  }
}

/**
 * Counts tokens with the o200k_base encoding once it has loaded, falling back
 * to `estimateTokenCount` while it cannot. Results are cached per text hash.
 */
export function createTokenCounter(options: TokenCounterOptions = {}): TokenCounter {
  const loadEncoder = options.loadEncoder ?? loadTiktokenEncoder;
  const logger = options.logger ?? tokenizerLogger;
  const tokenCache = new Map<string, TokenCount>();
  let encoderPromise: Promise<EncoderLike | null> | null = null;

  const getEncoder = async (): Promise<EncoderLike | null> => {
    if (!encoderPromise) {
      encoderPromise = loadEncoder();
    }
    const encoder = await encoderPromise;
    if (!encoder) {
      // allow a later call to retry
      encoderPromise = null;
    }
    return encoder;
  };

  const count = async (text: string): Promise<TokenCount> => {
    if (!text) return { tokenCount: 0, isTokenEstimate: false };

    const key = hashText(text);
    const cached = tokenCache.get(key);
    if (cached) {
      return cached;
    }

    let result: TokenCount;
    try {
      const encoder = await getEncoder();
      result = encoder
        ? { tokenCount: encoder.encode(sanitizeForEncoding(text)).length, isTokenEstimate: false }
        : { tokenCount: estimateTokenCount(text), isTokenEstimate: true };
    } catch (error) {
      logger.error('Error counting tokens:', error);
      result = { tokenCount: estimateTokenCount(text), isTokenEstimate: true };
    }

    // estimates are not cached so an encoder that loads later replaces them
    if (!result.isTokenEstimate) {
      tokenCache.set(key, result);
    }
    return result;
  };

  return {
    count,
    clear: () => tokenCache.clear(),
  };
}
