import { useEffect, useState } from 'react';
import { createLogger } from '../utils/logger';
import type { TokenCount, TokenCounter } from '../utils/tokenUtils';

const logger = createLogger('ui');

/**
 * Exact token count of `text`, filled in once the tokenizer answers. Stale
 * answers for a previous text are dropped.
 */
export const useTokenCount = (text: string, counter: TokenCounter): TokenCount | null => {
  const [tokenCount, setTokenCount] = useState<TokenCount | null>(null);

  useEffect(() => {
    let cancelled = false;
    setTokenCount(null);
    if (!text) return;

    counter.count(text).then(
      (result) => {
        if (!cancelled) setTokenCount(result);
      },
      (error: unknown) => {
        logger.error('Error getting token count:', error);
      }
    );

    return () => {
      cancelled = true;
    };
  }, [text, counter]);

  return tokenCount;
};
