import { Box, Text } from 'ink';
import type { TokenCount } from '../utils/tokenUtils';

interface StatusBarProps {
  tokenEstimate: number;
  exactTokens: TokenCount | null;
  selectedCount: number;
  failedCount: number;
  status: string | null;
}

const StatusBar = ({
  tokenEstimate,
  exactTokens,
  selectedCount,
  failedCount,
  status,
}: StatusBarProps) => {
  return (
    <Box justifyContent="space-between">
      <Text>
        <Text bold>~{tokenEstimate.toLocaleString('en-US')}</Text> tokens (est)
        {exactTokens && !exactTokens.isTokenEstimate && (
          <Text dimColor> | {exactTokens.tokenCount.toLocaleString('en-US')} o200k</Text>
        )}
        {' | '}
        {selectedCount} {selectedCount === 1 ? 'file' : 'files'} selected
        {failedCount > 0 && <Text color="red"> | {failedCount} unreadable</Text>}
      </Text>
      {status && <Text color="green">{status}</Text>}
    </Box>
  );
};

export default StatusBar;
