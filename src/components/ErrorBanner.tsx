import { Box, Text } from 'ink';
import type { SessionError } from '../utils/projectSession';

interface ErrorBannerProps {
  error: SessionError;
}

const ErrorBanner = ({ error }: ErrorBannerProps) => (
  <Box flexDirection="column" borderStyle="double" borderColor="red" paddingX={1}>
    <Text bold color="red">
      {error.title}
    </Text>
    <Text>{error.message}</Text>
    <Text dimColor>Press any key to dismiss.</Text>
  </Box>
);

export default ErrorBanner;
