import { useMemo } from 'react';
import { Box, Text } from 'ink';

interface PreviewPaneProps {
  content: string;
  scrollOffset: number;
  height: number;
  isFocused: boolean;
}

export function clampPreviewOffset(offset: number, lineCount: number, height: number): number {
  return Math.max(0, Math.min(offset, lineCount - height));
}

const PreviewPane = ({ content, scrollOffset, height, isFocused }: PreviewPaneProps) => {
  const lines = useMemo(() => (content ? content.split('\n') : []), [content]);
  const offset = clampPreviewOffset(scrollOffset, lines.length, height);

  return (
    <Box
      flexDirection="column"
      flexGrow={1}
      borderStyle="round"
      borderColor={isFocused ? 'cyan' : 'gray'}
    >
      <Text bold>
        Context Preview
        {lines.length > height && (
          <Text dimColor>
            {' '}
            (lines {offset + 1}-{Math.min(offset + height, lines.length)} of {lines.length})
          </Text>
        )}
      </Text>
      {lines.length === 0 ? (
        <Text dimColor>Select files in the tree to build the context.</Text>
      ) : (
        lines.slice(offset, offset + height).map((line, index) => (
          <Text key={offset + index} wrap="truncate-end">
            {line || ' '}
          </Text>
        ))
      )}
    </Box>
  );
};

export default PreviewPane;
