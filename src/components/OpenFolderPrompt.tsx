import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

interface OpenFolderPromptProps {
  value: string;
  onChange: (value: string) => void;
  onSubmit: (value: string) => void;
}

const OpenFolderPrompt = ({ value, onChange, onSubmit }: OpenFolderPromptProps) => (
  <Box borderStyle="round" borderColor="cyan" paddingX={1}>
    <Text>Open folder: </Text>
    <TextInput value={value} onChange={onChange} onSubmit={onSubmit} placeholder="path/to/project" />
    <Text dimColor>  (Esc to cancel)</Text>
  </Box>
);

export default OpenFolderPrompt;
