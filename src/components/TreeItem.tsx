import { memo } from 'react';
import { Text } from 'ink';
import type { CheckState, SelectionNode } from '../types/FileTypes';

export const CHECKBOX_GLYPHS: Record<CheckState, string> = {
  checked: '[x]',
  partial: '[-]',
  unchecked: '[ ]',
};

interface TreeItemProps {
  node: SelectionNode;
  /** Passed separately because nodes are updated in place and memo compares props */
  checkState: CheckState;
  isExpanded: boolean;
  isCursor: boolean;
}

/**
 * Text of one tree row: indentation by depth, expander for directories,
 * checkbox, then the name (directories end in `/`).
 */
export function formatTreeRow(
  node: Pick<SelectionNode, 'name' | 'kind' | 'depth'>,
  checkState: CheckState,
  isExpanded: boolean
): string {
  const indent = '  '.repeat(node.depth);
  const expander = node.kind === 'directory' ? (isExpanded ? 'v' : '>') : ' ';
  const label = node.kind === 'directory' ? `${node.name}/` : node.name;
  return `${indent}${expander} ${CHECKBOX_GLYPHS[checkState]} ${label}`;
}

const TreeItem = ({ node, checkState, isExpanded, isCursor }: TreeItemProps) => {
  const color =
    checkState === 'checked' ? 'green' : checkState === 'partial' ? 'yellow' : undefined;

  return (
    <Text color={color} inverse={isCursor} wrap="truncate-end">
      {formatTreeRow(node, checkState, isExpanded)}
    </Text>
  );
};

// Wrap the component with React.memo to prevent unnecessary re-renders
export default memo(TreeItem);
