import { Box, Text } from 'ink';
import type { SelectionNode } from '../types/FileTypes';
import TreeItem from './TreeItem';

interface SidebarProps {
  rows: SelectionNode[];
  expandedIds: ReadonlySet<number>;
  cursor: number;
  height: number;
  isFocused: boolean;
}

/** Keeps the cursor on an existing row after rows disappear */
export function clampCursor(cursor: number, rowCount: number): number {
  return Math.max(0, Math.min(cursor, rowCount - 1));
}

/** First row to show so that the cursor stays inside a window of `height` rows */
export function scrollOffsetFor(cursor: number, rowCount: number, height: number): number {
  if (rowCount <= height) return 0;
  const centered = cursor - Math.floor(height / 2);
  return Math.max(0, Math.min(centered, rowCount - height));
}

/**
 * The file tree: the rows of every expanded directory, windowed around the
 * cursor.
 */
const Sidebar = ({ rows, expandedIds, cursor, height, isFocused }: SidebarProps) => {
  const offset = scrollOffsetFor(cursor, rows.length, height);
  const visibleRows = rows.slice(offset, offset + height);

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={isFocused ? 'cyan' : 'gray'}
      width="40%"
    >
      <Text bold>Project Files</Text>
      {rows.length === 0 ? (
        <Text dimColor>No files found in this folder.</Text>
      ) : (
        visibleRows.map((node, index) => (
          <TreeItem
            key={node.id}
            node={node}
            checkState={node.checkState}
            isExpanded={expandedIds.has(node.id)}
            isCursor={isFocused && offset + index === cursor}
          />
        ))
      )}
    </Box>
  );
};

export default Sidebar;
