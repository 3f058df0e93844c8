import { useCallback, useEffect, useMemo, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import ErrorBanner from './components/ErrorBanner';
import OpenFolderPrompt from './components/OpenFolderPrompt';
import PreviewPane from './components/PreviewPane';
import Sidebar, { clampCursor } from './components/Sidebar';
import StatusBar from './components/StatusBar';
import { STATUS_MESSAGE_DURATION_MS } from './config';
import { useProjectSession } from './hooks/useProjectSession';
import { useTokenCount } from './hooks/useTokenCount';
import type { ProjectSession } from './utils/projectSession';
import type { TokenCounter } from './utils/tokenUtils';

type Focus = 'tree' | 'preview' | 'open';

interface AppProps {
  session: ProjectSession;
  initialRoot: string;
  tokenCounter: TokenCounter;
}

const KEY_HELP =
  'space toggle | arrows move/expand | a all | n none | e/c expand/collapse all | y copy | o open | tab preview | q quit';

const App = ({ session, initialRoot, tokenCounter }: AppProps) => {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const state = useProjectSession(session);
  const { tree } = state;

  const [expandedIds, setExpandedIds] = useState<ReadonlySet<number>>(new Set<number>());
  const [cursor, setCursor] = useState(0);
  const [focus, setFocus] = useState<Focus>('tree');
  const [previewOffset, setPreviewOffset] = useState(0);
  const [openPath, setOpenPath] = useState('');

  const exactTokens = useTokenCount(state.document, tokenCounter);

  const terminalRows = stdout.rows ?? 30;
  const paneHeight = Math.max(5, terminalRows - 8);

  useEffect(() => {
    session.load(initialRoot);
  }, [session, initialRoot]);

  // A new tree starts with only its root expanded
  useEffect(() => {
    setExpandedIds(new Set(tree ? [tree.root.id] : []));
    setCursor(0);
    setPreviewOffset(0);
  }, [tree]);

  useEffect(() => {
    if (!state.status) return;
    const timer = setTimeout(() => session.clearStatus(), STATUS_MESSAGE_DURATION_MS);
    return () => clearTimeout(timer);
  }, [state.status, session]);

  const rows = useMemo(() => (tree ? tree.visibleNodes(expandedIds) : []), [tree, expandedIds]);
  const currentNode = rows[clampCursor(cursor, rows.length)];

  // Collapsing can remove the rows below the cursor
  useEffect(() => {
    setCursor((prev) => clampCursor(prev, rows.length));
  }, [rows.length]);
  const previewLineCount = useMemo(() => state.document.split('\n').length, [state.document]);

  const setExpanded = useCallback((nodeId: number, expanded: boolean) => {
    setExpandedIds((prev) => {
      if (prev.has(nodeId) === expanded) return prev;
      const next = new Set(prev);
      if (expanded) next.add(nodeId);
      else next.delete(nodeId);
      return next;
    });
  }, []);

  const handleOpenSubmit = useCallback(
    (value: string) => {
      const target = value.trim();
      setFocus('tree');
      setOpenPath('');
      if (target) {
        session.load(target);
      }
    },
    [session]
  );

  useInput(
    (_input, key) => {
      if (key.escape) setFocus('tree');
    },
    { isActive: focus === 'open' }
  );

  useInput(
    (input, key) => {
      if (state.error) {
        session.dismissError();
        return;
      }

      if (input === 'q') {
        exit();
        return;
      }
      if (key.tab) {
        setFocus((prev) => (prev === 'tree' ? 'preview' : 'tree'));
        return;
      }
      if (input === 'y') {
        void session.copy();
        return;
      }
      if (input === 'o') {
        setFocus('open');
        return;
      }

      if (focus === 'preview') {
        const maxOffset = Math.max(0, previewLineCount - paneHeight);
        if (key.upArrow || input === 'k') setPreviewOffset((prev) => Math.max(0, prev - 1));
        else if (key.downArrow || input === 'j') setPreviewOffset((prev) => Math.min(maxOffset, prev + 1));
        else if (key.pageUp) setPreviewOffset((prev) => Math.max(0, prev - paneHeight));
        else if (key.pageDown || input === ' ') {
          setPreviewOffset((prev) => Math.min(maxOffset, prev + paneHeight));
        }
        return;
      }

      if (!tree || !currentNode) return;

      if (key.upArrow || input === 'k') {
        setCursor((prev) => Math.max(0, prev - 1));
      } else if (key.downArrow || input === 'j') {
        setCursor((prev) => clampCursor(prev + 1, rows.length));
      } else if (input === ' ') {
        session.toggle(currentNode.id);
      } else if (key.rightArrow || input === 'l' || key.return) {
        if (currentNode.kind === 'directory') {
          setExpanded(currentNode.id, key.return ? !expandedIds.has(currentNode.id) : true);
        }
      } else if (key.leftArrow || input === 'h') {
        if (currentNode.kind === 'directory' && expandedIds.has(currentNode.id)) {
          setExpanded(currentNode.id, false);
        } else if (currentNode.parentId !== null) {
          const parentRow = rows.findIndex((row) => row.id === currentNode.parentId);
          if (parentRow >= 0) setCursor(parentRow);
        }
      } else if (input === 'a') {
        session.selectAll();
      } else if (input === 'n') {
        session.deselectAll();
      } else if (input === 'e') {
        setExpandedIds(new Set(tree.directoryIds()));
      } else if (input === 'c') {
        setExpandedIds(new Set([tree.root.id]));
        setCursor(0);
      }
    },
    { isActive: focus !== 'open' }
  );

  return (
    <Box flexDirection="column">
      <Text bold color="cyan">
        Context Studio{state.rootPath ? ` - ${state.rootPath}` : ''}
      </Text>
      {state.error && <ErrorBanner error={state.error} />}
      {focus === 'open' && (
        <OpenFolderPrompt value={openPath} onChange={setOpenPath} onSubmit={handleOpenSubmit} />
      )}
      <Box flexDirection="row">
        <Sidebar
          rows={rows}
          expandedIds={expandedIds}
          cursor={cursor}
          height={paneHeight}
          isFocused={focus === 'tree'}
        />
        <PreviewPane
          content={state.document}
          scrollOffset={previewOffset}
          height={paneHeight}
          isFocused={focus === 'preview'}
        />
      </Box>
      <StatusBar
        tokenEstimate={state.tokenEstimate}
        exactTokens={exactTokens}
        selectedCount={state.selectedCount}
        failedCount={state.failedFiles.length}
        status={state.status}
      />
      <Text dimColor>{KEY_HELP}</Text>
    </Box>
  );
};

export default App;
