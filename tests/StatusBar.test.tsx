import { strict as assert } from 'node:assert';
import { test } from 'node:test';
import { render } from 'ink-testing-library';
import StatusBar from '../src/components/StatusBar';
import { stripAnsi } from './fixtures';

test('StatusBar shows the estimate and a singular file count', () => {
  const { lastFrame, unmount } = render(
    <StatusBar tokenEstimate={1234} exactTokens={null} selectedCount={1} failedCount={0} status={null} />
  );

  assert.equal(stripAnsi(lastFrame() ?? ''), '~1,234 tokens (est) | 1 file selected');
  unmount();
});

test('StatusBar adds the exact count and unreadable files when known', () => {
  const { lastFrame, unmount } = render(
    <StatusBar
      tokenEstimate={50}
      exactTokens={{ tokenCount: 1200, isTokenEstimate: false }}
      selectedCount={3}
      failedCount={2}
      status={null}
    />
  );

  assert.equal(
    stripAnsi(lastFrame() ?? ''),
    '~50 tokens (est) | 1,200 o200k | 3 files selected | 2 unreadable'
  );
  unmount();
});

test('StatusBar hides an exact count that is only an estimate', () => {
  const { lastFrame, unmount } = render(
    <StatusBar
      tokenEstimate={0}
      exactTokens={{ tokenCount: 0, isTokenEstimate: true }}
      selectedCount={0}
      failedCount={0}
      status={null}
    />
  );

  assert.equal(stripAnsi(lastFrame() ?? ''), '~0 tokens (est) | 0 files selected');
  unmount();
});

test('StatusBar puts the status message at the right edge', () => {
  const { lastFrame, unmount } = render(
    <StatusBar tokenEstimate={8} exactTokens={null} selectedCount={2} failedCount={0} status="Copied to clipboard!" />
  );

  const frame = stripAnsi(lastFrame() ?? '');
  assert.match(frame, /^~8 tokens \(est\) \| 2 files selected +Copied to clipboard!$/);
  unmount();
});
