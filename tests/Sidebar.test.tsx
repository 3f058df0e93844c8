import { strict as assert } from 'node:assert';
import { test } from 'node:test';
import { render } from 'ink-testing-library';
import Sidebar, { clampCursor, scrollOffsetFor } from '../src/components/Sidebar';
import { stripAnsi } from './fixtures';

test('clampCursor pulls the cursor back onto the last remaining row', () => {
  // cursor was on row 6 of 7, then a directory collapsed to leave 3 rows
  assert.equal(clampCursor(6, 3), 2);
  assert.equal(clampCursor(1, 3), 1);
  assert.equal(clampCursor(-1, 3), 0);
  assert.equal(clampCursor(4, 0), 0);
});

test('scrollOffsetFor keeps the cursor centred inside the window', () => {
  assert.equal(scrollOffsetFor(3, 4, 10), 0);
  assert.equal(scrollOffsetFor(2, 20, 5), 0);
  assert.equal(scrollOffsetFor(10, 20, 5), 8);
  assert.equal(scrollOffsetFor(19, 20, 5), 15);
});

test('Sidebar tells the user when the folder has no files', () => {
  const { lastFrame, unmount } = render(
    <Sidebar rows={[]} expandedIds={new Set<number>()} cursor={0} height={5} isFocused />
  );

  const frame = stripAnsi(lastFrame() ?? '');
  assert.match(frame, /Project Files/);
  assert.match(frame, /No files found in this folder\./);
  unmount();
});
