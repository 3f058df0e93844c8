import { strict as assert } from 'node:assert';
import * as path from 'node:path';
import { after, test } from 'node:test';
import { buildContext, formatFileBlock } from '../src/utils/contentFormatUtils';
import { createRecordingLogger, createTempTree, removeTempTree, type TreeSpec } from './fixtures';

const PREAMBLE =
  '# Context Injection\n\nThe following codebase context was automatically defined as important for this prompt:\n\n';

const roots: string[] = [];
const tempTree = (spec: TreeSpec): string => {
  const root = createTempTree(spec);
  roots.push(root);
  return root;
};

after(() => {
  for (const root of roots) removeTempTree(root);
});

test('header, then each selected file as a fenced block, in selection order', () => {
  const root = tempTree({
    'a.txt': 'hello',
    sub: { 'b.py': 'print(1)' },
    'context_header.md': 'INTRO',
  });

  const result = buildContext(root, [path.join(root, 'a.txt'), path.join(root, 'sub', 'b.py')]);

  assert.equal(
    result.content,
    PREAMBLE +
      'INTRO\n\n' +
      '## File: a.txt\n```txt\nhello\n```\n\n' +
      '## File: sub/b.py\n```py\nprint(1)\n```\n'
  );
  assert.ok(result.content.startsWith('# Context Injection'));
  assert.deepEqual(result.includedFiles, [path.join(root, 'a.txt'), path.join(root, 'sub', 'b.py')]);
  assert.equal(result.tokenEstimate, Math.floor(result.content.length / 4));
});

test('without any selection the document is the preamble alone', () => {
  const root = tempTree({});

  const result = buildContext(root, []);

  assert.equal(
    result.content,
    '# Context Injection\n\nThe following codebase context was automatically defined as important for this prompt:\n'
  );
});

test('footer is trimmed and placed last; selected header and footer are not repeated as blocks', () => {
  const root = tempTree({
    'context_header.md': '\n  Read this first.  \n',
    'context_footer.md': 'Answer briefly.\n\n',
    'main.go': 'package main',
  });

  const result = buildContext(root, [
    path.join(root, 'context_header.md'),
    path.join(root, 'main.go'),
    path.join(root, 'context_footer.md'),
  ]);

  assert.equal(
    result.content,
    PREAMBLE +
      'Read this first.\n\n' +
      '## File: main.go\n```go\npackage main\n```\n\n' +
      '\nAnswer briefly.'
  );
  assert.deepEqual(result.includedFiles, [path.join(root, 'main.go')]);
});

test('a header file in a subdirectory is an ordinary file', () => {
  const root = tempTree({ docs: { 'context_header.md': 'nested' } });

  const result = buildContext(root, [path.join(root, 'docs', 'context_header.md')]);

  assert.equal(result.content, PREAMBLE + '## File: docs/context_header.md\n```md\nnested\n```\n');
});

test('zero-byte files contribute neither a heading nor a block', () => {
  const root = tempTree({ 'empty.ts': '', 'full.ts': 'x' });

  const result = buildContext(root, [path.join(root, 'empty.ts'), path.join(root, 'full.ts')]);

  assert.equal(result.content, PREAMBLE + '## File: full.ts\n```ts\nx\n```\n');
  assert.deepEqual(result.omittedEmptyFiles, [path.join(root, 'empty.ts')]);
});

test('a file holding only a byte-order mark has no text and is omitted like a zero-byte file', () => {
  const root = tempTree({ 'bom-only.md': Buffer.from([0xef, 0xbb, 0xbf]), 'full.ts': 'x' });

  const result = buildContext(root, [path.join(root, 'bom-only.md'), path.join(root, 'full.ts')]);

  assert.equal(result.content, PREAMBLE + '## File: full.ts\n```ts\nx\n```\n');
  assert.deepEqual(result.omittedEmptyFiles, [path.join(root, 'bom-only.md')]);
  assert.deepEqual(result.failedFiles, []);
});

test('file text that starts like a placeholder is ordinary content', () => {
  const root = tempTree({ 'notes.md': '[Error: Permission denied] is what a failed read shows' });

  const result = buildContext(root, [path.join(root, 'notes.md')]);

  assert.equal(
    result.content,
    PREAMBLE + '## File: notes.md\n```md\n[Error: Permission denied] is what a failed read shows\n```\n'
  );
  assert.deepEqual(result.failedFiles, []);
  assert.deepEqual(result.includedFiles, [path.join(root, 'notes.md')]);
});

test('a header whose text starts like a placeholder is still inserted', () => {
  const root = tempTree({
    'context_header.md': '[Error: File not found] means the file vanished.\n',
    'a.txt': 'hello',
  });

  const result = buildContext(root, [path.join(root, 'a.txt')]);

  assert.equal(
    result.content,
    PREAMBLE +
      '[Error: File not found] means the file vanished.\n\n' +
      '## File: a.txt\n```txt\nhello\n```\n'
  );
});

test('oversized and vanished files show their placeholder in the block', () => {
  const root = tempTree({ 'big.log': 'too long' });

  const result = buildContext(root, [path.join(root, 'big.log'), path.join(root, 'gone.txt')], {
    maxBytes: 5,
  });

  assert.equal(
    result.content,
    PREAMBLE +
      '## File: big.log\n```log\n[Error: File too large to include (8 bytes)]\n```\n\n' +
      '## File: gone.txt\n```txt\n[Error: File not found]\n```\n'
  );
  assert.deepEqual(result.failedFiles, [
    { path: path.join(root, 'big.log'), reason: 'too-large' },
    { path: path.join(root, 'gone.txt'), reason: 'not-found' },
  ]);
});

test('unusable header and footer files are left out silently', () => {
  const root = tempTree({
    'context_header.md': '   \n\t',
    'context_footer.md': 'this footer is longer than the limit',
    'a.txt': 'ok',
  });

  const result = buildContext(root, [path.join(root, 'a.txt')], { maxBytes: 10 });

  assert.equal(result.content, PREAMBLE + '## File: a.txt\n```txt\nok\n```\n');
  assert.doesNotMatch(result.content, /\[Error/);
});

test('language tags are lower-cased extensions, text when there is none', () => {
  const root = tempTree({ 'README.MD': 'r', Makefile: 'all:', '.gitignore': 'dist' });

  const result = buildContext(root, [
    path.join(root, 'README.MD'),
    path.join(root, 'Makefile'),
    path.join(root, '.gitignore'),
  ]);

  assert.equal(
    result.content,
    PREAMBLE +
      '## File: README.MD\n```md\nr\n```\n\n' +
      '## File: Makefile\n```text\nall:\n```\n\n' +
      '## File: .gitignore\n```text\ndist\n```\n'
  );
});

test('files outside the root are shown by base name and logged', () => {
  const root = tempTree({ project: {}, 'outside.txt': 'elsewhere' });
  const { logger, entries } = createRecordingLogger();

  const result = buildContext(path.join(root, 'project'), [path.join(root, 'outside.txt')], {
    logger,
  });

  assert.equal(result.content, PREAMBLE + '## File: outside.txt\n```txt\nelsewhere\n```\n');
  assert.deepEqual(
    entries.filter((entry) => entry.level === 'error').map((entry) => entry.message),
    [`File ${path.join(root, 'outside.txt')} is not relative to root ${path.join(root, 'project')}`]
  );
});

test('content is emitted verbatim, trailing newlines included', () => {
  assert.equal(formatFileBlock('x.sh', 'sh', 'echo hi\n'), '## File: x.sh\n```sh\necho hi\n\n```\n');
});
