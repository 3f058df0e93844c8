import * as path from 'node:path';
import { render } from 'ink';
import App from './App';
import { parseCliArgs, USAGE } from './utils/cliArgs';
import { getErrorMessage } from './utils/errors';
import { createLogger, initLogging, shutdownLogging } from './utils/logger';
import { ProjectSession } from './utils/projectSession';
import { createTokenCounter } from './utils/tokenUtils';

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  if (parsed.kind === 'error') {
    process.stderr.write(`${parsed.message}\n\n${USAGE}\n`);
    return 2;
  }

  const { options } = parsed;
  initLogging({ logFile: options.logFile, level: options.logLevel });
  const logger = createLogger('main');

  try {
    const session = new ProjectSession({ excludedDirNames: options.excludedDirNames });
    const initialRoot = path.resolve(options.rootPath ?? process.cwd());
    logger.info(`Starting with root ${initialRoot}`);

    const instance = render(
      <App session={session} initialRoot={initialRoot} tokenCounter={createTokenCounter()} />
    );
    await instance.waitUntilExit();
    session.dispose();
    return 0;
  } catch (error) {
    logger.error(`Failed to initialize application: ${getErrorMessage(error)}`, error);
    process.stderr.write(`An unexpected error occurred: ${getErrorMessage(error)}\n`);
    return 1;
  } finally {
    await shutdownLogging();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Fatal: ${getErrorMessage(error)}\n`);
    process.exitCode = 1;
  }
);
