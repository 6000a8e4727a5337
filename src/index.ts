/**
 * Council decision engine
 *
 * Entry point: runs one decision for the utterance given on the command
 * line and prints the result as JSON.
 *
 *   node dist/src/index.js [--mode quick|war|meeting|darbar] <utterance...>
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';
import { isDecisionMode, type DecisionMode } from './types/mode.js';

let container: Container | undefined;

interface CliArgs {
  mode?: DecisionMode;
  text: string;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const words: string[] = [];
  let mode: DecisionMode | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg === '--mode') {
      const value = argv[++i] ?? '';
      if (!isDecisionMode(value)) {
        throw new Error(`Unknown mode "${value}"`);
      }
      mode = value;
    } else {
      words.push(arg);
    }
  }

  const args: CliArgs = { text: words.join(' ').trim() };
  if (mode) args.mode = mode;
  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.text) {
    process.stderr.write('Usage: council-engine [--mode quick|war|meeting|darbar] <utterance>\n');
    process.exitCode = 2;
    return;
  }

  container = await createContainerAsync();
  const { logger, engine } = container;

  logger.info({ mode: args.mode ?? container.router.currentMode }, 'Engine ready');

  const result = await engine.decide({
    text: args.text,
    ...(args.mode && { mode: args.mode }),
  });
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);

  await container.shutdown();
}

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  process.exitCode = 1;
});

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to run:', error);
  process.exit(1);
});
