import readline from 'readline';
import { createDictationRuntime } from './container';
import { env } from './env';
import { log } from './log';
import { metricsText } from './metrics';

const HELP = [
  'Enter     start / stop dictation',
  'c Enter   cancel the current recording',
  'q Enter   quit',
].join('\n');

async function main(): Promise<void> {
  const runtime = await createDictationRuntime();
  const { session, indicator } = runtime;

  indicator.onChange((state) => {
    const detail = state.kind === 'error' ? `: ${state.message}` : '';
    process.stderr.write(`[${state.kind}${detail}]\n`);
  });

  await session.prepare();
  process.stderr.write(`${HELP}\n`);

  // A line-oriented terminal has no key-up, so Enter toggles press and release.
  let held = false;
  const rl = readline.createInterface({ input: process.stdin, terminal: false });

  let shutdownReason = 'stdin_closed';
  const shutdown = async (): Promise<void> => {
    log.info({ event: 'shutdown', reason: shutdownReason }, 'shutting down');
    rl.close();
    await session.dispose();
    runtime.historySearcher.dispose();
    indicator.dispose();
    if (env.LOG_METRICS_ON_EXIT) {
      process.stderr.write(await metricsText());
    }
  };

  rl.on('line', (line) => {
    const command = line.trim().toLowerCase();
    if (command === 'q') {
      shutdownReason = 'quit';
      rl.close();
      return;
    }
    if (command === 'c') {
      held = false;
      session.interrupt();
      return;
    }
    if (!held) {
      held = true;
      session.press();
    } else {
      held = false;
      session.release();
    }
  });

  rl.on('close', () => {
    shutdown().catch((error: unknown) => {
      log.error({ event: 'shutdown_failed', err: error }, 'shutdown failed');
      process.exitCode = 1;
    });
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdownReason = signal;
      rl.close();
    });
  }
}

main().catch((error: unknown) => {
  log.fatal({ event: 'startup_failed', err: error }, 'dictation runtime failed to start');
  process.exitCode = 1;
});
