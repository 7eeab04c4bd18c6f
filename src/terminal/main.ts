#!/usr/bin/env node
import { emitKeypressEvents } from 'node:readline';
import { createInterface } from 'node:readline/promises';
import { createProjectStore } from '../lib/store/index';
import { createTracker, startTicker } from '../lib/tracker/index';
import { DEFAULT_TRACKER_SETTINGS } from '../lib/config';
import { resolveDataFile } from './paths';
import { HELP_LINE, createExpiryAlert, renderStatusLine } from './status-line';
import { intentForKey, type KeyInfo, type TerminalIntent } from './keys';
import { onShutdownSignals } from './signals';

const CLEAR_LINE = '\x1b[K';

function setRawMode(enabled: boolean): void {
  if (process.stdin.isTTY) process.stdin.setRawMode(enabled);
}

async function main(): Promise<void> {
  const filePath = resolveDataFile(process.argv[1] ?? __filename);
  const tracker = createTracker({
    store: createProjectStore({ filePath }),
    initialProject: process.argv[2] ?? null,
  });
  const settings = DEFAULT_TRACKER_SETTINGS;

  let prompting = false;
  let closed = false;
  const alertOnExpiry = createExpiryAlert();
  const draw = (snapshot = tracker.getSnapshot()) => {
    const bell = alertOnExpiry(snapshot);
    if (!prompting) process.stdout.write(`${bell}\r${renderStatusLine(snapshot)}${CLEAR_LINE}`);
  };

  async function ask(question: string): Promise<string> {
    prompting = true;
    setRawMode(false);
    process.stdout.write('\n');
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
      process.stdin.resume();
      setRawMode(true);
      prompting = false;
      draw();
    }
  }

  const stopTicker = startTicker(() => tracker.getSnapshot(), draw, settings.tickIntervalMs);
  const unsubscribe = tracker.subscribe(draw);

  function quit(): void {
    if (closed) return;
    closed = true;
    removeSignalHandlers();
    stopTicker();
    unsubscribe();
    tracker.shutdown();
    process.stdout.write(`\r${renderStatusLine(tracker.getSnapshot())}${CLEAR_LINE}\n`);
    process.stdin.off('keypress', onKeypress);
    setRawMode(false);
    process.stdin.pause();
  }

  async function handle(intent: TerminalIntent | null): Promise<void> {
    switch (intent) {
      case 'toggle':
        tracker.toggle();
        break;
      case 'add':
        tracker.adjust(settings.adjustStepSeconds);
        break;
      case 'remove':
        tracker.adjust(-settings.adjustStepSeconds);
        break;
      case 'reset': {
        const answer = await ask('Reset the timer to zero? [y/N] ');
        tracker.reset(() => answer.toLowerCase() === 'y');
        break;
      }
      case 'switch': {
        const name = await ask('Project name: ');
        if (name.length > 0) tracker.switchProject(name);
        break;
      }
      case 'countdown':
        tracker.selectCountdown(settings.countdownSeconds);
        break;
      case 'quit':
        quit();
        break;
      case null:
        break;
    }
  }

  function onKeypress(input: string | undefined, key: KeyInfo | undefined): void {
    if (prompting) return;
    handle(intentForKey(input, key)).catch((err: unknown) => {
      console.error('[terminal] Failed to handle key:', err);
    });
  }

  const removeSignalHandlers = onShutdownSignals(quit);

  console.info(`[terminal] Data file: ${filePath}`);
  console.info(HELP_LINE);
  emitKeypressEvents(process.stdin);
  setRawMode(true);
  process.stdin.on('keypress', onKeypress);
  process.stdin.resume();
  draw();
}

main().catch((err: unknown) => {
  console.error('[terminal] Failed to start:', err);
  process.exitCode = 1;
});
