/**
 * CLI entry point for lane-jumper
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout
 * to the GameTerminal interface, so the game runs directly in
 * any terminal emulator with sound through the system player.
 */

import * as p from '@clack/prompts';
import { type CliOptions, parseArgs } from './args';
import type { AudioSink } from './audio/playback';
import { createProcessSink, createSilentSink } from './audio/sink';
import { type JumperController, runJumperGame, setTheme, TerminalTooSmallError } from './games';
import type { Disposable, GameTerminal, TerminalKeyEvent } from './games/terminal';
import { getThemeModes, isValidThemeMode } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends GameTerminal {
  cleanup: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  return data;
}

/**
 * onInterrupt runs on Ctrl-C, SIGINT and SIGTERM before the process exits
 */
function createNodeTerminal(onInterrupt: () => void): NodeTerminal {
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      interrupt();
      return;
    }

    const key = parseKey(data);
    for (const listener of [...keyListeners]) {
      listener({ key, domEvent: { key } });
    }
  });

  function interrupt() {
    onInterrupt();
    cleanup();
    process.exit(0);
  }

  function cleanup() {
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  // Supported by Warp, iTerm2, kitty, foot, WezTerm, etc.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  const terminal: NodeTerminal = {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (callback: (event: TerminalKeyEvent) => void): Disposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        }
      };
    },
    cleanup,
  };

  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  return terminal;
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  lane-jumper — Terminal side-scroller

  Usage:
    lane-jumper                    Play all levels
    lane-jumper --theme <theme>    Set color theme
    lane-jumper --levels <n>       Number of levels (default 3)
    lane-jumper --mute             No sound
    lane-jumper --blocking-cues    Jump/hit sounds pause the game while playing
    lane-jumper --help             Show this help

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    ← → / A D            Move along the lane
    Space / ↑ / W        Jump (press again in the air to double jump)
    Q / ESC              Quit
`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    p.log.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  if (options.help) {
    printHelp();
    process.exit(0);
  }

  if (options.theme !== undefined) {
    if (!isValidThemeMode(options.theme)) {
      p.log.error(`Unknown theme: ${options.theme}`);
      p.log.info(`Available themes: ${getThemeModes().join(', ')}`);
      process.exit(1);
    }
    setTheme(options.theme);
  }

  let sink: AudioSink = createSilentSink();
  let stopPlayers = () => {};
  if (!options.mute) {
    const processSink = createProcessSink();
    sink = processSink;
    stopPlayers = () => processSink.stopAll();
  }

  let controller: JumperController | undefined;
  // The session's own cleanup never runs once we exit, so players are killed here
  const terminal = createNodeTerminal(() => {
    controller?.stop();
    stopPlayers();
  });
  controller = runJumperGame(terminal, { sink, config: options.config });

  try {
    const result = await controller.finished;
    terminal.cleanup();

    if (!options.mute && !controller.audioAvailable) {
      const reason = controller.audioError instanceof Error ? controller.audioError.message : 'unknown error';
      p.log.warn(`Sound was unavailable: ${reason}`);
    }

    if (result.won) {
      p.outro(`All ${result.levelsCompleted} levels cleared with ${result.livesRemaining} spare lives.`);
    } else if (result.outcome === 'quit') {
      p.outro(`Quit after ${result.levelsCompleted} completed levels.`);
    } else {
      p.outro(`Game over after ${result.levelsCompleted} completed levels.`);
    }
    process.exit(0);
  } catch (err) {
    terminal.cleanup();
    if (err instanceof TerminalTooSmallError) {
      p.log.error(err.message);
      p.log.info('Make the terminal window larger and try again.');
    } else {
      p.log.error(err instanceof Error ? err.stack ?? err.message : String(err));
    }
    process.exit(1);
  }
}

void main();
