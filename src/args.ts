/**
 * Command-line flags
 */

import type { GameConfig } from './games';

export interface CliOptions {
  help: boolean;
  theme?: string;
  mute: boolean;
  config: Partial<GameConfig>;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, mute: false, config: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--mute':
        options.mute = true;
        break;
      case '--blocking-cues':
        options.config.blockingCues = true;
        break;
      case '--theme': {
        const theme = argv[++i];
        if (theme === undefined) throw new Error('--theme expects a theme name');
        options.theme = theme;
        break;
      }
      case '--levels': {
        const raw = argv[++i];
        const levels = Number(raw);
        if (raw === undefined || !Number.isInteger(levels) || levels < 1) {
          throw new Error(`--levels expects a positive integer, got "${raw ?? ''}"`);
        }
        options.config.levelCount = levels;
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
