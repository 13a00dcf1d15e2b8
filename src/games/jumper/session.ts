/**
 * Lane Jumper - Session
 *
 * Plays levels 1..levelCount in order. Lives left over at the end of a
 * level carry into the next one on top of the free life every level
 * starts with. A failed or quit level ends the session.
 */

import { synthesizeBackgroundTrack } from '../../audio/synth';
import { type LevelDeps, type LevelOutcome, runLevel } from './loop';
import { assertPlayfieldFits } from './physics';
import { renderBanner } from './render';

export interface SessionState {
  currentLevel: number;
  carriedLives: number;
}

export interface SessionResult {
  won: boolean;
  levelsCompleted: number;
  livesRemaining: number;
  /** How the last level played ended */
  outcome: LevelOutcome;
}

export interface SessionDeps extends LevelDeps {
  onLevelStart?: (state: Readonly<SessionState>) => void;
}

export const VICTORY_MESSAGE = 'CONGRATULATIONS! YOU WON!';

export async function runSession(deps: SessionDeps): Promise<SessionResult> {
  const { config, audio, cues, surface, clock } = deps;

  // Refuse before any tick rather than drawing off-grid mid-game
  assertPlayfieldFits(surface.cols, surface.rows);

  const session: SessionState = { currentLevel: 1, carriedLives: 0 };
  let levelsCompleted = 0;

  try {
    for (let level = 1; level <= config.levelCount; level++) {
      if (deps.shouldStop?.()) {
        return { won: false, levelsCompleted, livesRemaining: session.carriedLives, outcome: 'quit' };
      }

      session.currentLevel = level;
      deps.onLevelStart?.(session);

      audio.startBackground(
        synthesizeBackgroundTrack(level, config.backgroundTrackSeconds, config.sampleRate, deps.random),
      );

      const result = await runLevel(level, 1 + session.carriedLives, deps);
      if (!result.completed) {
        return { won: false, levelsCompleted, livesRemaining: result.livesRemaining, outcome: result.reason };
      }

      levelsCompleted++;
      session.carriedLives = result.livesRemaining;
    }

    await audio.playBlocking(cues.win);
    surface.write(renderBanner(surface.cols, surface.rows, VICTORY_MESSAGE));
    await clock.sleep(config.bannerPauseMs);

    return { won: true, levelsCompleted, livesRemaining: session.carriedLives, outcome: 'completed' };
  } finally {
    audio.stopBackground();
  }
}
