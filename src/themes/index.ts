/**
 * Terminal color themes
 *
 * ANSI escape codes for the playfield chrome (border, status line, banners).
 * Glyph colours are fixed: the player is blue, obstacles are red.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'ice'
  | 'bladerunner'
  | 'tron'
  | 'kawaii'
  | 'oled'
  | 'solarized'
  | 'nord'
  | 'highcontrast'
  | 'banana';

export interface ThemeColors {
  /** Display name */
  name: string;
  /** Border and status accent */
  accent: string;
  /** Banner text */
  banner: string;
}

export const themes: Record<PhosphorMode, ThemeColors> = {
  cyan: { name: 'Cyberpunk', accent: '\x1b[96m', banner: '\x1b[1;96m' },
  amber: { name: 'Fallout', accent: '\x1b[93m', banner: '\x1b[1;93m' },
  green: { name: 'Matrix', accent: '\x1b[92m', banner: '\x1b[1;92m' },
  white: { name: 'Ghost', accent: '\x1b[97m', banner: '\x1b[1;97m' },
  hotpink: { name: 'Synthwave', accent: '\x1b[95m', banner: '\x1b[1;95m' },
  blood: { name: 'Blood', accent: '\x1b[91m', banner: '\x1b[1;91m' },
  ice: { name: 'Ice', accent: '\x1b[96m', banner: '\x1b[1;97m' },
  bladerunner: { name: 'Blade Runner', accent: '\x1b[38;5;208m', banner: '\x1b[1;38;5;208m' },
  tron: { name: 'Tron', accent: '\x1b[96m', banner: '\x1b[1;96m' },
  kawaii: { name: 'Kawaii', accent: '\x1b[95m', banner: '\x1b[1;95m' },
  oled: { name: 'OLED', accent: '\x1b[97m', banner: '\x1b[1;97m' },
  solarized: { name: 'Solarized', accent: '\x1b[36m', banner: '\x1b[1;36m' },
  nord: { name: 'Nord', accent: '\x1b[96m', banner: '\x1b[1;96m' },
  highcontrast: { name: 'High Contrast', accent: '\x1b[97m', banner: '\x1b[1;97m' },
  banana: { name: 'Banana', accent: '\x1b[93m', banner: '\x1b[1;93m' },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get theme colors by mode
 */
export function getThemeColors(mode: PhosphorMode): ThemeColors {
  return themes[mode];
}

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode]?.accent ?? '\x1b[92m';
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return VALID_THEME_MODES.has(value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';
