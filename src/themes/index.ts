/**
 * Terminal color themes
 *
 * ANSI escape codes for each part of the board.
 */

/**
 * Available theme identifiers
 */
export type ThemeName = 'classic' | 'cyan' | 'amber' | 'green' | 'mono';

export interface SnakeTheme {
  /** Display name */
  name: string;
  /** Snake body */
  snake: string;
  /** Board border */
  border: string;
  /** Logo banner */
  logo: string;
  /** Score line and debug trace */
  text: string;
}

export const ANSI_RESET = '\x1b[0m';

/**
 * All theme definitions
 */
export const themes: Record<ThemeName, SnakeTheme> = {
  classic: {
    name: 'Classic',
    snake: '\x1b[31m',
    border: '\x1b[37m',
    logo: '\x1b[31;2m',
    text: '\x1b[37m',
  },
  cyan: {
    name: 'Cyberpunk',
    snake: '\x1b[96m',
    border: '\x1b[36m',
    logo: '\x1b[1;95m',
    text: '\x1b[96m',
  },
  amber: {
    name: 'Fallout',
    snake: '\x1b[93m',
    border: '\x1b[33m',
    logo: '\x1b[1;33m',
    text: '\x1b[33m',
  },
  green: {
    name: 'Matrix',
    snake: '\x1b[92m',
    border: '\x1b[32m',
    logo: '\x1b[1;92m',
    text: '\x1b[32m',
  },
  mono: {
    name: 'Ghost',
    snake: '\x1b[97m',
    border: '\x1b[2;37m',
    logo: '\x1b[1;97m',
    text: '\x1b[37m',
  },
};

/**
 * Get theme definition
 */
export function getThemeColors(name: ThemeName): SnakeTheme {
  return themes[name];
}

/**
 * Get all theme names, default first
 */
export function getThemeNames(): ThemeName[] {
  return ['classic', 'cyan', 'amber', 'green', 'mono'];
}

/**
 * Check if a string is a valid theme name
 */
export function isValidThemeName(value: string): value is ThemeName {
  return getThemeNames().some(name => name === value);
}
