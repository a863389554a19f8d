/**
 * Shared utilities for the game
 *
 * Theme state, alternate screen handling and timing helpers. The theme is
 * configured by the consuming application via setTheme().
 */

import type { IDisposable } from '@xterm/xterm';
import { type SnakeTheme, type ThemeName, getThemeColors } from '../themes';
import type { TerminalSize } from './coords';

// ============================================================================
// Terminal Contract
// ============================================================================

/**
 * The slice of a terminal the game needs: output, size, raw input, resizes.
 * A Node stdin/stdout adapter and xterm.js (via fromXterm) both provide it.
 */
export interface GameTerminal {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  onData(listener: (data: string) => void): IDisposable;
  onResize(listener: (size: TerminalSize) => void): IDisposable;
  /** Input source failures; sources that cannot fail may omit it */
  onError?(listener: (error: Error) => void): IDisposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme - configured by the consuming application
 */
let currentTheme: ThemeName = 'classic';

/**
 * Set the current theme
 * Call this before starting a game; running sessions keep their theme
 */
export function setTheme(name: ThemeName): void {
  currentTheme = name;
}

/**
 * Get the current theme name
 */
export function getTheme(): ThemeName {
  return currentTheme;
}

/**
 * Get current theme colors
 */
export function getCurrentTheme(): SnakeTheme {
  return getThemeColors(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string }>();

/**
 * Enter alternate screen buffer and hide the cursor.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason });
  return true;
}

/**
 * Leave alternate screen buffer and show the cursor.
 * Safe to call multiple times - will log warning but not double-exit.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

/**
 * Check if terminal is currently in alternate buffer
 */
export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Timing
// ============================================================================

/**
 * Sleep helper. Resolves early (without rejecting) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
