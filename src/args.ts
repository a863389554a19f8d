/**
 * Command-line arguments for the tty-snake CLI
 */

import { type ThemeName, getThemeNames, isValidThemeName } from './themes';

export interface CliOptions {
  theme: ThemeName;
  debug: boolean;
  mouse: boolean;
  help: boolean;
  listThemes: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    theme: 'classic',
    debug: false,
    mouse: false,
    help: false,
    listThemes: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--themes':
        options.listThemes = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      case '--mouse':
        options.mouse = true;
        break;
      case '--theme': {
        const value = argv[i + 1];
        if (value === undefined) {
          throw new CliUsageError('--theme needs a value');
        }
        if (!isValidThemeName(value)) {
          throw new CliUsageError(`Unknown theme: ${value} (available: ${getThemeNames().join(', ')})`);
        }
        options.theme = value;
        i++;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

export function helpText(): string {
  return `
  tty-snake — Snake in your terminal

  Usage:
    tty-snake                    Start a game
    tty-snake --theme <theme>    Set color theme
    tty-snake --themes           List themes
    tty-snake --debug            Show the last input event under the board
    tty-snake --mouse            Capture mouse events (shown with --debug)
    tty-snake --help             Show this help

  Themes:
    ${getThemeNames().join(', ')}

  Controls:
    Arrow keys           Steer
    Q                    Quit
`;
}
