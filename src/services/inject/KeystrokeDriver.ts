import { FatalStartupError } from '../../errors';
import { CommandRunner, runCommand } from '../process/runCommand';
import keysyms from './keysyms.json';

const KEYSYMS: Readonly<Record<string, string>> = keysyms;
const COMMAND_TIMEOUT_MS = 2000;

/** Low-level key injection for a single character. */
export interface KeystrokeDriver {
  press(character: string): Promise<void>;
  release(character: string): Promise<void>;
}

export const keysymFor = (character: string): string => {
  const named = KEYSYMS[character];
  if (named) {
    return named;
  }

  if (/^[A-Za-z0-9]$/.test(character)) {
    return character;
  }

  const codePoint = character.codePointAt(0) ?? 0;
  return `U${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
};

/** X11 injection through `xdotool keydown` / `xdotool keyup`. */
export class XdotoolKeystrokeDriver implements KeystrokeDriver {
  public constructor(
    private readonly commandRunner: CommandRunner = runCommand,
    private readonly binary = 'xdotool'
  ) {}

  public async press(character: string): Promise<void> {
    await this.commandRunner(this.binary, ['keydown', keysymFor(character)], {
      timeoutMs: COMMAND_TIMEOUT_MS
    });
  }

  public async release(character: string): Promise<void> {
    await this.commandRunner(this.binary, ['keyup', keysymFor(character)], {
      timeoutMs: COMMAND_TIMEOUT_MS
    });
  }
}

const osascriptArgsForKeystroke = (character: string): string[] =>
  character === '\n'
    ? ['-e', 'tell application "System Events" to key code 36']
    : [
        '-e',
        'on run argv',
        '-e',
        'tell application "System Events" to keystroke (item 1 of argv)',
        '-e',
        'end run',
        '--',
        character
      ];

/**
 * macOS injection through System Events. `keystroke` presses and releases in one call,
 * so `release` has nothing left to do.
 */
export class OsascriptKeystrokeDriver implements KeystrokeDriver {
  public constructor(private readonly commandRunner: CommandRunner = runCommand) {}

  public async press(character: string): Promise<void> {
    await this.commandRunner('osascript', osascriptArgsForKeystroke(character), {
      timeoutMs: COMMAND_TIMEOUT_MS
    });
  }

  public async release(_character: string): Promise<void> {
    return;
  }
}

export const createKeystrokeDriver = (
  platform: NodeJS.Platform,
  commandRunner: CommandRunner = runCommand
): KeystrokeDriver => {
  if (platform === 'linux') {
    return new XdotoolKeystrokeDriver(commandRunner);
  }

  if (platform === 'darwin') {
    return new OsascriptKeystrokeDriver(commandRunner);
  }

  throw new FatalStartupError(`Keystroke injection is not supported on platform '${platform}'`);
};
