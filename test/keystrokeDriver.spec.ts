import { describe, expect, it } from 'vitest';
import { FatalStartupError } from '../src/errors';
import {
  OsascriptKeystrokeDriver,
  XdotoolKeystrokeDriver,
  createKeystrokeDriver,
  keysymFor
} from '../src/services/inject/KeystrokeDriver';
import { CommandRunner } from '../src/services/process/runCommand';

const recordingRunner = () => {
  const calls: Array<{ command: string; args: string[] }> = [];
  const runner: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    return { stdout: '', stderr: '' };
  };
  return { calls, runner };
};

describe('keysymFor', () => {
  it('maps letters and digits to themselves', () => {
    expect(keysymFor('a')).toBe('a');
    expect(keysymFor('Z')).toBe('Z');
    expect(keysymFor('7')).toBe('7');
  });

  it('names whitespace and punctuation', () => {
    expect(keysymFor(' ')).toBe('space');
    expect(keysymFor('\n')).toBe('Return');
    expect(keysymFor('.')).toBe('period');
    expect(keysymFor('?')).toBe('question');
  });

  it('falls back to unicode keysyms', () => {
    expect(keysymFor('é')).toBe('U00E9');
    expect(keysymFor('😀')).toBe('U1F600');
  });
});

describe('XdotoolKeystrokeDriver', () => {
  it('sends keydown then keyup for the keysym', async () => {
    const { calls, runner } = recordingRunner();
    const driver = new XdotoolKeystrokeDriver(runner);

    await driver.press(',');
    await driver.release(',');

    expect(calls).toEqual([
      { command: 'xdotool', args: ['keydown', 'comma'] },
      { command: 'xdotool', args: ['keyup', 'comma'] }
    ]);
  });
});

describe('OsascriptKeystrokeDriver', () => {
  it('passes the character as an argument and presses return by key code', async () => {
    const { calls, runner } = recordingRunner();
    const driver = new OsascriptKeystrokeDriver(runner);

    await driver.press('"');
    await driver.release('"');
    await driver.press('\n');

    expect(calls).toHaveLength(2);
    expect(calls[0]?.args.at(-1)).toBe('"');
    expect(calls[1]?.args).toEqual(['-e', 'tell application "System Events" to key code 36']);
  });
});

describe('createKeystrokeDriver', () => {
  it('picks a driver per platform', () => {
    const { runner } = recordingRunner();

    expect(createKeystrokeDriver('linux', runner)).toBeInstanceOf(XdotoolKeystrokeDriver);
    expect(createKeystrokeDriver('darwin', runner)).toBeInstanceOf(OsascriptKeystrokeDriver);
    expect(() => createKeystrokeDriver('win32', runner)).toThrow(FatalStartupError);
  });
});
