import { describe, expect, it } from 'vitest';
import { runStartupChecks } from '../src/bootstrap/startupChecks';
import { resolveConfig } from '../src/config';
import { FatalStartupError } from '../src/errors';
import { CommandRunner } from '../src/services/process/runCommand';

const runnerFailingOn = (failing?: string) => {
  const commands: string[] = [];
  const runner: CommandRunner = async (command, args) => {
    commands.push([command, ...args].join(' '));
    if (command === failing) {
      throw new Error(`spawn ${command} ENOENT`);
    }
    return { stdout: '', stderr: '' };
  };
  return { commands, runner };
};

describe('runStartupChecks', () => {
  it('probes ffmpeg and xdotool on Linux', async () => {
    const { commands, runner } = runnerFailingOn();

    await runStartupChecks(resolveConfig({}, 'linux'), undefined, 'linux', runner);

    expect(commands).toEqual(['ffmpeg -version', 'xdotool version']);
  });

  it('probes osascript on macOS', async () => {
    const { commands, runner } = runnerFailingOn();

    await runStartupChecks(resolveConfig({ HUSHTYPE_FFMPEG_BIN: '/opt/bin/ffmpeg' }, 'darwin'), undefined, 'darwin', runner);

    expect(commands).toEqual(['/opt/bin/ffmpeg -version', 'osascript -e return "ok"']);
  });

  it('fails fatally when a tool is missing', async () => {
    const { commands, runner } = runnerFailingOn('ffmpeg');

    const checking = runStartupChecks(resolveConfig({}, 'linux'), undefined, 'linux', runner);

    await expect(checking).rejects.toBeInstanceOf(FatalStartupError);
    await expect(checking).rejects.toThrow('ffmpeg is not available (ffmpeg): spawn ffmpeg ENOENT');
    expect(commands).toEqual(['ffmpeg -version']);
  });

  it('refuses platforms without keystroke injection', async () => {
    const { commands, runner } = runnerFailingOn();

    await expect(runStartupChecks(resolveConfig({}, 'win32'), undefined, 'win32', runner)).rejects.toThrow(
      "Keystroke injection is not supported on platform 'win32'"
    );
    expect(commands).toEqual([]);
  });
});
