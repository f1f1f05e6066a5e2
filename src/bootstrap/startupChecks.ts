import { FatalStartupError, errorDetail } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

interface ToolCheck {
  label: string;
  command: string;
  args: string[];
}

const CHECK_TIMEOUT_MS = 8000;

const keystrokeToolCheck = (platform: NodeJS.Platform): ToolCheck | undefined => {
  if (platform === 'linux') {
    return { label: 'xdotool', command: 'xdotool', args: ['version'] };
  }

  if (platform === 'darwin') {
    return { label: 'osascript', command: 'osascript', args: ['-e', 'return "ok"'] };
  }

  return undefined;
};

export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger | undefined,
  platform: NodeJS.Platform = process.platform,
  commandRunner: CommandRunner = runCommand
): Promise<void> => {
  logger?.info('Running startup checks');

  const checks: ToolCheck[] = [
    { label: 'ffmpeg', command: config.ffmpegBin, args: ['-version'] }
  ];

  const keystrokeCheck = keystrokeToolCheck(platform);
  if (!keystrokeCheck) {
    throw new FatalStartupError(`Keystroke injection is not supported on platform '${platform}'`);
  }
  checks.push(keystrokeCheck);

  for (const check of checks) {
    try {
      await commandRunner(check.command, check.args, { timeoutMs: CHECK_TIMEOUT_MS });
    } catch (error) {
      throw new FatalStartupError(
        `${check.label} is not available (${check.command}): ${errorDetail(error)}`,
        { cause: error }
      );
    }
  }

  logger?.info('Startup checks completed successfully');
};
