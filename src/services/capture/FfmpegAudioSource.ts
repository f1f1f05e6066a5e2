import { ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { DeviceError } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AudioFormat, AudioFrame } from '../../types';
import { AudioHandle, AudioSource, frameByteSize } from './AudioSource';
import { PcmFrameReader } from './PcmFrameReader';

const START_STABILITY_DELAY_MS = 300;
const STOP_KILL_TIMEOUT_MS = 1500;

export interface FfmpegAudioSourceOptions {
  ffmpegBin: string;
  inputFormat: string;
  inputDevice: string;
  logger?: StructuredLogger;
}

export const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant microphone access to the terminal running HushType and retry.';
  }

  if (/Input\/output error|No such file|device not found|could not find|No such process|Connection refused/i.test(detail)) {
    return 'Microphone input device is unavailable. Check HUSHTYPE_AUDIO_INPUT_FORMAT and HUSHTYPE_AUDIO_INPUT.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

export const buildFfmpegArgs = (options: FfmpegAudioSourceOptions, format: AudioFormat): string[] => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-f',
  options.inputFormat,
  '-i',
  options.inputDevice,
  '-ac',
  String(format.channels),
  '-ar',
  String(format.sampleRate),
  '-f',
  's16le',
  '-acodec',
  'pcm_s16le',
  'pipe:1'
];

class FfmpegAudioHandle implements AudioHandle {
  private closePromise: Promise<void> | undefined;

  public constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly reader: PcmFrameReader,
    private readonly logger?: StructuredLogger
  ) {}

  public read(): Promise<AudioFrame> {
    return this.reader.read();
  }

  public close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.stopProcess();
    }

    return this.closePromise;
  }

  private async stopProcess(): Promise<void> {
    this.reader.fail(new DeviceError('Audio source closed'));

    const current = this.child;
    if (current.exitCode !== null || current.signalCode !== null) {
      return;
    }

    await new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        current.kill('SIGKILL');
      }, STOP_KILL_TIMEOUT_MS);

      current.once('close', () => {
        clearTimeout(killTimer);
        resolve();
      });

      current.kill('SIGINT');
    });

    this.logger?.info('Audio capture stopped');
  }
}

/** Captures microphone PCM through an ffmpeg child process writing s16le to stdout. */
export class FfmpegAudioSource implements AudioSource {
  public constructor(private readonly options: FfmpegAudioSourceOptions) {}

  public async open(format: AudioFormat): Promise<AudioHandle> {
    const frameBytes = frameByteSize(format);
    const args = buildFfmpegArgs(this.options, format);
    const ffmpeg = spawn(this.options.ffmpegBin, args, { stdio: 'pipe' });
    const reader = new PcmFrameReader(ffmpeg.stdout, frameBytes);
    let stderrLog = '';
    let settled = false;

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.on('close', (code, signal) => {
      reader.fail(new DeviceError(normalizeMicError(`${stderrLog}\nexit code=${code ?? signal ?? 'unknown'}`)));
    });

    ffmpeg.on('error', (error) => {
      reader.fail(new DeviceError(normalizeMicError(error.message), { cause: error }));
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new DeviceError(normalizeMicError(error.message), { cause: error }));
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          settled = true;
          if (ffmpeg.exitCode !== null) {
            reject(new DeviceError(normalizeMicError(stderrLog)));
            return;
          }

          resolve();
        }, START_STABILITY_DELAY_MS);
      });
    });

    this.options.logger?.info('Audio capture started', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: format.sampleRate,
      channels: format.channels,
      frameBytes
    });

    return new FfmpegAudioHandle(ffmpeg, reader, this.options.logger);
  }
}
