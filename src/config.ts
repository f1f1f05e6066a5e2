import os from 'node:os';
import path from 'node:path';
import { parseHotkey } from './services/hotkey/ToggleHotkey';
import { codecFor } from './services/transcription/codecs';
import { AppConfig, LogLevel, TranscriptMode, TranscriptProtocol } from './types';

type Env = Record<string, string | undefined>;

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const resolveProtocol = (value: string | undefined): TranscriptProtocol => {
  if (value === 'json-events') {
    return 'json-events';
  }

  return 'whisperlivekit';
};

const resolveTranscriptMode = (
  value: string | undefined,
  protocol: TranscriptProtocol
): TranscriptMode => {
  if (value === 'incremental' || value === 'cumulative') {
    return value;
  }

  return codecFor(protocol).finals;
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }

  return 'info';
};

interface AudioInputDefaults {
  format: string;
  device: string;
}

const getAudioInputDefaults = (platform: NodeJS.Platform): AudioInputDefaults => {
  if (platform === 'darwin') {
    return { format: 'avfoundation', device: ':0' };
  }

  return { format: 'pulse', device: 'default' };
};

export const resolveConfig = (
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform
): AppConfig => {
  const protocol = resolveProtocol(env.HUSHTYPE_PROTOCOL);
  const audioDefaults = getAudioInputDefaults(platform);

  return {
    endpoint: env.HUSHTYPE_ENDPOINT ?? 'ws://localhost:8000/asr',
    protocol,
    transcriptMode: resolveTranscriptMode(env.HUSHTYPE_TRANSCRIPT_MODE, protocol),
    hotkey: env.HUSHTYPE_HOTKEY ?? 'Ctrl+Alt+R',
    hotkeyCooldownMs: parseIntOrDefault(env.HUSHTYPE_HOTKEY_COOLDOWN_MS, 500),
    sampleRate: parseIntOrDefault(env.HUSHTYPE_SAMPLE_RATE, 16000),
    channels: parseIntOrDefault(env.HUSHTYPE_CHANNELS, 1),
    frameDurationMs: parseIntOrDefault(env.HUSHTYPE_FRAME_MS, 1000),
    maxWaitMs: parseIntOrDefault(env.HUSHTYPE_MAX_WAIT_MS, 10000),
    connectTimeoutMs: parseIntOrDefault(env.HUSHTYPE_CONNECT_TIMEOUT_MS, 10000),
    typingDelayMs: parseIntOrDefault(env.HUSHTYPE_TYPING_DELAY_MS, 15),
    ffmpegBin: env.HUSHTYPE_FFMPEG_BIN ?? 'ffmpeg',
    audioInputFormat: env.HUSHTYPE_AUDIO_INPUT_FORMAT ?? audioDefaults.format,
    audioInput: env.HUSHTYPE_AUDIO_INPUT ?? audioDefaults.device,
    logDir: env.HUSHTYPE_LOG_DIR ?? path.join(os.homedir(), '.local', 'state', 'hushtype', 'logs'),
    logLevel: resolveLogLevel(env.HUSHTYPE_LOG_LEVEL)
  };
};

const inRange = (value: number, min: number, max: number): boolean =>
  Number.isInteger(value) && value >= min && value <= max;

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!/^wss?:\/\/\S+$/i.test(config.endpoint)) {
    errors.push('HUSHTYPE_ENDPOINT must be a ws:// or wss:// URL.');
  }

  if (!['whisperlivekit', 'json-events'].includes(config.protocol)) {
    errors.push('HUSHTYPE_PROTOCOL must be one of: whisperlivekit, json-events.');
  }

  if (!['incremental', 'cumulative'].includes(config.transcriptMode)) {
    errors.push('HUSHTYPE_TRANSCRIPT_MODE must be one of: incremental, cumulative.');
  }

  if (!config.hotkey.trim()) {
    errors.push('HUSHTYPE_HOTKEY must not be empty.');
  } else {
    try {
      parseHotkey(config.hotkey);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      errors.push(`HUSHTYPE_HOTKEY is invalid: ${detail}`);
    }
  }

  if (!inRange(config.hotkeyCooldownMs, 0, 10000)) {
    errors.push('HUSHTYPE_HOTKEY_COOLDOWN_MS must be between 0 and 10000 milliseconds.');
  }

  if (!inRange(config.sampleRate, 8000, 48000)) {
    errors.push('HUSHTYPE_SAMPLE_RATE must be between 8000 and 48000.');
  }

  if (!inRange(config.channels, 1, 2)) {
    errors.push('HUSHTYPE_CHANNELS must be 1 or 2.');
  }

  if (!inRange(config.frameDurationMs, 20, 5000)) {
    errors.push('HUSHTYPE_FRAME_MS must be between 20 and 5000 milliseconds.');
  }

  if (!inRange(config.maxWaitMs, 100, 120000)) {
    errors.push('HUSHTYPE_MAX_WAIT_MS must be between 100 and 120000 milliseconds.');
  }

  if (!inRange(config.connectTimeoutMs, 500, 60000)) {
    errors.push('HUSHTYPE_CONNECT_TIMEOUT_MS must be between 500 and 60000 milliseconds.');
  }

  if (!inRange(config.typingDelayMs, 0, 1000)) {
    errors.push('HUSHTYPE_TYPING_DELAY_MS must be between 0 and 1000 milliseconds.');
  }

  if (!config.ffmpegBin.trim()) {
    errors.push('HUSHTYPE_FFMPEG_BIN must not be empty.');
  }

  if (!config.audioInputFormat.trim()) {
    errors.push('HUSHTYPE_AUDIO_INPUT_FORMAT must not be empty.');
  }

  if (!config.audioInput.trim()) {
    errors.push('HUSHTYPE_AUDIO_INPUT must not be empty.');
  }

  return errors;
};
