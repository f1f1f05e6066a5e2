#!/usr/bin/env node
import { resolveConfig, validateConfig } from './config';
import { runStartupChecks } from './bootstrap/startupChecks';
import { SessionController } from './core/SessionController';
import { FatalStartupError, describeError } from './errors';
import { StructuredLogger } from './logging/StructuredLogger';
import { FfmpegAudioSource } from './services/capture/FfmpegAudioSource';
import { ToggleHotkey } from './services/hotkey/ToggleHotkey';
import { createKeystrokeDriver } from './services/inject/KeystrokeDriver';
import { KeystrokeTyper } from './services/inject/KeystrokeTyper';
import { codecFor } from './services/transcription/codecs';
import { WebSocketTranscriptionConnector } from './services/transcription/WebSocketTranscriptionChannel';
import { AudioFormat } from './types';

let logger: StructuredLogger | undefined;

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new FatalStartupError(`Invalid HushType configuration:\n- ${configErrors.join('\n- ')}`);
  }

  logger = await StructuredLogger.create(config.logDir, config.logLevel);
  logger.info('HushType bootstrap started', {
    logPath: logger.getLogPath(),
    endpoint: config.endpoint,
    protocol: config.protocol,
    transcriptMode: config.transcriptMode
  });

  await runStartupChecks(config, logger);

  const audioFormat: AudioFormat = {
    sampleRate: config.sampleRate,
    channels: config.channels,
    frameDurationMs: config.frameDurationMs
  };

  const controller = new SessionController(
    {
      audio: new FfmpegAudioSource({
        ffmpegBin: config.ffmpegBin,
        inputFormat: config.audioInputFormat,
        inputDevice: config.audioInput,
        logger
      }),
      transcription: new WebSocketTranscriptionConnector({
        codec: codecFor(config.protocol),
        audioFormat,
        connectTimeoutMs: config.connectTimeoutMs,
        logger
      }),
      sink: new KeystrokeTyper({
        driver: createKeystrokeDriver(process.platform),
        typingDelayMs: config.typingDelayMs,
        logger
      })
    },
    {
      endpoint: config.endpoint,
      audioFormat,
      maxWaitMs: config.maxWaitMs,
      transcriptMode: config.transcriptMode
    },
    logger
  );

  const hotkey = new ToggleHotkey(config.hotkey, config.hotkeyCooldownMs, logger);
  await hotkey.start();

  const stop = (signal: NodeJS.Signals): void => {
    logger?.info('Shutdown requested', { signal });
    hotkey.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  process.stdout.write(`HushType ready. Press ${hotkey.describeBinding()} to start or stop dictation.\n`);

  await controller.run(hotkey.events());
  await controller.shutdown();

  logger.info('HushType stopped');
  await logger.flush();
};

bootstrap()
  .then(() => {
    process.exit(0);
  })
  .catch(async (error) => {
    const { code, detail } = describeError(error);
    logger?.error('Fatal bootstrap failure', { code, detail });
    await logger?.flush();
    process.stderr.write(`HushType startup error: ${detail}\n`);
    process.exit(1);
  });
