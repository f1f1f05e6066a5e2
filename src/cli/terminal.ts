import readline from 'node:readline';
import { resolveConfig, validateConfig } from '../config';
import { SessionController } from '../core/SessionController';
import { FfmpegAudioSource } from '../services/capture/FfmpegAudioSource';
import { TerminalSink } from '../services/inject/KeystrokeTyper';
import { codecFor } from '../services/transcription/codecs';
import { WebSocketTranscriptionConnector } from '../services/transcription/WebSocketTranscriptionChannel';
import { AudioFormat, ToggleEvent } from '../types';
import { AsyncQueue } from '../util/AsyncQueue';

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  <enter>             Start/stop dictation\n');
  process.stdout.write('  /status             Print current state\n');
  process.stdout.write('  /help               Show this help\n');
  process.stdout.write('  /quit               Exit\n');
  process.stdout.write('\n');
};

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

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
        inputDevice: config.audioInput
      }),
      transcription: new WebSocketTranscriptionConnector({
        codec: codecFor(config.protocol),
        audioFormat,
        connectTimeoutMs: config.connectTimeoutMs
      }),
      sink: new TerminalSink()
    },
    {
      endpoint: config.endpoint,
      audioFormat,
      maxWaitMs: config.maxWaitMs,
      transcriptMode: config.transcriptMode
    }
  );

  controller.on('stateChanged', (state) => {
    process.stdout.write(`[${state}]\n`);
  });

  controller.on('partialTranscript', (text) => {
    process.stdout.write(`  ~ ${text}\n`);
  });

  controller.on('sessionCompleted', (result) => {
    process.stdout.write('\n--- session completed ---\n');
    process.stdout.write(`finals: ${result.finalCount}\n`);
    process.stdout.write(`frames: ${result.framesSent}\n`);
    process.stdout.write(`drain: ${result.drainReason}\n`);
    if (result.usedPartialFallback) {
      process.stdout.write('(from last partial)\n');
    }
    process.stdout.write('-------------------------\n\n');
  });

  process.stdout.write(`Recognizer: ${config.endpoint} (${config.protocol}, ${config.transcriptMode})\n`);
  process.stdout.write(`Capture: ${config.ffmpegBin} -f ${config.audioInputFormat} -i ${config.audioInput}\n`);
  printHelp();

  const toggles = new AsyncQueue<ToggleEvent>();
  const running = controller.run(toggles);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    toggles.end();
    await running;
    await controller.shutdown();
    rl.close();
    process.stdout.write('\nBye.\n');
    process.exit(0);
  };

  const requestShutdown = (): void => {
    shutdown().catch((error) => {
      const detail = error instanceof Error ? error.message : String(error);
      process.stderr.write(`\n[error] ${detail}\n`);
      process.exit(1);
    });
  };

  process.on('SIGINT', requestShutdown);
  rl.on('close', requestShutdown);

  rl.on('line', (line) => {
    const input = line.trim();

    if (input === '/quit') {
      requestShutdown();
      return;
    }

    if (input === '/status') {
      process.stdout.write(`[status] state=${controller.getState()}\n`);
      return;
    }

    if (input === '/help') {
      printHelp();
      return;
    }

    if (input.length > 0) {
      process.stdout.write('Unknown command. Use /help, /status, or /quit.\n');
      return;
    }

    toggles.push({ at: Date.now() });
  });
};

main().catch((error) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
