import { EventEmitter } from 'node:events';
import { describeError } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { AudioHandle, AudioSource } from '../services/capture/AudioSource';
import { OutputSink } from '../services/inject/KeystrokeTyper';
import {
  TranscriptionChannel,
  TranscriptionConnector
} from '../services/transcription/TranscriptionChannel';
import {
  AudioFormat,
  AudioFrame,
  DrainReason,
  SessionResult,
  SessionState,
  ToggleEvent,
  TranscriptMode
} from '../types';
import { TranscriptAccumulator } from './TranscriptAccumulator';

export interface SessionDependencies {
  audio: AudioSource;
  transcription: TranscriptionConnector;
  sink: OutputSink;
}

export interface SessionOptions {
  endpoint: string;
  audioFormat: AudioFormat;
  maxWaitMs: number;
  transcriptMode: TranscriptMode;
}

class StopSignal {
  public readonly promise: Promise<void>;
  private release: (() => void) | undefined;

  public constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  public fire(): void {
    this.release?.();
  }
}

interface ActiveSession {
  id: number;
  accumulator: TranscriptAccumulator;
  stopSignal: StopSignal;
  stopRequested: boolean;
  acceptingEvents: boolean;
  framesSent: number;
  channel?: TranscriptionChannel;
  audio?: AudioHandle;
  pump?: Promise<void>;
  collector?: Promise<void>;
}

export declare interface SessionController {
  on(event: 'stateChanged', listener: (state: SessionState) => void): this;
  on(event: 'partialTranscript', listener: (text: string) => void): this;
  on(event: 'finalTranscript', listener: (text: string) => void): this;
  on(event: 'sessionCompleted', listener: (result: SessionResult) => void): this;
}

/**
 * Owns the dictation session lifecycle: idle → recording → draining → finalizing → idle.
 *
 * A toggle while draining is dropped. A toggle while finalizing waits until the transcript
 * has been typed and is then judged against `idle`.
 */
export class SessionController extends EventEmitter {
  private state: SessionState = 'idle';
  private session: ActiveSession | undefined;
  private sessionDone: Promise<void> | undefined;
  private nextSessionId = 1;

  public constructor(
    private readonly deps: SessionDependencies,
    private readonly options: SessionOptions,
    private readonly logger?: StructuredLogger
  ) {
    super();
  }

  public getState(): SessionState {
    return this.state;
  }

  /** Consumes toggle events until the sequence ends. */
  public async run(toggles: AsyncIterable<ToggleEvent>): Promise<void> {
    for await (const toggle of toggles) {
      this.logger?.debug('Toggle received', { at: toggle.at, state: this.state });
      await this.toggle();
    }
  }

  /**
   * Starts a session when idle (resolving once capture and streaming run) or stops the
   * recording one (resolving once draining has begun).
   */
  public async toggle(): Promise<void> {
    if (this.state === 'idle') {
      await this.startSession();
      return;
    }

    if (this.state === 'recording' && this.session) {
      this.beginDrain(this.session, 'stop requested');
      return;
    }

    if (this.state === 'finalizing') {
      this.logger?.info('Toggle held until the transcript is typed');
      await this.waitForIdle();
      await this.toggle();
      return;
    }

    this.logger?.info('Toggle ignored while the session is stopping', { state: this.state });
  }

  public async waitForIdle(): Promise<void> {
    while (this.session) {
      await this.sessionDone;
    }
  }

  /** Stops a recording session the way a toggle would and waits for it to finish. */
  public async shutdown(): Promise<void> {
    if (this.session && this.state === 'recording') {
      this.beginDrain(this.session, 'shutdown');
    }

    await this.waitForIdle();
  }

  private async startSession(): Promise<void> {
    const session: ActiveSession = {
      id: this.nextSessionId++,
      accumulator: new TranscriptAccumulator(),
      stopSignal: new StopSignal(),
      stopRequested: false,
      acceptingEvents: true,
      framesSent: 0
    };

    this.session = session;
    this.setState('recording');
    this.logger?.info('Session started', {
      sessionId: session.id,
      endpoint: this.options.endpoint,
      sampleRate: this.options.audioFormat.sampleRate,
      frameDurationMs: this.options.audioFormat.frameDurationMs
    });

    const opened = this.openSession(session);
    this.sessionDone = this.runSession(session, opened);
    await opened;
  }

  private async runSession(session: ActiveSession, opened: Promise<void>): Promise<void> {
    let drainReason: DrainReason = 'not-connected';

    try {
      await opened;
      await session.stopSignal.promise;
      drainReason = await this.drain(session);
    } catch (error) {
      this.logger?.error('Session failed unexpectedly', {
        sessionId: session.id,
        ...describeError(error)
      });
    }

    await this.finalize(session, drainReason);
  }

  private async openSession(session: ActiveSession): Promise<void> {
    let channel: TranscriptionChannel;
    try {
      channel = await this.deps.transcription.connect(this.options.endpoint);
    } catch (error) {
      this.logger?.warn('Recognizer unavailable; session ends without output', {
        sessionId: session.id,
        ...describeError(error)
      });
      this.beginDrain(session, 'connect failed');
      return;
    }

    session.channel = channel;
    session.collector = this.collect(session, channel);

    if (session.stopRequested) {
      return;
    }

    let audio: AudioHandle;
    try {
      audio = await this.deps.audio.open(this.options.audioFormat);
    } catch (error) {
      this.logger?.warn('Audio capture unavailable; session ends early', {
        sessionId: session.id,
        ...describeError(error)
      });
      this.beginDrain(session, 'audio unavailable');
      return;
    }

    session.audio = audio;

    if (session.stopRequested) {
      return;
    }

    session.pump = this.pump(session, audio, channel);
  }

  private beginDrain(session: ActiveSession, reason: string): void {
    if (session.stopRequested) {
      return;
    }

    session.stopRequested = true;
    if (this.session === session && this.state === 'recording') {
      this.setState('draining');
    }

    this.logger?.info('Session stopping', { sessionId: session.id, reason });
    session.stopSignal.fire();
  }

  private async pump(
    session: ActiveSession,
    audio: AudioHandle,
    channel: TranscriptionChannel
  ): Promise<void> {
    while (!session.stopRequested) {
      let frame: AudioFrame;
      try {
        frame = await audio.read();
      } catch (error) {
        if (!session.stopRequested) {
          this.logger?.warn('Audio capture failed mid-session; draining', {
            sessionId: session.id,
            framesSent: session.framesSent,
            ...describeError(error)
          });
          this.beginDrain(session, 'audio device failed');
        }
        return;
      }

      if (session.stopRequested) {
        return;
      }

      try {
        await channel.send(frame);
        session.framesSent += 1;
      } catch (error) {
        if (!session.stopRequested) {
          this.logger?.warn('Audio send failed mid-session; draining', {
            sessionId: session.id,
            framesSent: session.framesSent,
            ...describeError(error)
          });
          this.beginDrain(session, 'send failed');
        }
        return;
      }
    }
  }

  private async collect(session: ActiveSession, channel: TranscriptionChannel): Promise<void> {
    try {
      for await (const event of channel.events()) {
        if (!session.acceptingEvents || event.kind === 'end') {
          break;
        }

        if (event.kind === 'partial') {
          session.accumulator.setPartial(event.text);
          this.emit('partialTranscript', event.text);
          continue;
        }

        session.accumulator.appendFinal(event.text);
        this.emit('finalTranscript', event.text);
      }
    } catch (error) {
      this.logger?.warn('Transcript stream failed', {
        sessionId: session.id,
        ...describeError(error)
      });
    }
  }

  private async drain(session: ActiveSession): Promise<DrainReason> {
    const { audio, channel, collector } = session;

    // Closing capture releases a pending read so the pump exits.
    if (audio) {
      await this.closeQuietly(session, 'audio source', () => audio.close());
    }
    await session.pump;

    if (!channel || !collector) {
      return 'not-connected';
    }

    try {
      await channel.signalEndOfAudio();
    } catch (error) {
      this.logger?.warn('End-of-audio signal failed', {
        sessionId: session.id,
        ...describeError(error)
      });
    }

    return this.waitForResults(session, collector);
  }

  private async waitForResults(session: ActiveSession, collector: Promise<void>): Promise<DrainReason> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<DrainReason>((resolve) => {
      timer = setTimeout(() => {
        session.acceptingEvents = false;
        resolve('deadline');
      }, this.options.maxWaitMs);
    });

    try {
      return await Promise.race([collector.then((): DrainReason => 'end-of-stream'), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async finalize(session: ActiveSession, drainReason: DrainReason): Promise<void> {
    session.acceptingEvents = false;

    const { audio, channel } = session;
    if (channel) {
      await this.closeQuietly(session, 'recognizer channel', () => channel.close());
    }
    await session.collector;
    this.setState('finalizing');

    if (audio) {
      await this.closeQuietly(session, 'audio source', () => audio.close());
    }

    const reduced = session.accumulator.reduce(this.options.transcriptMode);
    const result: SessionResult = {
      sessionId: session.id,
      text: reduced.text,
      finalCount: reduced.finalCount,
      usedPartialFallback: reduced.usedPartialFallback,
      drainReason,
      framesSent: session.framesSent
    };

    this.logger?.info('Session finished', {
      sessionId: session.id,
      drainReason,
      finalCount: result.finalCount,
      usedPartialFallback: result.usedPartialFallback,
      framesSent: result.framesSent,
      outputLength: result.text.length
    });

    if (result.text) {
      try {
        await this.deps.sink.type(result.text);
      } catch (error) {
        this.logger?.error('Typing the transcript failed', {
          sessionId: session.id,
          ...describeError(error)
        });
      }
    }

    this.session = undefined;
    this.sessionDone = undefined;
    this.setState('idle');

    try {
      this.emit('sessionCompleted', result);
    } catch (error) {
      this.logger?.error('A sessionCompleted listener failed', {
        sessionId: session.id,
        ...describeError(error)
      });
    }
  }

  private async closeQuietly(
    session: ActiveSession,
    label: string,
    close: () => Promise<void>
  ): Promise<void> {
    try {
      await close();
    } catch (error) {
      this.logger?.warn(`Failed to close ${label}`, {
        sessionId: session.id,
        ...describeError(error)
      });
    }
  }

  private setState(next: SessionState): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('State changed', { state: next });
  }
}
