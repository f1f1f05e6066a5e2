import WebSocket from 'ws';
import { ConnectError, SendError, errorDetail } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AudioFormat, AudioFrame, TranscriptEvent } from '../../types';
import { AsyncQueue } from '../../util/AsyncQueue';
import { TranscriptCodec, TranscriptDecoder } from './codecs';
import { TranscriptionChannel, TranscriptionConnector } from './TranscriptionChannel';

const CLOSE_NORMAL = 1000;

export interface WebSocketConnectorOptions {
  codec: TranscriptCodec;
  audioFormat: AudioFormat;
  connectTimeoutMs: number;
  logger?: StructuredLogger;
}

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }

  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }

  return data.toString('utf8');
};

export class WebSocketTranscriptionChannel implements TranscriptionChannel {
  private readonly queue = new AsyncQueue<TranscriptEvent>();
  private readonly decode: TranscriptDecoder;
  private preambleSent = false;
  private endOfAudioSent = false;
  private closed = false;

  public constructor(
    private readonly socket: WebSocket,
    private readonly codec: TranscriptCodec,
    private readonly audioFormat: AudioFormat,
    private readonly logger?: StructuredLogger
  ) {
    this.decode = codec.createDecoder();

    socket.on('message', (data, isBinary) => {
      this.handleMessage(data, isBinary);
    });

    socket.on('close', (code, reason) => {
      this.logger?.info('Recognizer connection closed', {
        code,
        reason: reason.toString('utf8')
      });
      this.queue.end();
    });

    socket.on('error', (error) => {
      this.logger?.warn('Recognizer connection error', { detail: error.message });
      this.queue.end();
    });
  }

  public async send(frame: AudioFrame): Promise<void> {
    if (!this.preambleSent) {
      const preamble = this.codec.preamble(this.audioFormat);
      if (preamble) {
        await this.write(preamble);
      }
      this.preambleSent = true;
    }

    await this.write(frame.data);
  }

  public events(): AsyncIterable<TranscriptEvent> {
    return this.queue;
  }

  public async signalEndOfAudio(): Promise<void> {
    if (this.endOfAudioSent) {
      return;
    }

    this.endOfAudioSent = true;

    try {
      await this.write(Buffer.alloc(0));
      this.logger?.debug('End of audio signalled to recognizer');
    } catch (error) {
      this.logger?.warn('Could not signal end of audio', { detail: errorDetail(error) });
    }
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.queue.end();

    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(CLOSE_NORMAL, 'session finished');
    }
  }

  private write(payload: Buffer): Promise<void> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new SendError('Recognizer connection is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.send(payload, { binary: true }, (error) => {
        if (error) {
          reject(new SendError(`Failed to send audio: ${error.message}`, { cause: error }));
          return;
        }

        resolve();
      });
    });
  }

  private handleMessage(data: WebSocket.RawData, isBinary: boolean): void {
    if (isBinary) {
      this.logger?.debug('Ignoring binary message from recognizer');
      return;
    }

    const raw = rawDataToString(data);
    let events: TranscriptEvent[];
    try {
      events = this.decode(raw);
    } catch (error) {
      this.logger?.debug('Recognizer sent an unreadable message', {
        detail: errorDetail(error),
        length: raw.length
      });
      return;
    }

    for (const event of events) {
      if (event.kind === 'end') {
        this.queue.end();
        return;
      }

      this.queue.push(event);
    }
  }
}

export class WebSocketTranscriptionConnector implements TranscriptionConnector {
  public constructor(private readonly options: WebSocketConnectorOptions) {}

  public async connect(endpoint: string): Promise<TranscriptionChannel> {
    let socket: WebSocket;
    try {
      socket = new WebSocket(endpoint);
    } catch (error) {
      throw new ConnectError(`Invalid recognizer endpoint '${endpoint}': ${errorDetail(error)}`, {
        cause: error
      });
    }

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const finish = (callback: () => void): void => {
        if (settled) {
          return;
        }

        settled = true;
        clearTimeout(timeoutHandle);
        socket.off('open', onOpen);
        socket.off('close', onClose);
        callback();
      };

      const onOpen = (): void => {
        socket.off('error', onError);
        finish(resolve);
      };

      // Stays attached after a failed handshake so late socket errors are absorbed.
      const onError = (error: Error): void => {
        this.options.logger?.debug('Recognizer handshake error', { endpoint, detail: error.message });
        finish(() => reject(new ConnectError(`Cannot reach recognizer at ${endpoint}: ${error.message}`, { cause: error })));
      };

      const onClose = (code: number): void => {
        finish(() => reject(new ConnectError(`Recognizer at ${endpoint} closed during handshake (code=${code})`)));
      };

      const timeoutHandle = setTimeout(() => {
        finish(() => {
          socket.terminate();
          reject(new ConnectError(`Connection to recognizer at ${endpoint} timed out after ${this.options.connectTimeoutMs}ms`));
        });
      }, this.options.connectTimeoutMs);

      socket.on('open', onOpen);
      socket.on('error', onError);
      socket.on('close', onClose);
    });

    this.options.logger?.info('Connected to recognizer', {
      endpoint,
      protocol: this.options.codec.protocol
    });

    return new WebSocketTranscriptionChannel(
      socket,
      this.options.codec,
      this.options.audioFormat,
      this.options.logger
    );
  }
}
