import { Readable } from 'node:stream';
import { DeviceError } from '../../errors';
import { AudioFrame } from '../../types';
import { toAudioFrame } from './AudioSource';

interface PendingRead {
  resolve: (frame: AudioFrame) => void;
  reject: (reason: DeviceError) => void;
}

/**
 * Slices a raw PCM byte stream into fixed-size frames served one `read()` at a time.
 * Each frame gets its own buffer.
 */
export class PcmFrameReader {
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;
  private sequence = 0;
  private waiter: PendingRead | undefined;
  private failure: DeviceError | undefined;

  public constructor(
    private readonly stream: Readable,
    private readonly frameBytes: number
  ) {
    if (frameBytes <= 0 || frameBytes % 2 !== 0) {
      throw new Error(`Frame size must be a positive even byte count, got ${frameBytes}`);
    }

    stream.on('data', this.onData);
    stream.once('end', this.onEnd);
    stream.on('error', this.onError);
  }

  public read(): Promise<AudioFrame> {
    const frame = this.takeFrame();
    if (frame) {
      return Promise.resolve(frame);
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.waiter) {
      return Promise.reject(new DeviceError('Another audio read is already pending'));
    }

    return new Promise<AudioFrame>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  /** Rejects the pending and every later read once buffered frames run out. */
  public fail(error: DeviceError): void {
    if (this.failure) {
      return;
    }

    this.failure = error;
    this.detach();

    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.reject(error);
  }

  public bufferedBytes(): number {
    return this.pendingBytes;
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const data = typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : chunk;
    if (data.length === 0 || this.failure) {
      return;
    }

    this.pendingChunks.push(Buffer.from(data));
    this.pendingBytes += data.length;

    const waiter = this.waiter;
    if (!waiter) {
      return;
    }

    const frame = this.takeFrame();
    if (frame) {
      this.waiter = undefined;
      waiter.resolve(frame);
    }
  };

  private readonly onEnd = (): void => {
    this.fail(new DeviceError('Audio stream ended'));
  };

  private readonly onError = (error: Error): void => {
    this.fail(new DeviceError(`Audio stream failed: ${error.message}`, { cause: error }));
  };

  private detach(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
  }

  private takeFrame(): AudioFrame | undefined {
    if (this.pendingBytes < this.frameBytes) {
      return undefined;
    }

    const output = Buffer.alloc(this.frameBytes);
    let writeOffset = 0;

    while (writeOffset < this.frameBytes) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, this.frameBytes - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    const frame = toAudioFrame(this.sequence, output);
    this.sequence += 1;
    return frame;
  }
}
