import { AudioFormat, AudioFrame } from '../../types';

export const BYTES_PER_SAMPLE = 2; // s16le

export interface AudioHandle {
  /** Next full frame; rejects with DeviceError when capture fails or the handle closes. */
  read(): Promise<AudioFrame>;
  close(): Promise<void>;
}

export interface AudioSource {
  open(format: AudioFormat): Promise<AudioHandle>;
}

export const frameByteSize = (format: AudioFormat): number =>
  Math.max(
    BYTES_PER_SAMPLE,
    Math.floor((format.sampleRate * format.frameDurationMs) / 1000) * format.channels * BYTES_PER_SAMPLE
  );

export const toAudioFrame = (sequence: number, data: Buffer): AudioFrame => ({
  sequence,
  data,
  samples: new Int16Array(data.buffer, data.byteOffset, Math.floor(data.length / BYTES_PER_SAMPLE))
});
