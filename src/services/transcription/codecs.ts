import { z } from 'zod';
import { AudioFormat, TranscriptEvent, TranscriptMode, TranscriptProtocol } from '../../types';
import { BYTES_PER_SAMPLE } from '../capture/AudioSource';

export type TranscriptDecoder = (raw: string) => TranscriptEvent[];

export interface TranscriptCodec {
  readonly protocol: TranscriptProtocol;
  /** Whether each final repeats everything committed so far or only adds to it. */
  readonly finals: TranscriptMode;
  /** Bytes sent once before the first audio frame. */
  preamble(format: AudioFormat): Buffer | undefined;
  /** Decoders keep per-connection state, so every channel gets its own. */
  createDecoder(): TranscriptDecoder;
}

const JsonEventSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('partial'),
    text: z.string(),
    speaker: z.union([z.string(), z.number()]).optional()
  }),
  z.object({ kind: z.literal('final'), text: z.string() }),
  z.object({ kind: z.literal('end') })
]);

const WhisperLiveKitLineSchema = z.object({
  text: z.string().nullish(),
  speaker: z.union([z.string(), z.number()]).nullish()
});

const WhisperLiveKitMessageSchema = z
  .object({
    type: z.string().optional(),
    lines: z.array(WhisperLiveKitLineSchema).optional(),
    buffer_transcription: z.string().nullish()
  })
  .passthrough();

const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

const parseJson = (raw: string): unknown => JSON.parse(raw);

export const jsonEventsCodec: TranscriptCodec = {
  protocol: 'json-events',
  finals: 'incremental',
  preamble: () => undefined,
  createDecoder: () => (raw) => {
    const event = JsonEventSchema.parse(parseJson(raw));
    if (event.kind === 'partial') {
      return [
        event.speaker === undefined
          ? { kind: 'partial', text: event.text }
          : { kind: 'partial', text: event.text, speaker: String(event.speaker) }
      ];
    }

    return [event];
  }
};

/** RIFF header with unknown (max) sizes, used to announce an open-ended PCM stream. */
export const createStreamingWavHeader = (format: AudioFormat): Buffer => {
  const header = Buffer.alloc(44);
  const blockAlign = format.channels * BYTES_PER_SAMPLE;

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(0xffffffff, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(0xffffffff, 40);

  return header;
};

export const whisperLiveKitCodec: TranscriptCodec = {
  protocol: 'whisperlivekit',
  finals: 'cumulative',
  preamble: (format) => createStreamingWavHeader(format),
  createDecoder: () => {
    let committed = '';

    return (raw) => {
      const message = WhisperLiveKitMessageSchema.parse(parseJson(raw));

      const events: TranscriptEvent[] = [];
      const lines = message.lines ?? [];
      const text = collapseWhitespace(
        lines
          .map((line) => line.text?.trim() ?? '')
          .filter(Boolean)
          .join(' ')
      );

      if (text && text !== committed) {
        committed = text;
        events.push({ kind: 'final', text });
      }

      const buffered = collapseWhitespace(message.buffer_transcription ?? '');
      if (buffered) {
        const speaker = lines[lines.length - 1]?.speaker;
        events.push(
          speaker === undefined || speaker === null
            ? { kind: 'partial', text: buffered }
            : { kind: 'partial', text: buffered, speaker: String(speaker) }
        );
      }

      if (message.type === 'ready_to_stop') {
        events.push({ kind: 'end' });
      }

      return events;
    };
  }
};

const CODECS: Record<TranscriptProtocol, TranscriptCodec> = {
  'json-events': jsonEventsCodec,
  whisperlivekit: whisperLiveKitCodec
};

export const codecFor = (protocol: TranscriptProtocol): TranscriptCodec => CODECS[protocol];
