import { describe, expect, it } from 'vitest';
import {
  codecFor,
  createStreamingWavHeader,
  jsonEventsCodec,
  whisperLiveKitCodec
} from '../src/services/transcription/codecs';

const format = { sampleRate: 16000, channels: 1, frameDurationMs: 1000 };

describe('whisperlivekit codec', () => {
  it('announces the stream with an open-ended WAV header', () => {
    const header = whisperLiveKitCodec.preamble(format);
    expect(header).toBeDefined();
    if (!header) {
      return;
    }

    expect(header.length).toBe(44);
    expect(header.toString('ascii', 0, 4)).toBe('RIFF');
    expect(header.readUInt32LE(4)).toBe(0xffffffff);
    expect(header.toString('ascii', 8, 12)).toBe('WAVE');
    expect(header.readUInt16LE(22)).toBe(1);
    expect(header.readUInt32LE(24)).toBe(16000);
    expect(header.readUInt32LE(28)).toBe(32000);
    expect(header.readUInt16LE(32)).toBe(2);
    expect(header.readUInt16LE(34)).toBe(16);
    expect(header.toString('ascii', 36, 40)).toBe('data');
  });

  it('turns committed lines into a cumulative final and the buffer into a partial', () => {
    const decode = whisperLiveKitCodec.createDecoder();

    expect(
      decode(
        JSON.stringify({
          lines: [{ text: 'hello', speaker: 1 }],
          buffer_transcription: ' wor'
        })
      )
    ).toEqual([
      { kind: 'final', text: 'hello' },
      { kind: 'partial', text: 'wor', speaker: '1' }
    ]);

    expect(
      decode(
        JSON.stringify({
          lines: [{ text: 'hello' }, { text: '  world ' }],
          buffer_transcription: ''
        })
      )
    ).toEqual([{ kind: 'final', text: 'hello world' }]);
  });

  it('does not repeat a final when the committed lines are unchanged', () => {
    const decode = whisperLiveKitCodec.createDecoder();
    const message = JSON.stringify({ lines: [{ text: 'same' }], buffer_transcription: 'more' });

    decode(message);
    expect(decode(message)).toEqual([{ kind: 'partial', text: 'more' }]);
  });

  it('keeps lines carried by the ready_to_stop terminator before ending', () => {
    const decode = whisperLiveKitCodec.createDecoder();

    expect(decode(JSON.stringify({ type: 'ready_to_stop', lines: [{ text: 'last words' }] }))).toEqual([
      { kind: 'final', text: 'last words' },
      { kind: 'end' }
    ]);
  });

  it('reads lines from typed updates and skips messages without transcript fields', () => {
    const decode = whisperLiveKitCodec.createDecoder();

    expect(decode(JSON.stringify({ type: 'config', useAudioWorklet: false }))).toEqual([]);
    expect(
      decode(JSON.stringify({ type: 'active_transcription', lines: [{ text: 'hello there' }] }))
    ).toEqual([{ kind: 'final', text: 'hello there' }]);
    expect(decode(JSON.stringify({ type: 'ready_to_stop' }))).toEqual([{ kind: 'end' }]);
  });

  it('throws on malformed payloads', () => {
    const decode = whisperLiveKitCodec.createDecoder();

    expect(() => decode('not json')).toThrow();
    expect(() => decode(JSON.stringify({ lines: 'nope' }))).toThrow();
  });

  it('keeps decoder state per connection', () => {
    const first = whisperLiveKitCodec.createDecoder();
    const second = whisperLiveKitCodec.createDecoder();
    const message = JSON.stringify({ lines: [{ text: 'again' }] });

    expect(first(message)).toEqual([{ kind: 'final', text: 'again' }]);
    expect(second(message)).toEqual([{ kind: 'final', text: 'again' }]);
  });
});

describe('json-events codec', () => {
  it('passes through partial, final and end events', () => {
    const decode = jsonEventsCodec.createDecoder();

    expect(decode('{"kind":"partial","text":"hel"}')).toEqual([{ kind: 'partial', text: 'hel' }]);
    expect(decode('{"kind":"partial","text":"hel","speaker":2}')).toEqual([
      { kind: 'partial', text: 'hel', speaker: '2' }
    ]);
    expect(decode('{"kind":"final","text":"hello "}')).toEqual([{ kind: 'final', text: 'hello ' }]);
    expect(decode('{"kind":"end"}')).toEqual([{ kind: 'end' }]);
  });

  it('rejects unknown kinds', () => {
    const decode = jsonEventsCodec.createDecoder();
    expect(() => decode('{"kind":"silence"}')).toThrow();
  });

  it('sends no preamble', () => {
    expect(jsonEventsCodec.preamble(format)).toBeUndefined();
  });
});

describe('codecFor', () => {
  it('pairs each protocol with how its finals accumulate', () => {
    expect(codecFor('whisperlivekit').finals).toBe('cumulative');
    expect(codecFor('json-events').finals).toBe('incremental');
  });

  it('builds stereo headers with the matching block alignment', () => {
    const header = createStreamingWavHeader({ sampleRate: 44100, channels: 2, frameDurationMs: 100 });
    expect(header.readUInt16LE(22)).toBe(2);
    expect(header.readUInt32LE(28)).toBe(176400);
    expect(header.readUInt16LE(32)).toBe(4);
  });
});
