import { PassThrough } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { KeystrokeDriver } from '../src/services/inject/KeystrokeDriver';
import { KeystrokeTyper, TerminalSink } from '../src/services/inject/KeystrokeTyper';

class RecordingDriver implements KeystrokeDriver {
  public readonly calls: string[] = [];

  public constructor(private readonly failOn?: string) {}

  public async press(character: string): Promise<void> {
    if (character === this.failOn) {
      throw new Error('xdotool exited with 1');
    }
    this.calls.push(`down:${character}`);
  }

  public async release(character: string): Promise<void> {
    this.calls.push(`up:${character}`);
  }
}

describe('KeystrokeTyper', () => {
  it('presses and releases each character with a delay between characters', async () => {
    const driver = new RecordingDriver();
    const sleep = vi.fn(async () => undefined);
    const typer = new KeystrokeTyper({ driver, typingDelayMs: 15, sleep });

    const report = await typer.type('ab');

    expect(driver.calls).toEqual(['down:a', 'up:a', 'down:b', 'up:b']);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(15);
    expect(report).toEqual({ typed: 2, failed: 0 });
  });

  it('does nothing for empty text', async () => {
    const driver = new RecordingDriver();
    const sleep = vi.fn(async () => undefined);
    const typer = new KeystrokeTyper({ driver, typingDelayMs: 15, sleep });

    await expect(typer.type('')).resolves.toEqual({ typed: 0, failed: 0 });
    expect(driver.calls).toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('skips a character that fails and keeps typing', async () => {
    const driver = new RecordingDriver('b');
    const typer = new KeystrokeTyper({ driver, typingDelayMs: 0, sleep: async () => undefined });

    const report = await typer.type('abc');

    expect(driver.calls).toEqual(['down:a', 'up:a', 'down:c', 'up:c']);
    expect(report).toEqual({ typed: 2, failed: 1 });
  });

  it('types astral characters as a single keystroke', async () => {
    const driver = new RecordingDriver();
    const typer = new KeystrokeTyper({ driver, typingDelayMs: 0, sleep: async () => undefined });

    await typer.type('a😀');

    expect(driver.calls).toEqual(['down:a', 'up:a', 'down:😀', 'up:😀']);
  });
});

describe('TerminalSink', () => {
  it('writes the transcript as one line', async () => {
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));

    const report = await new TerminalSink(output).type('hello world');

    expect(chunks.join('')).toBe('hello world\n');
    expect(report).toEqual({ typed: 11, failed: 0 });
  });
});
