import { InjectionError, errorDetail } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { KeystrokeDriver } from './KeystrokeDriver';

export interface TypingReport {
  typed: number;
  failed: number;
}

export interface OutputSink {
  type(text: string): Promise<TypingReport>;
}

export interface KeystrokeTyperOptions {
  driver: KeystrokeDriver;
  typingDelayMs: number;
  logger?: StructuredLogger;
  sleep?: (ms: number) => Promise<void>;
}

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }

  await new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * Types text one character at a time as press/release pairs. A character that fails to
 * inject is reported and skipped; the rest of the text is still typed.
 */
export class KeystrokeTyper implements OutputSink {
  private readonly driver: KeystrokeDriver;
  private readonly typingDelayMs: number;
  private readonly logger?: StructuredLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  public constructor(options: KeystrokeTyperOptions) {
    this.driver = options.driver;
    this.typingDelayMs = options.typingDelayMs;
    this.logger = options.logger;
    this.sleep = options.sleep ?? sleep;
  }

  public async type(text: string): Promise<TypingReport> {
    const characters = Array.from(text);
    const report: TypingReport = { typed: 0, failed: 0 };

    for (const [index, character] of characters.entries()) {
      if (index > 0) {
        await this.sleep(this.typingDelayMs);
      }

      try {
        await this.tap(character);
        report.typed += 1;
      } catch (error) {
        report.failed += 1;
        const failure =
          error instanceof InjectionError
            ? error
            : new InjectionError(character, errorDetail(error), { cause: error });
        this.logger?.warn('Keystroke injection failed; continuing', {
          index,
          code: failure.code,
          detail: failure.message
        });
      }
    }

    if (characters.length > 0) {
      this.logger?.info('Transcript typed', {
        length: characters.length,
        typed: report.typed,
        failed: report.failed
      });
    }

    return report;
  }

  private async tap(character: string): Promise<void> {
    try {
      await this.driver.press(character);
    } catch (error) {
      throw new InjectionError(character, `Key press failed: ${errorDetail(error)}`, { cause: error });
    }

    try {
      await this.driver.release(character);
    } catch (error) {
      throw new InjectionError(character, `Key release failed: ${errorDetail(error)}`, { cause: error });
    }
  }
}

/** Writes transcripts to a stream instead of typing them. */
export class TerminalSink implements OutputSink {
  public constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  public async type(text: string): Promise<TypingReport> {
    const length = Array.from(text).length;
    if (length === 0) {
      return { typed: 0, failed: 0 };
    }

    this.output.write(`${text}\n`);
    return { typed: length, failed: 0 };
  }
}
