import { TranscriptMode } from '../types';

export interface ReducedTranscript {
  text: string;
  finalCount: number;
  usedPartialFallback: boolean;
}

/**
 * Collects one session's transcript updates. Finals are kept in arrival order;
 * each partial replaces the previous one.
 */
export class TranscriptAccumulator {
  private readonly finals: string[] = [];
  private latestPartial: string | undefined;

  public appendFinal(text: string): void {
    this.finals.push(text);
  }

  public setPartial(text: string): void {
    this.latestPartial = text;
  }

  public finalCount(): number {
    return this.finals.length;
  }

  /**
   * `incremental` concatenates every final, `cumulative` keeps only the last one.
   * Without any final the latest partial stands in. Whitespace-only results count as empty.
   */
  public reduce(mode: TranscriptMode): ReducedTranscript {
    const finalCount = this.finals.length;

    if (finalCount > 0) {
      const joined = mode === 'cumulative' ? this.finals[finalCount - 1] : this.finals.join('');
      return {
        text: joined.trim() ? joined : '',
        finalCount,
        usedPartialFallback: false
      };
    }

    const partial = this.latestPartial ?? '';
    return {
      text: partial.trim() ? partial : '',
      finalCount: 0,
      usedPartialFallback: partial.trim().length > 0
    };
  }
}
