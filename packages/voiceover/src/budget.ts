import type { SpeechSegment } from '@threadcast/shared';

/**
 * Committed segments of one narration run, with an undo log of one entry:
 * only the most recently committed segment can be rolled back.
 */
export class RunningBudget {
  private committed: SpeechSegment[] = [];
  private last: SpeechSegment | null = null;

  commit(segment: SpeechSegment): void {
    this.committed.push(segment);
    this.last = segment;
  }

  /** Drop the last committed segment. Returns it, or null when there is nothing to undo. */
  rollback(): SpeechSegment | null {
    const segment = this.last;
    if (!segment) return null;
    this.committed.pop();
    this.last = null;
    return segment;
  }

  exceeds(maxLength: number): boolean {
    return this.totalDuration > maxLength;
  }

  get totalDuration(): number {
    return this.committed.reduce((sum, s) => sum + s.duration, 0);
  }

  get lastClipDuration(): number {
    return this.last?.duration ?? 0;
  }

  get size(): number {
    return this.committed.length;
  }

  get segments(): SpeechSegment[] {
    return [...this.committed];
  }
}
