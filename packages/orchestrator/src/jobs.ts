import type { NarrationDocument } from '@threadcast/shared';

/** Queue job definitions for BullMQ */

export const JOB_NAMES = {
  NARRATE_THREAD: 'narrate-thread',
} as const;

export type JobName = (typeof JOB_NAMES)[keyof typeof JOB_NAMES];

export interface NarrateThreadJobData {
  type: 'narrate-thread';
  document: NarrationDocument;
}

export type JobData = NarrateThreadJobData;

/** What a finished narrate-thread job reports back. */
export interface NarrateThreadJobResult {
  documentId: string;
  duration: number;
  commentCount: number;
  segments: number;
  videoPath: string;
  audioPath: string | null;
  credit: string;
}
