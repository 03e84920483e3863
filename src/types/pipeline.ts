import type { VideoRef } from './youtube.js';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type PipelineStage =
  | 'LocatingVideo'
  | 'FetchingTranscript'
  | 'Summarizing'
  | 'Notifying';

export type PipelineState = 'Idle' | PipelineStage | 'Done' | 'Failed';

export type RunResult<E> =
  | { status: 'done'; video: VideoRef; chunksDelivered: number }
  | { status: 'failed'; stage: PipelineStage; error: E; video?: VideoRef };
