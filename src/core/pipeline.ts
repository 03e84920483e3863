import { PipelineError, toPipelineError } from './errors.js';
import { err, ok } from './retry/index.js';
import type { VideoLocator } from './youtube/index.js';
import type { TranscriptProvider } from './transcript/index.js';
import type { Summarizer } from './ai/index.js';
import type { DiscordNotifier } from './discord/index.js';
import type {
  PipelineStage,
  PipelineState,
  Result,
  RunResult,
  VideoRef,
  VideoTarget,
} from '../types/index.js';

export interface PipelineCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onStateChange?: (state: PipelineState, previous: PipelineState) => void;
}

export interface PipelineDeps {
  locator: VideoLocator;
  transcripts: TranscriptProvider;
  summarizer: Summarizer;
  notifier: DiscordNotifier;
}

export type PipelineRunResult = RunResult<PipelineError>;

const ACTIVE_STATES: ReadonlySet<PipelineState> = new Set<PipelineState>([
  'LocatingVideo',
  'FetchingTranscript',
  'Summarizing',
  'Notifying',
]);

/**
 * Runs locate -> transcript -> summarize -> notify once. Any stage failure
 * ends the run in `Failed` and later stages are skipped; there is no resume.
 */
export class Pipeline {
  private deps: PipelineDeps;
  private callbacks: PipelineCallbacks;
  private currentState: PipelineState = 'Idle';

  constructor(deps: PipelineDeps, callbacks: PipelineCallbacks = {}) {
    this.deps = deps;
    this.callbacks = callbacks;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  private transition(next: PipelineState): void {
    const previous = this.currentState;
    this.currentState = next;
    this.callbacks.onStateChange?.(next, previous);
  }

  private async stage<T>(stage: PipelineStage, work: () => Promise<T>): Promise<Result<T, PipelineError>> {
    this.transition(stage);
    try {
      return ok(await work());
    } catch (error) {
      return err(toPipelineError(error));
    }
  }

  private fail(stage: PipelineStage, error: PipelineError, video?: VideoRef): PipelineRunResult {
    this.transition('Failed');
    return { status: 'failed', stage, error, ...(video && { video }) };
  }

  async run(target: VideoTarget): Promise<PipelineRunResult> {
    if (ACTIVE_STATES.has(this.currentState)) {
      throw new Error(`Pipeline is already running (state: ${this.currentState})`);
    }
    const { onProgress, onDebug } = this.callbacks;
    this.transition('Idle');

    const located = await this.stage('LocatingVideo', () =>
      target.kind === 'latest'
        ? this.deps.locator.findLatestMatching(target.channelId, target.titlePattern)
        : this.deps.locator.findById(target.videoId)
    );
    if (!located.ok) return this.fail('LocatingVideo', located.error);

    const video = located.value;
    onProgress?.(`Video: ${video.title} (${video.id}, published ${video.publishedAt || 'unknown'})`);

    const transcript = await this.stage('FetchingTranscript', () =>
      this.deps.transcripts.getTranscript(video)
    );
    if (!transcript.ok) return this.fail('FetchingTranscript', transcript.error, video);
    onProgress?.(`Transcript ready: ${transcript.value.length} chars`);

    const summary = await this.stage('Summarizing', () =>
      this.deps.summarizer.summarize(transcript.value)
    );
    if (!summary.ok) return this.fail('Summarizing', summary.error, video);
    onProgress?.(`Summary ready: ${summary.value.length} chars`);
    onDebug?.(`Summary preview: ${summary.value.slice(0, 100)}`);

    const published = await this.stage('Notifying', () =>
      this.deps.notifier.publish(summary.value, { title: video.title })
    );
    if (!published.ok) return this.fail('Notifying', published.error, video);

    this.transition('Done');
    onProgress?.(`Posted ${published.value.delivered} message(s) to Discord`);
    return { status: 'done', video, chunksDelivered: published.value.delivered };
  }
}
