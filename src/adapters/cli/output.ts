import { describeError } from '../../core/errors.js';
import type { PipelineLogger, PipelineRunResult } from '../../core/index.js';

export function createConsoleLogger(verbose: boolean): PipelineLogger {
  const onDebug = verbose ? (message: string) => console.log(`🔍 ${message}`) : undefined;

  return {
    onProgress: (message) => console.log(`ℹ️  ${message}`),
    onDebug,
    onWarning: (message) => console.warn(`⚠️  ${message}`),
    onRetry: ({ label, attempt, maxAttempts, delayMs, error }) =>
      console.warn(
        `⚠️  ${label ?? 'Request'} failed (attempt ${attempt}/${maxAttempts}): ${error.message}. Retrying in ${delayMs / 1000}s...`
      ),
    onStateChange: (state, previous) => {
      if (state === 'Idle' || state === 'Done' || state === 'Failed') {
        onDebug?.(`${previous} -> ${state}`);
      } else {
        console.log(`▶️  ${state}`);
      }
    },
  };
}

/**
 * 0 when the summary was posted; 2 when the failure is worth retrying on the
 * next schedule tick; 1 otherwise.
 */
export function exitCodeFor(result: PipelineRunResult): number {
  if (result.status === 'done') return 0;
  return result.error.retryable ? 2 : 1;
}

export function reportResult(result: PipelineRunResult, verbose: boolean): void {
  if (result.status === 'done') {
    console.log(
      `✅ Posted summary of "${result.video.title}" in ${result.chunksDelivered} message(s)`
    );
    return;
  }

  if (verbose && result.error.stack) {
    console.error(`📋 Stack trace:\n${result.error.stack}`);
  }
  console.error(
    `❌ Run failed at stage ${result.stage} [${result.error.kind}]: ${describeError(result.error)}`
  );
}
