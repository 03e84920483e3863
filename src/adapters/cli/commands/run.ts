import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { ConfigError, describeError } from '../../../core/errors.js';
import { YouTubeClient, createPipeline } from '../../../core/index.js';
import { loadPipelineConfig, describeConfig } from '../config.js';
import { createConsoleLogger, exitCodeFor, reportResult } from '../output.js';
import type { PipelineConfig, VideoTarget } from '../../../types/index.js';

loadEnv();

interface RunOptions {
  channel?: string;
  title?: string;
  video?: string;
  mock?: boolean;
  cacheDir?: string;
  retry?: string;
  verbose?: boolean;
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Summarize the latest matching video and post it to Discord')
    .option('-c, --channel <id>', 'YouTube channel ID (default: CHANNEL_ID)')
    .option('-t, --title <pattern>', 'case-insensitive title substring (default: TITLE_PATTERN)')
    .option('-v, --video <url>', 'summarize this video instead of searching the channel')
    .option('--mock', 'use the bundled sample transcript instead of the transcript API')
    .option('--cache-dir <dir>', 'transcript cache directory (default: TRANSCRIPT_CACHE_DIR)')
    .option('-r, --retry <number>', 'attempts per remote call (default: RETRY_MAX_ATTEMPTS)')
    .option('--verbose', 'print debug output and stack traces')
    .action(async (options: RunOptions) => {
      const verbose = options.verbose ?? false;

      let config: PipelineConfig;
      try {
        config = loadPipelineConfig(process.env, {
          channel: options.channel,
          title: options.title,
          mock: options.mock,
          cacheDir: options.cacheDir,
          retry: options.retry,
          videoMode: options.video !== undefined,
        });
      } catch (error) {
        if (error instanceof ConfigError) {
          for (const problem of error.problems) {
            console.error(`❌ ${problem}`);
          }
          process.exit(1);
        }
        throw error;
      }

      const logger = createConsoleLogger(verbose);
      if (verbose) {
        describeConfig(config).forEach((line) => logger.onDebug?.(line));
      }
      if (config.useMockData) {
        console.log('🧪 Mock mode: using the sample transcript');
      }

      const youtube = new YouTubeClient(config.youtubeApiKey, config.requestTimeoutMs);

      let target: VideoTarget;
      if (options.video) {
        try {
          target = { kind: 'video', videoId: youtube.parseVideoId(options.video) };
        } catch (error) {
          console.error(`❌ ${error instanceof Error ? error.message : String(error)}: ${options.video}`);
          process.exit(1);
        }
      } else {
        target = { kind: 'latest', channelId: config.channelId, titlePattern: config.titlePattern };
      }

      const pipeline = createPipeline(config, logger, { search: youtube });

      try {
        const result = await pipeline.run(target);
        reportResult(result, verbose);
        process.exit(exitCodeFor(result));
      } catch (error) {
        // Only reachable for bugs; stage failures come back as results.
        const err = error instanceof Error ? error : new Error(String(error));
        console.error(`❌ Unexpected error: ${describeError(err)}`);
        process.exit(1);
      }
    });

  return command;
}
