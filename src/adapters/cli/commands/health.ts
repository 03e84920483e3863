import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { ConfigError } from '../../../core/errors.js';
import { loadPipelineConfig, describeConfig } from '../config.js';

loadEnv();

export function createHealthCommand(): Command {
  const command = new Command('health')
    .description('Validate configuration and print it with secrets masked')
    .action(() => {
      try {
        const config = loadPipelineConfig(process.env);
        console.log('✅ Configuration OK');
        for (const line of describeConfig(config)) {
          console.log(`   ${line}`);
        }
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;

        console.error('❌ Configuration invalid:');
        for (const problem of error.problems) {
          console.error(`   - ${problem}`);
        }
        process.exit(1);
      }
    });

  return command;
}
