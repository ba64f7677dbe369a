/**
 * Cage light monitor entry point
 */

import { program } from 'commander';

import { loadEnvironment } from './config';
import { start } from './start';

import type { CliOptions } from './types';

program
  .name('cage-light-monitor')
  .description('Record device telemetry to CSV and drive the cage lights')
  .option('-c, --config <path>', 'JSON config file', 'config.json')
  .option('-e, --env-file <path>', 'Environment file with SLACK_WEBHOOK_URL and LOG_LEVEL')
  .parse(process.argv);

const options = program.opts<CliOptions>();

loadEnvironment(options.envFile);

start(options.config, process.env).then(function(code) {
  // Let pending Slack posts finish before the process ends
  process.exitCode = code;
}, function(err: unknown) {
  console.error(err);
  process.exitCode = 1;
});
