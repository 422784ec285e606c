import { type Command, InvalidArgumentError } from 'commander';
import { isLogLevel, type LogLevel } from '../logger.js';

export const parseLogLevel = (value: string): LogLevel => {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError('Use one of: debug, info, warn, error.');
  }
  return normalized;
};

export const applyConfigOption = (cmd: Command): Command =>
  cmd.option('-c, --config <path>', 'Path to config file (default: ./cyclewatch.config.json)');

export const applyWatcherOptions = (cmd: Command): Command =>
  cmd
    .option('--root <dir>', 'Directory to watch; commands run here too (default: .)')
    .option('--build <command>', 'Build command to run on change')
    .option('--run <command>', 'Run command to execute the built app')
    .option('--depfile <file>', 'Dependency file to monitor (e.g. go.mod, package.json)')
    .option('--depcommand <command>', "Command to run when the dependency file changes (e.g. 'npm install')")
    .option('--interval <duration>', 'Polling interval (e.g. 1s, 500ms; default: 1s)')
    .option('--include <rules>', "Comma-separated include rules, matched as prefix or suffix (e.g. '.go,services')")
    .option('--exclude <rules>', "Comma-separated exclude rules, matched as prefix or suffix (e.g. '.git,tmp')");

export const applyLogOptions = (cmd: Command): Command =>
  cmd
    .option('--verbose', 'Enable verbose logging (same as --log-level debug)')
    .option('--log-level <level>', 'Set log level (debug, info, warn, error)', parseLogLevel)
    .option('--log-file <path>', 'Also append log lines to this file')
    .option('--no-banner', 'Skip the startup banner');
