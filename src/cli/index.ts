#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage } from '../graph/errors';
import { createDefaultRegistry } from '../parsers';
import { config } from '../utils/config';
import { flushLogs, logger } from '../utils/logger';
import { CommandEnvironment, CommandIO, runCycles, runLanguages, runShow } from './commands';
import { collectList, parseCyclesOptions, parseShowOptions } from './options';

const io: CommandIO = {
  stdout: text => console.log(text),
  stderr: text => console.error(text),
};

function createEnvironment(): CommandEnvironment {
  return {
    io,
    registry: createDefaultRegistry(),
    progress: ora({ stream: process.stderr, isEnabled: process.stderr.isTTY }),
  };
}

async function runCommand(verbose: boolean | undefined, run: () => Promise<number> | number): Promise<void> {
  if (verbose) {
    logger.level = 'debug';
  }

  try {
    process.exitCode = await run();
  } catch (error) {
    logger.debug('Command failed', { error: errorMessage(error) });
    io.stderr(chalk.red(`Error: ${errorMessage(error)}`));
    process.exitCode = 1;
  } finally {
    await flushLogs();
  }
}

function addSelectionOptions(command: Command): Command {
  return command
    .option('-r, --repo <path>', 'Repository directory', '.')
    .option('--allow-outside-repo', 'Allow paths outside the repository', false)
    .option('-c, --commit <rev>', 'Commit or range (from...to) to analyze')
    .option('-i, --input <paths>', 'Files or directories to include (comma-separated)', collectList, [])
    .option('--exclude <paths>', 'Files or directories to exclude (comma-separated)', collectList, [])
    .option('--include-ext <exts>', 'Only include these extensions (comma-separated)', collectList, [])
    .option('--exclude-ext <exts>', 'Exclude these extensions (comma-separated)', collectList, [])
    .option('-w, --between <paths>', 'Show only files on paths between these files (comma-separated)', collectList, [])
    .option('-p, --file <path>', 'Show the neighborhood of a single file')
    .option('-l, --level <n>', 'Neighborhood depth for --file', '1')
    .option('--verbose', 'Enable verbose logging');
}

function addShowOptions(command: Command): Command {
  return addSelectionOptions(command)
    .option('-f, --format <format>', 'Output format (dot, mermaid, json)', config.graph.defaultFormat)
    .option('-u, --url', 'Print a URL to view the graph online', false);
}

const program = new Command();

program
  .name('depweave')
  .description(
    'File-level dependency graphs with cycle detection\nSupports: JavaScript, TypeScript, Python, Dart, C and C++'
  )
  .version('0.1.0');

addShowOptions(program.command('show'))
  .description('Render the dependency graph of the selected files')
  .action(async (_options, command: Command) => {
    const raw = command.opts();
    await runCommand(raw.verbose === true, () => runShow(parseShowOptions(raw), createEnvironment()));
  });

addShowOptions(program.command('graph', { hidden: true }))
  .description('Deprecated alias for show')
  .action(async (_options, command: Command) => {
    io.stderr(chalk.yellow('Warning: "depweave graph" is deprecated, use "depweave show" instead'));
    const raw = command.opts();
    await runCommand(raw.verbose === true, () => runShow(parseShowOptions(raw), createEnvironment()));
  });

addSelectionOptions(program.command('cycles'))
  .description('List circular dependencies among the selected files')
  .option('--fail-on-cycle', 'Exit with code 2 when a cycle is found', false)
  .action(async (_options, command: Command) => {
    const raw = command.opts();
    await runCommand(raw.verbose === true, () => runCycles(parseCyclesOptions(raw), createEnvironment()));
  });

program
  .command('languages')
  .description('List supported languages and their file extensions')
  .option('--json', 'Print as JSON', false)
  .action(async (options: { json: boolean }) => {
    await runCommand(false, () => runLanguages(createDefaultRegistry(), options.json, io));
  });

program.configureHelp({
  sortSubcommands: true,
});

program.parseAsync().catch(async (error: unknown) => {
  io.stderr(chalk.red(`Error: ${errorMessage(error)}`));
  await flushLogs();
  process.exitCode = 1;
});
