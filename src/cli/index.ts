#!/usr/bin/env node
/**
 * tender-insight CLI entry point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createConfigCommand } from './commands/config.js';
import { createNamespacesCommand } from './commands/namespaces.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

const VERSION = process.env.CLI_VERSION ?? '0.1.0';

const program = new Command();

program
  .name('tender-insight')
  .description('Extract structured data from tender documents with retrieval-augmented agents')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('tender-insight analyze ./tender.txt')}                 Analyze a document
  ${chalk.cyan('tender-insight analyze ./a.txt --mode cumulative')}    Keep earlier documents searchable
  ${chalk.cyan('tender-insight namespaces list')}                      Show vector store namespaces
  ${chalk.cyan('tender-insight config set pipeline.retrieval_k 8')}    Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// ============================================================================
// COMMANDS
// ============================================================================

program.addCommand(createAnalyzeCommand(() => createContext(getGlobalOptions())));
program.addCommand(createNamespacesCommand(() => createContext(getGlobalOptions())));
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: tender-insight --help  to see available commands'
  );
});

// Check API keys before commands that call the model provider
program.hook('preAction', (_program, actionCommand) => {
  const opts = getGlobalOptions();
  const result = validateStartupConfig(getValidationOptionsForCommand(actionCommand.name()));

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);
    if (result.errors.length > 0) {
      throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
    }
  }
});

async function main(): Promise<void> {
  const globalHandler = createGlobalErrorHandler(getGlobalOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getGlobalOptions());
  }
}

void main();
