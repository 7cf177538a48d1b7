#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { Logger } from './utils/cli-helpers.js';
import { createElementsCommand } from './commands/elements.js';
import { createRelationshipsCommand } from './commands/relationships.js';
import { createValidateCommand } from './commands/validate.js';
import { PackageJsonSchema, validate } from '@c4graph/core';

function setupSignalHandlers(): void {
  const handleShutdown = (signal: string) => {
    Logger.warn(`Received ${signal}, shutting down...`);
    process.exit(0);
  };
  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('uncaughtException', (error) => {
    Logger.fail('Uncaught Exception:');
    console.error(error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Reason:', reason);
    process.exit(1);
  });
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read the CLI package's own version
const packageJson = validate(
  PackageJsonSchema,
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8')),
  'PackageJson'
);

setupSignalHandlers();

const program = new Command();
program
  .name('c4graph')
  .description('Inspect and audit C4 architecture workspaces')
  .version(packageJson.version);

program.addCommand(createElementsCommand());
program.addCommand(createRelationshipsCommand());
program.addCommand(createValidateCommand());

program.configureHelp({
  subcommandTerm: (cmd) => cmd.name() + (cmd.alias() ? `|${cmd.alias()}` : ''),
});

await program.parseAsync();
