import { Command } from 'commander';
import { CONFIG, runRelationships, validate } from '@c4graph/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { RelationshipsOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';

export function createRelationshipsCommand(): Command {
  return new Command('relationships')
    .alias('rels')
    .description('List every relationship in a workspace')
    .argument('<workspace>', 'Path to a workspace JSON file')
    .option('--format <format>', 'Result format (table, json, yaml)')
    .action(async (workspacePath: string, options: unknown) => {
      const validated = validate(RelationshipsOptionsSchema, options, 'command options');
      const format = validated.format ?? CONFIG.output.format;
      try {
        const rows = await runRelationships({ workspacePath }, createProgress(format !== 'table'));
        console.log(OutputFormatter.format(rows, format));
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
