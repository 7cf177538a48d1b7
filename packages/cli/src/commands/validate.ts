import { Command } from 'commander';
import { runValidate, validate } from '@c4graph/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ValidateOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Audit a workspace for unresolved references and incomplete elements')
    .argument('<workspace>', 'Path to a workspace JSON file')
    .option('--format <format>', 'Result format (table, json)', 'table')
    .option('--require-descriptions', 'Report elements without a description as warnings')
    .option('--fail-on-warnings', 'Exit with status 1 when warnings are found')
    .action(async (workspacePath: string, options: unknown) => {
      const validated = validate(ValidateOptionsSchema, options, 'command options');
      const json = validated.format === 'json';

      try {
        const result = await runValidate(
          {
            workspacePath,
            requireDescriptions: validated.requireDescriptions,
            failOnWarnings: validated.failOnWarnings,
          },
          createProgress(json)
        );
        if (json) {
          console.log(OutputFormatter.format(result, 'json'));
        } else if (result.findings.length > 0) {
          console.log(OutputFormatter.format(result.findings, 'table'));
        }
        if (result.hasIssues) {
          process.exitCode = 1;
        }
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
