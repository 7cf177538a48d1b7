import { Command } from 'commander';
import { CONFIG, runElements, validate } from '@c4graph/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ElementsOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';

export function createElementsCommand(): Command {
  return new Command('elements')
    .description('List every element in a workspace with its canonical name and tags')
    .argument('<workspace>', 'Path to a workspace JSON file')
    .option(
      '--type <type>',
      'Only show one element type (Person, SoftwareSystem, Container, Component, DeploymentNode, ContainerInstance)'
    )
    .option('--format <format>', 'Result format (table, json, yaml)')
    .action(async (workspacePath: string, options: unknown) => {
      const validated = validate(ElementsOptionsSchema, options, 'command options');
      const format = validated.format ?? CONFIG.output.format;
      try {
        const rows = await runElements(
          { workspacePath, type: validated.type },
          createProgress(format !== 'table')
        );
        console.log(OutputFormatter.format(rows, format));
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
