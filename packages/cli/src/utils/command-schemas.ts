import { z } from 'zod';

const OutputFormatSchema = z.enum(['table', 'json', 'yaml']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const ElementTypeSchema = z.enum([
  'Person',
  'SoftwareSystem',
  'Container',
  'Component',
  'DeploymentNode',
  'ContainerInstance',
]);

export const ElementsOptionsSchema = z.object({
  type: ElementTypeSchema.optional(),
  format: OutputFormatSchema.optional(),
});

export const RelationshipsOptionsSchema = z.object({
  format: OutputFormatSchema.optional(),
});

export const ValidateOptionsSchema = z.object({
  format: z.enum(['table', 'json']).default('table'),
  requireDescriptions: z.boolean().optional(),
  failOnWarnings: z.boolean().optional(),
});
