import { z } from 'zod';

export const PackageJsonSchema = z
  .object({
    name: z.string(),
    version: z.string(),
  })
  .loose();

export type PackageJson = z.infer<typeof PackageJsonSchema>;
