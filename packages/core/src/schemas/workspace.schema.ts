import { z } from 'zod';
import { InteractionStyle } from '../model/interaction-style.js';
import { Location } from '../model/location.js';

const PropertiesSchema = z.record(z.string(), z.string());

export const RelationshipJsonSchema = z
  .object({
    id: z.string().optional(),
    sourceId: z.string(),
    destinationId: z.string(),
    description: z.string().optional(),
    technology: z.string().optional(),
    interactionStyle: z.enum(InteractionStyle).optional(),
    tags: z.string().optional(),
    properties: PropertiesSchema.optional(),
  })
  .loose();

export type RelationshipJson = z.infer<typeof RelationshipJsonSchema>;

const ElementJsonSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    tags: z.string().optional(),
    url: z.string().optional(),
    properties: PropertiesSchema.optional(),
    relationships: z.array(RelationshipJsonSchema).optional(),
  })
  .loose();

export const ComponentJsonSchema = ElementJsonSchema.extend({
  technology: z.string().optional(),
}).loose();

export type ComponentJson = z.infer<typeof ComponentJsonSchema>;

export const ContainerJsonSchema = ComponentJsonSchema.extend({
  components: z.array(ComponentJsonSchema).optional(),
}).loose();

export type ContainerJson = z.infer<typeof ContainerJsonSchema>;

export const SoftwareSystemJsonSchema = ElementJsonSchema.extend({
  location: z.enum(Location).optional(),
  containers: z.array(ContainerJsonSchema).optional(),
}).loose();

export type SoftwareSystemJson = z.infer<typeof SoftwareSystemJsonSchema>;

export const PersonJsonSchema = ElementJsonSchema.extend({
  location: z.enum(Location).optional(),
}).loose();

export type PersonJson = z.infer<typeof PersonJsonSchema>;

export const HttpHealthCheckJsonSchema = z
  .object({
    name: z.string(),
    url: z.string(),
    interval: z.number().optional(),
    timeout: z.number().optional(),
  })
  .loose();

export type HttpHealthCheckJson = z.infer<typeof HttpHealthCheckJsonSchema>;

export const ContainerInstanceJsonSchema = z
  .object({
    id: z.string().min(1),
    containerId: z.string().min(1),
    instanceId: z.number().int().min(1),
    environment: z.string().optional(),
    tags: z.string().optional(),
    properties: PropertiesSchema.optional(),
    healthChecks: z.array(HttpHealthCheckJsonSchema).optional(),
    relationships: z.array(RelationshipJsonSchema).optional(),
  })
  .loose();

export type ContainerInstanceJson = z.infer<typeof ContainerInstanceJsonSchema>;

export interface DeploymentNodeJson {
  id: string;
  name: string;
  description?: string;
  technology?: string;
  environment?: string;
  instances?: number;
  tags?: string;
  url?: string;
  properties?: Record<string, string>;
  relationships?: RelationshipJson[];
  children?: DeploymentNodeJson[];
  containerInstances?: ContainerInstanceJson[];
}

export const DeploymentNodeJsonSchema: z.ZodType<DeploymentNodeJson> = z.lazy(() =>
  z
    .object({
      id: z.string().min(1),
      name: z.string().min(1),
      description: z.string().optional(),
      technology: z.string().optional(),
      environment: z.string().optional(),
      instances: z.number().int().min(1).optional(),
      tags: z.string().optional(),
      url: z.string().optional(),
      properties: PropertiesSchema.optional(),
      relationships: z.array(RelationshipJsonSchema).optional(),
      children: z.array(DeploymentNodeJsonSchema).optional(),
      containerInstances: z.array(ContainerInstanceJsonSchema).optional(),
    })
    .loose()
);

const ModelJsonSchema = z
  .object({
    people: z.array(PersonJsonSchema).optional(),
    softwareSystems: z.array(SoftwareSystemJsonSchema).optional(),
    deploymentNodes: z.array(DeploymentNodeJsonSchema).optional(),
  })
  .loose();

export type ModelJson = z.infer<typeof ModelJsonSchema>;

export const WorkspaceJsonSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    model: ModelJsonSchema.optional(),
  })
  .loose();

export type WorkspaceJson = z.infer<typeof WorkspaceJsonSchema>;
