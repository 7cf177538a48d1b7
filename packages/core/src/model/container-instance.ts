import { Element } from './element.js';
import { HttpHealthCheck } from './http-health-check.js';
import { InteractionStyle } from './interaction-style.js';
import { Tags } from './tags.js';
import { InvalidArgumentError } from '../errors.js';
import { isUrl } from '../utils/url-utils.js';
import { isBlank } from '../utils/validation.js';
import type { Container } from './container.js';
import type { Model } from './model.js';
import type { Relationship } from './relationship.js';

export const DEFAULT_HEALTH_CHECK_INTERVAL_IN_SECONDS = 60;
export const DEFAULT_HEALTH_CHECK_TIMEOUT_IN_MILLISECONDS = 0;

/**
 * One running copy of a {@link Container} on a deployment node.
 *
 * Name and tags always reflect the container: `getName()` is null,
 * `setName()` and `removeTag()` do nothing.
 */
export class ContainerInstance extends Element {
  readonly type = 'ContainerInstance' as const;
  readonly instanceId: number;
  readonly environment: string;
  private container: Container | null = null;
  private containerId: string;
  private readonly healthChecks = new Map<string, HttpHealthCheck>();

  constructor(
    model: Model,
    id: string,
    container: Container | string,
    instanceId: number,
    environment: string
  ) {
    super(model, id, '');
    if (typeof container === 'string') {
      this.containerId = container;
    } else {
      this.containerId = container.id;
      this.container = container;
      this.addTags(...container.getTags(), Tags.CONTAINER_INSTANCE);
    }
    this.instanceId = instanceId;
    this.environment = environment;
  }

  /** The container this is an instance of, or null while the reference is unresolved. */
  getContainer(): Container | null {
    return this.container;
  }

  /**
   * @internal Used by the model when resolving references after a load.
   * Only an unresolved instance may be bound, and only to the container its
   * stored identifier names.
   */
  setContainer(container: Container): void {
    if (this.container !== null) {
      throw new InvalidArgumentError(
        `Container instance ${this.id} is already bound to a container.`,
        'container'
      );
    }
    if (container.id !== this.containerId) {
      throw new InvalidArgumentError(
        `Container instance ${this.id} refers to container ${this.containerId}, ` +
          `not ${container.id}.`,
        'container'
      );
    }
    this.container = container;
  }

  getContainerId(): string {
    if (this.container !== null) {
      return this.container.id;
    }
    return this.containerId;
  }

  getRequiredTags(): readonly string[] {
    return [];
  }

  removeTag(_tag: string): void {
    // tags mirror the container this instance is based on
  }

  getName(): null {
    return null;
  }

  setName(_name: string): void {
    // the name is taken from the container
  }

  getCanonicalName(): string {
    const base = this.container ? this.container.getCanonicalName() : `[${this.containerId}]`;
    return `${base}[${String(this.instanceId)}]`;
  }

  getParent(): Element | null {
    return this.container ? this.container.getParent() : null;
  }

  uses(
    destination: ContainerInstance | null | undefined,
    description = '',
    technology = '',
    interactionStyle = InteractionStyle.Synchronous
  ): Relationship | null {
    if (!destination) {
      throw new InvalidArgumentError(
        'The destination of a relationship must be specified.',
        'destination'
      );
    }
    return this.getModel().addRelationship(
      this,
      destination,
      description,
      technology,
      interactionStyle
    );
  }

  /** A copy of this instance's health checks. */
  getHealthChecks(): Set<HttpHealthCheck> {
    return new Set(this.healthChecks.values());
  }

  /**
   * Add an HTTP health check.
   *
   * @param interval - polling interval in seconds
   * @param timeout - timeout in milliseconds
   * @throws InvalidArgumentError if the name is empty, the URL is empty or malformed,
   *   or the interval/timeout is not zero or a positive integer
   */
  addHealthCheck(
    name: string,
    url: string,
    interval = DEFAULT_HEALTH_CHECK_INTERVAL_IN_SECONDS,
    timeout = DEFAULT_HEALTH_CHECK_TIMEOUT_IN_MILLISECONDS
  ): HttpHealthCheck {
    if (isBlank(name)) {
      throw new InvalidArgumentError('The name must not be null or empty.', 'name', {
        constraint: 'name',
      });
    }

    if (isBlank(url)) {
      throw new InvalidArgumentError('The URL must not be null or empty.', 'url', {
        constraint: 'url-empty',
      });
    }

    if (!isUrl(url)) {
      throw new InvalidArgumentError(`${url} is not a valid URL.`, 'url', {
        constraint: 'url-malformed',
      });
    }

    if (!Number.isInteger(interval) || interval < 0) {
      throw new InvalidArgumentError(
        'The polling interval must be zero or a positive integer.',
        'interval',
        { constraint: 'interval' }
      );
    }

    if (!Number.isInteger(timeout) || timeout < 0) {
      throw new InvalidArgumentError(
        'The timeout must be zero or a positive integer.',
        'timeout',
        { constraint: 'timeout' }
      );
    }

    const healthCheck = new HttpHealthCheck(name, url, interval, timeout);
    const existing = this.healthChecks.get(healthCheck.key);
    if (existing) {
      return existing;
    }
    this.healthChecks.set(healthCheck.key, healthCheck);
    return healthCheck;
  }
}
