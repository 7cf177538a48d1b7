/**
 * An HTTP endpoint polled to decide whether a container instance is healthy.
 * Immutable; two checks are the same check when every field matches.
 */
export class HttpHealthCheck {
  readonly name: string;
  readonly url: string;
  /** Polling interval, in seconds. */
  readonly interval: number;
  /** Timeout, in milliseconds. */
  readonly timeout: number;

  constructor(name: string, url: string, interval: number, timeout: number) {
    this.name = name;
    this.url = url;
    this.interval = interval;
    this.timeout = timeout;
    Object.freeze(this);
  }

  /** Value identity, used for set membership. */
  get key(): string {
    return JSON.stringify([this.name, this.url, this.interval, this.timeout]);
  }

  equals(other: HttpHealthCheck): boolean {
    return this.key === other.key;
  }
}
