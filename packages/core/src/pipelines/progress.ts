/**
 * Progress reporting abstraction for pipeline functions.
 *
 * Library callers pass SilentProgress; the CLI passes a console-backed reporter.
 */
export interface ProgressReporter {
  section(title: string): void;
  start(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
  warn(message: string): void;
  info(message: string): void;
}

/** No-op progress reporter that ignores every call. */
export class SilentProgress implements ProgressReporter {
  section(_title: string): void {
    /* noop */
  }
  start(_message: string): void {
    /* noop */
  }
  succeed(_message: string): void {
    /* noop */
  }
  fail(_message: string): void {
    /* noop */
  }
  warn(_message: string): void {
    /* noop */
  }
  info(_message: string): void {
    /* noop */
  }
}
