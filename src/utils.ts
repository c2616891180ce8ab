// By default do not log.  (Logging to the console would work, but is noisy.)
let logger = (...args: unknown[]): unknown => undefined;

export function setLogger(fn: (...args: unknown[]) => unknown) {
  logger = fn;
}

export function log(...args: unknown[]) {
  logger(...args);
}

export function fail(
  msg: string,
  ErrorClass: new (msg: string) => Error = Error,
): never {
  throw new ErrorClass(msg);
};
