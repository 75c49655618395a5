/**
 * Lookup Results
 *
 * Directory lookups return an explicit found/not-found union instead of
 * a nullable value, so every caller has to handle the miss.
 */

export interface Found<T> {
  readonly found: true;
  readonly value: T;
}

export interface NotFound {
  readonly found: false;
}

export type Lookup<T> = Found<T> | NotFound;

export function found<T>(value: T): Found<T> {
  return { found: true, value };
}

export function notFound(): NotFound {
  return { found: false };
}
