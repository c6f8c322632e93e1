import { hostname as osHostname } from 'node:os';
import { StartupError } from '../application/errors.js';

/**
 * Resolves the machine's hostname once, before any generator starts.
 * No identity, no generation: failure here is fatal.
 */
export function resolveHostname(lookup: () => string = osHostname): string {
  let name: string;
  try {
    name = lookup().trim();
  } catch (err: unknown) {
    throw new StartupError('Could not resolve hostname', { cause: err });
  }
  if (name === '') {
    throw new StartupError('Could not resolve hostname: empty value');
  }
  return name;
}
