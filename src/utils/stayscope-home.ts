import { homedir } from 'os';
import { join } from 'path';

/**
 * Directory holding config.json and logs/; STAYSCOPE_HOME overrides ~/.stayscope
 */
export function getStayscopeHome(): string {
  return process.env.STAYSCOPE_HOME || join(homedir(), '.stayscope');
}

export function getStayscopePath(...paths: string[]): string {
  return join(getStayscopeHome(), ...paths);
}
