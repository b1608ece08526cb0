import { readFileSync } from 'fs';
import { isRecord } from './records.js';

/**
 * Version of the installed CLI, read from its package.json.
 * Both src/utils and dist/utils sit two levels below the package root.
 */
export function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (isRecord(raw) && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // fall through to the placeholder below
  }
  return '0.0.0';
}
