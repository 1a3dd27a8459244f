import fs from 'node:fs';
import path from 'node:path';

/**
 * Read a recorded response body from ./fixtures
 */
export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');
}

export function loadFixture(name: string): unknown {
  const json: unknown = JSON.parse(readFixture(name));
  return json;
}
