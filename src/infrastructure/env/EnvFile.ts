import * as dotenv from 'dotenv';
import { readFile, writeFile } from 'fs/promises';
import { FileOperationError } from '../../core/errors.js';

function lineKey(line: string): string | undefined {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return undefined;
  return Object.keys(dotenv.parse(trimmed))[0];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Set `key=value` in a .env file, replacing an existing assignment of the key
 * and keeping every other line (comments included). The file is written 0600.
 */
export async function upsertEnvValue(filePath: string, key: string, value: string): Promise<void> {
  let lines: string[] = [];
  try {
    const content = await readFile(filePath, 'utf8');
    lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') lines.pop();
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new FileOperationError('read', filePath, error);
    }
  }

  let found = false;
  const updated = lines.map((line) => {
    if (lineKey(line) === key) {
      found = true;
      return `${key}=${value}`;
    }
    return line;
  });
  if (!found) {
    updated.push(`${key}=${value}`);
  }

  try {
    await writeFile(filePath, `${updated.join('\n')}\n`, { mode: 0o600 });
  } catch (error) {
    throw new FileOperationError('write', filePath, error);
  }
}
