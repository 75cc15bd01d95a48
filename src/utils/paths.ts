import os from 'os';
import path from 'path';

/**
 * Expand a leading ~ to the user's home directory
 */
export function expandPath(input: string): string {
  if (input === '~' || input.startsWith('~/') || input.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), input.slice(1));
  }
  return input;
}

/**
 * Make a remote identifier safe to use as a file name
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name.trim().replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return cleaned.length > 0 ? cleaned : 'video';
}

export function artifactPath(directory: string, jobId: string): string {
  return path.join(directory, `${sanitizeFileName(jobId)}.mp4`);
}
