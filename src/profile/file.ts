import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import * as path from 'node:path';
import type { ProfileStore } from './adapter.js';
import { parseProfile, type Profile } from './types.js';

/**
 * Environment variable overriding the profile directory
 */
export const CLIENT_HOME_ENV = 'BURROW_CLIENT_HOME';

/**
 * Default profile location: `$BURROW_CLIENT_HOME/client.json`, falling back
 * to `~/.config/burrow/client.json`
 */
export function defaultProfilePath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env[CLIENT_HOME_ENV] ?? path.join(env.HOME ?? homedir(), '.config', 'burrow');
  return path.join(base, 'client.json');
}

/**
 * Profile stored as a pretty-printed JSON file
 */
export class FileProfileStore implements ProfileStore {
  constructor(readonly filePath: string = defaultProfilePath()) {}

  async load(): Promise<Profile | null> {
    let data: string;
    try {
      data = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
    return parseProfile(JSON.parse(data));
  }

  async save(profile: Profile): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(profile, null, 2)}\n`, 'utf8');
  }

  async close(): Promise<void> {}
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
