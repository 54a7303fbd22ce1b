import type { Profile } from './types.js';

/**
 * Abstract profile persistence.
 * Implementations can use a JSON file or any other backend.
 */
export interface ProfileStore {
  /**
   * Load the stored profile (the most recently saved one when the backend
   * holds several), or null when nothing has been saved yet
   */
  load(): Promise<Profile | null>;

  /**
   * Persist a profile, replacing any previous copy for the same device
   */
  save(profile: Profile): Promise<void>;

  /**
   * Release the backend
   */
  close(): Promise<void>;
}
