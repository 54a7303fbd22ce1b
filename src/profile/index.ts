export type { ProfileStore } from './adapter.js';
export { FileProfileStore, defaultProfilePath, CLIENT_HOME_ENV } from './file.js';
export {
  DEFAULT_PATTERN,
  DEFAULT_PROLOGUE,
  DEFAULT_PRESENCE_STATE,
  DEFAULT_PRESENCE_INTERVAL_SECS,
  profileSchema,
  createProfile,
  normalizeProfile,
  parseProfile,
  mergeUserIdentity,
  deviceKeyPairFromProfile,
  type Profile,
  type ProfileParams,
  type UserIdentity,
} from './types.js';
