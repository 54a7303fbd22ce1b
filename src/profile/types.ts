import { z } from 'zod';
import { bytesToHex, hexToBytes32 } from '../crypto/utils.js';
import type { DeviceKeyPair } from '../crypto/keys.js';
import { EngineError } from '../engine/errors.js';

export const DEFAULT_PATTERN = 'XK';
export const DEFAULT_PROLOGUE = 'burrow';
export const DEFAULT_PRESENCE_STATE = 'online';
export const DEFAULT_PRESENCE_INTERVAL_SECS = 30;

/**
 * Local device profile. Keys are hex encoded.
 */
export const profileSchema = z.object({
  deviceId: z.string().min(1),
  serverUrl: z.string().min(1),
  domain: z.string(),
  privateKey: z.string(),
  publicKey: z.string(),
  noisePattern: z.string().default(''),
  prologue: z.string().default(''),
  tlsCaPath: z.string().optional(),
  serverStatic: z.string().optional(),
  insecure: z.boolean().default(false),
  presenceState: z.string().default(''),
  presenceIntervalSecs: z.number().int().nonnegative().default(0),
  traceparent: z.string().optional(),
  userHandle: z.string().optional(),
  userDisplayName: z.string().optional(),
  userAvatarUrl: z.string().optional(),
  userId: z.string().optional(),
  sessionToken: z.string().optional(),
  deviceName: z.string().optional(),
});

export type Profile = z.infer<typeof profileSchema>;

/**
 * User identity fields the server may update during the handshake
 */
export type UserIdentity = Pick<Profile, 'userHandle' | 'userDisplayName' | 'userAvatarUrl' | 'userId'>;

/**
 * Parameters for building a profile without reading one from storage
 */
export interface ProfileParams {
  deviceId: string;
  serverUrl: string;
  domain: string;
  keys: DeviceKeyPair;
  pattern?: string;
  prologue?: string;
  tlsCaPath?: string;
  serverStatic?: string;
  insecure?: boolean;
  presenceState?: string;
  presenceIntervalSecs?: number;
  traceparent?: string;
  user?: UserIdentity;
  sessionToken?: string;
  deviceName?: string;
}

export function createProfile(params: ProfileParams): Profile {
  return normalizeProfile({
    deviceId: params.deviceId,
    serverUrl: params.serverUrl,
    domain: params.domain,
    privateKey: bytesToHex(params.keys.privateKey),
    publicKey: bytesToHex(params.keys.publicKey),
    noisePattern: params.pattern ?? DEFAULT_PATTERN,
    prologue: params.prologue ?? DEFAULT_PROLOGUE,
    tlsCaPath: params.tlsCaPath,
    serverStatic: params.serverStatic,
    insecure: params.insecure ?? false,
    presenceState: params.presenceState ?? DEFAULT_PRESENCE_STATE,
    presenceIntervalSecs: params.presenceIntervalSecs ?? DEFAULT_PRESENCE_INTERVAL_SECS,
    traceparent: params.traceparent,
    ...params.user,
    sessionToken: params.sessionToken,
    deviceName: params.deviceName,
  });
}

/**
 * Fill empty fields with defaults
 */
export function normalizeProfile(profile: Profile): Profile {
  return {
    ...profile,
    noisePattern: profile.noisePattern || DEFAULT_PATTERN,
    prologue: profile.prologue || DEFAULT_PROLOGUE,
    presenceState: profile.presenceState || DEFAULT_PRESENCE_STATE,
    presenceIntervalSecs: profile.presenceIntervalSecs || DEFAULT_PRESENCE_INTERVAL_SECS,
  };
}

/**
 * Validate an unknown document (stored JSON) as a profile
 */
export function parseProfile(raw: unknown): Profile {
  const parsed = profileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid profile: ${issue.path.join('.') || 'root'}: ${issue.message}`);
  }
  return normalizeProfile(parsed.data);
}

/**
 * Merge identity fields learned from the server.
 * Returns the updated profile and whether anything changed.
 */
export function mergeUserIdentity(
  profile: Profile,
  learned: UserIdentity
): { profile: Profile; changed: boolean } {
  const next: Profile = { ...profile };
  let changed = false;
  for (const key of ['userHandle', 'userDisplayName', 'userAvatarUrl', 'userId'] as const) {
    const value = learned[key];
    if (value !== undefined && value !== profile[key]) {
      next[key] = value;
      changed = true;
    }
  }
  return { profile: next, changed };
}

/**
 * Decode the profile's hex device keys
 */
export function deviceKeyPairFromProfile(profile: Profile): DeviceKeyPair {
  try {
    return {
      privateKey: hexToBytes32(profile.privateKey),
      publicKey: hexToBytes32(profile.publicKey),
    };
  } catch (error) {
    throw EngineError.wrap('invalid-profile', 'invalid device keys', error);
  }
}
