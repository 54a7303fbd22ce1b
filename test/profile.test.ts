import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { bytesToHex, deriveDeviceKeyPair } from '../src/crypto/index.js';
import { EngineError } from '../src/engine/errors.js';
import {
  FileProfileStore,
  createProfile,
  defaultProfilePath,
  deviceKeyPairFromProfile,
  mergeUserIdentity,
  parseProfile,
  type Profile,
} from '../src/profile/index.js';

const keys = deriveDeviceKeyPair(new Uint8Array(64).fill(3));

const testProfile = (deviceId = 'device-1', overrides: Partial<Profile> = {}): Profile => ({
  ...createProfile({
    deviceId,
    serverUrl: 'https://chat.example.test',
    domain: 'chat.example.test',
    keys,
  }),
  ...overrides,
});

describe('Profile', () => {
  it('should apply defaults when created', () => {
    const profile = testProfile();

    expect(profile.noisePattern).toBe('XK');
    expect(profile.prologue).toBe('burrow');
    expect(profile.presenceState).toBe('online');
    expect(profile.presenceIntervalSecs).toBe(30);
    expect(profile.insecure).toBe(false);
    expect(profile.privateKey).toBe(bytesToHex(keys.privateKey));
    expect(profile.publicKey).toBe(bytesToHex(keys.publicKey));
  });

  it('should fill empty fields of stored documents', () => {
    const profile = parseProfile({
      deviceId: 'device-2',
      serverUrl: 'https://chat.example.test',
      domain: 'chat.example.test',
      privateKey: '',
      publicKey: '',
      noisePattern: '',
    });

    expect(profile.noisePattern).toBe('XK');
    expect(profile.prologue).toBe('burrow');
    expect(profile.presenceState).toBe('online');
    expect(profile.presenceIntervalSecs).toBe(30);
    expect(profile.insecure).toBe(false);
  });

  it('should reject invalid documents', () => {
    expect(() => parseProfile({})).toThrow('Invalid profile: deviceId: Required');
    expect(() => parseProfile({ ...testProfile(), insecure: 'yes' })).toThrow('Invalid profile: insecure:');
  });

  it('should decode device keys', () => {
    const decoded = deviceKeyPairFromProfile(testProfile());
    expect(bytesToHex(decoded.publicKey)).toBe(bytesToHex(keys.publicKey));
  });

  it('should reject malformed device keys as a configuration error', () => {
    let failure: unknown = null;
    try {
      deviceKeyPairFromProfile(testProfile('device-1', { privateKey: 'ab' }));
    } catch (error) {
      failure = error;
    }
    expect(failure).toBeInstanceOf(EngineError);
    expect(failure).toMatchObject({
      kind: 'invalid-profile',
      category: 'configuration',
      message: 'invalid device keys: Expected 32 bytes, got 1',
    });
  });

  describe('mergeUserIdentity', () => {
    it('should report changes', () => {
      const { profile, changed } = mergeUserIdentity(testProfile('device-1', { userHandle: 'old' }), {
        userHandle: 'new',
        userId: 'u-1',
      });

      expect(changed).toBe(true);
      expect(profile.userHandle).toBe('new');
      expect(profile.userId).toBe('u-1');
    });

    it('should not flag identical or absent values', () => {
      const original = testProfile('device-1', { userHandle: 'same' });
      const { profile, changed } = mergeUserIdentity(original, { userHandle: 'same' });

      expect(changed).toBe(false);
      expect(profile).toEqual(original);
    });

    it('should leave the input untouched', () => {
      const original = testProfile();
      mergeUserIdentity(original, { userDisplayName: 'Someone' });
      expect(original.userDisplayName).toBeUndefined();
    });
  });
});

describe('FileProfileStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'profile-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should resolve the default location', () => {
    expect(defaultProfilePath({ BURROW_CLIENT_HOME: '/srv/burrow' })).toBe('/srv/burrow/client.json');
    expect(defaultProfilePath({ HOME: '/home/tester' })).toBe('/home/tester/.config/burrow/client.json');
  });

  it('should return null when the file is missing', async () => {
    const store = new FileProfileStore(path.join(dir, 'client.json'));
    expect(await store.load()).toBeNull();
  });

  it('should write pretty JSON and read it back', async () => {
    const filePath = path.join(dir, 'nested', 'client.json');
    const store = new FileProfileStore(filePath);
    const profile = testProfile('device-1', { serverStatic: 'aa'.repeat(32) });

    await store.save(profile);

    const text = await readFile(filePath, 'utf8');
    expect(text).toBe(`${JSON.stringify(profile, null, 2)}\n`);
    expect(await store.load()).toEqual(profile);
  });

  it('should surface malformed files', async () => {
    const filePath = path.join(dir, 'client.json');
    await writeFile(filePath, '{"deviceId": 1}');

    await expect(new FileProfileStore(filePath).load()).rejects.toThrow(
      'Invalid profile: deviceId: Expected string, received number'
    );
  });
});
