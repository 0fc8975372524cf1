import * as fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { IniProfileStore } from '../src/index';

const CREDENTIALS = `[default]
subscription_id=sub-file
client_id=app-id
secret=test-secret
tenant=tenant-1

[staging]
subscription_id=sub-staging
ad_user=user@example.com
password=test-password
cloud_environment=AzureUSGovernment
`;

describe('IniProfileStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'converge-profiles-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should map profile keys onto credential fields', async () => {
    const file = path.join(dir, 'credentials');
    await fs.writeFile(file, CREDENTIALS, 'utf8');
    const store = new IniProfileStore(file);

    await expect(store.load('default')).resolves.toEqual({ subscriptionId: 'sub-file', clientId: 'app-id', secret: 'test-secret', tenant: 'tenant-1' });
    await expect(store.load('staging')).resolves.toEqual({
      subscriptionId: 'sub-staging',
      adUser: 'user@example.com',
      password: 'test-password',
      cloudEnvironment: 'AzureUSGovernment',
    });
  });

  it('should resolve undefined for a missing profile or file', async () => {
    const file = path.join(dir, 'credentials');
    await fs.writeFile(file, CREDENTIALS, 'utf8');

    await expect(new IniProfileStore(file).load('production')).resolves.toBeUndefined();
    await expect(new IniProfileStore(path.join(dir, 'missing')).load('default')).resolves.toBeUndefined();
  });
});
