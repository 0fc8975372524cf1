import { IOperationHandle, ProviderRequestError, ResourceIdentity, WriteResult } from '@converge/contracts';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MemoryClientFactory, MemoryCloud } from '../src/index';

const VM = ResourceIdentity.of('sub-1', 'rg-app', 'Microsoft.Compute/virtualMachines', 'vm-01');
const DISK = ResourceIdentity.of('sub-1', 'rg-app', 'Microsoft.Compute/disks', 'data-01');

function asHandle(result: WriteResult): IOperationHandle {
  if (result.kind !== 'operation') throw new Error('expected an operation handle');
  return result;
}

describe('InMemoryProviderClient', () => {
  describe('synchronous cloud', () => {
    let cloud: MemoryCloud;
    let factory: MemoryClientFactory;

    beforeEach(() => {
      cloud = new MemoryCloud();
      factory = new MemoryClientFactory(cloud);
    });

    it('should hand out one client per kind', () => {
      expect(factory.client({ kind: 'Microsoft.Compute/disks' })).toBe(factory.client({ kind: 'microsoft.compute/disks', apiVersion: '2023-04-02' }));
    });

    it('should create resources with server-populated fields', async () => {
      const disks = factory.client({ kind: 'Microsoft.Compute/disks' });

      const result = await disks.createOrUpdate(DISK, { location: 'westeurope', properties: { diskSizeGB: 64 } });

      const expected = {
        location: 'westeurope',
        id: DISK.toString(),
        name: 'data-01',
        type: 'Microsoft.Compute/disks',
        properties: { diskSizeGB: 64, provisioningState: 'Succeeded' },
      };
      expect(result).toEqual({ kind: 'immediate', identity: DISK, state: expected });
      await expect(disks.get(DISK)).resolves.toEqual(expected);
      expect(cloud.writeCount('createOrUpdate')).toBe(1);
    });

    it('should refuse identities of another kind', async () => {
      await expect(factory.client({ kind: 'Microsoft.Compute/disks' }).delete(VM)).rejects.toThrow('is not a Microsoft.Compute/disks');
    });

    it('should report injected request failures', async () => {
      cloud.failNext(DISK, 'createOrUpdate', { mode: 'request', message: 'quota exceeded', statusCode: 429, code: 'TooManyRequests' });
      const disks = factory.client({ kind: 'Microsoft.Compute/disks' });

      await expect(disks.createOrUpdate(DISK, {})).rejects.toMatchObject({ statusCode: 429, code: 'TooManyRequests' });
      await expect(disks.createOrUpdate(DISK, {})).resolves.toMatchObject({ kind: 'immediate' });
    });

    it('should mark the resource failed for provisioning failures', async () => {
      cloud.failNext(DISK, 'createOrUpdate', { mode: 'provisioning', message: 'allocation failed' });
      const disks = factory.client({ kind: 'Microsoft.Compute/disks' });

      await disks.createOrUpdate(DISK, {});

      await expect(disks.get(DISK)).resolves.toMatchObject({ properties: { provisioningState: 'Failed' } });
    });

    it('should switch power through resource actions and expose it in the instance view', async () => {
      cloud.seed(VM, { location: 'westeurope' });
      const vms = factory.client({ kind: 'Microsoft.Compute/virtualMachines' });

      await vms.invoke(VM, 'deallocate');
      const response = await vms.request({ method: 'GET', path: `${VM.toString()}/instanceView` });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        statuses: [
          { code: 'ProvisioningState/succeeded', level: 'Info' },
          { code: 'PowerState/deallocated', level: 'Info' },
        ],
      });
    });

    it('should reject unknown actions and missing resources', async () => {
      const vms = factory.client({ kind: 'Microsoft.Compute/virtualMachines' });

      await expect(vms.invoke(VM, 'hibernate')).rejects.toThrow('Operation hibernate is not supported');
      await expect(vms.invoke(VM, 'start')).rejects.toBeInstanceOf(ProviderRequestError);
      await expect(vms.request({ method: 'GET', path: VM.toString() })).resolves.toMatchObject({ status: 404 });
    });
  });

  describe('eventual consistency', () => {
    it('should keep serving a deleted resource for the configured number of reads', async () => {
      const cloud = new MemoryCloud({ ghostReads: 2 });
      cloud.seed(DISK, {});
      const disks = new MemoryClientFactory(cloud).client({ kind: 'Microsoft.Compute/disks' });

      await disks.delete(DISK);

      await expect(disks.get(DISK)).resolves.toBeDefined();
      await expect(disks.get(DISK)).resolves.toBeDefined();
      await expect(disks.get(DISK)).resolves.toBeUndefined();
    });
  });

  describe('latency', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should complete operations once their latency has passed', async () => {
      const cloud = new MemoryCloud({ latencyMs: 2_000 });
      const disks = new MemoryClientFactory(cloud).client({ kind: 'Microsoft.Compute/disks' });

      const handle = asHandle(await disks.createOrUpdate(DISK, { location: 'westeurope' }));

      await expect(handle.status()).resolves.toBe('running');
      await expect(disks.get(DISK)).resolves.toBeUndefined();

      vi.advanceTimersByTime(2_000);

      await expect(handle.status()).resolves.toBe('succeeded');
      expect(handle.result()).toMatchObject({ location: 'westeurope' });
      await expect(disks.get(DISK)).resolves.toMatchObject({ location: 'westeurope' });
    });

    it('should fail operations with an injected failure', async () => {
      const cloud = new MemoryCloud({ latencyMs: 1_000 });
      cloud.seed(DISK, {});
      cloud.failNext(DISK, 'delete', { mode: 'operation', message: 'disk is attached' });
      const disks = new MemoryClientFactory(cloud).client({ kind: 'Microsoft.Compute/disks' });

      const handle = asHandle(await disks.delete(DISK));
      vi.advanceTimersByTime(1_000);

      await expect(handle.status()).resolves.toBe('failed');
      expect(handle.failure()?.message).toBe('disk is attached');
      await expect(disks.get(DISK)).resolves.toBeDefined();
    });
  });
});
