import { describe, it, expect, vi } from 'vitest';
import type { V1Lease } from '@kubernetes/client-node';
import { KubeLeaseRegistry } from '@kube/leaseRegistry';
import type { LeaseReader } from '@kube/leaseRegistry';
import { isNotFound } from '@kube/errors';
import { createLease } from '../../helpers/fixtures';

function httpError(code: number, message: string): Error {
  return Object.assign(new Error(message), { code });
}

function createRegistry(read: LeaseReader['readNamespacedLease']) {
  const readNamespacedLease = vi.fn(read);
  return { registry: new KubeLeaseRegistry({ readNamespacedLease }, 'kube-node-lease'), readNamespacedLease };
}

describe('KubeLeaseRegistry', () => {
  it('should map an existing lease', async () => {
    const { registry, readNamespacedLease } = createRegistry(async ({ name }) => createLease(name));

    const lease = await registry.get('node-a');

    expect(lease).toEqual({
      nodeName: 'node-a',
      holderIdentity: 'node-a',
      renewTime: new Date('2026-01-01T00:00:00.000Z'),
    });
    expect(readNamespacedLease).toHaveBeenCalledWith({ name: 'node-a', namespace: 'kube-node-lease' });
  });

  it('should fall back to the requested name for a lease without metadata', async () => {
    const { registry } = createRegistry(async (): Promise<V1Lease> => ({}));

    expect(await registry.get('node-b')).toEqual({
      nodeName: 'node-b',
      holderIdentity: undefined,
      renewTime: undefined,
    });
  });

  it('should report a missing lease as undefined', async () => {
    const { registry } = createRegistry(async () => {
      throw httpError(404, 'HTTP-Code: 404 Message: leases "node-c" not found');
    });

    expect(await registry.get('node-c')).toBeUndefined();
  });

  it('should propagate other API errors', async () => {
    const { registry } = createRegistry(async () => {
      throw httpError(403, 'forbidden');
    });

    await expect(registry.get('node-a')).rejects.toThrow('forbidden');
  });
});

describe('isNotFound', () => {
  it('should recognise 404 codes and status codes', () => {
    expect(isNotFound({ code: 404 })).toBe(true);
    expect(isNotFound({ statusCode: 404 })).toBe(true);
  });

  it('should reject other values', () => {
    expect(isNotFound({ code: 500 })).toBe(false);
    expect(isNotFound({ code: '404' })).toBe(false);
    expect(isNotFound(new Error('not found'))).toBe(false);
    expect(isNotFound(null)).toBe(false);
    expect(isNotFound('404')).toBe(false);
  });
});
