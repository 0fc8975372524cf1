import { createHttpHeaders, PipelineRequest } from '@azure/core-rest-pipeline';
import { AuthError } from '@converge/contracts';
import { describe, expect, it, vi } from 'vitest';

import { KNOWN_CLOUDS, resolveCloud, resourceManagerScope } from '../src/index';

function metadataClient(status: number, body: unknown) {
  return {
    sendRequest: vi.fn(async (request: PipelineRequest) => ({ request, status, headers: createHttpHeaders(), bodyAsText: JSON.stringify(body) })),
  };
}

const STACK_METADATA = {
  galleryEndpoint: 'https://portal.stack.example.com:30015/',
  authentication: {
    loginEndpoint: 'https://login.stack.example.com/adfs/',
    audiences: ['https://management.adfs.stack.example.com/'],
  },
};

describe('CloudEnvironment', () => {
  it('should resolve well-known clouds without a request', async () => {
    const client = metadataClient(200, {});

    await expect(resolveCloud('AzureChinaCloud', client)).resolves.toBe(KNOWN_CLOUDS.AzureChinaCloud);
    expect(client.sendRequest).not.toHaveBeenCalled();
  });

  it('should build the resource manager scope', () => {
    expect(resourceManagerScope(KNOWN_CLOUDS.AzureCloud)).toBe('https://management.azure.com/.default');
  });

  it('should discover endpoints from a metadata URL', async () => {
    const client = metadataClient(200, STACK_METADATA);

    const cloud = await resolveCloud('https://management.stack.example.com', client);

    expect(cloud).toEqual({
      name: 'https://management.stack.example.com',
      resourceManager: 'https://management.stack.example.com/',
      activeDirectory: 'https://login.stack.example.com/adfs',
      activeDirectoryResourceId: 'https://management.adfs.stack.example.com/',
    });
    expect(client.sendRequest.mock.calls[0][0].url).toBe('https://management.stack.example.com/metadata/endpoints?api-version=1.0');
  });

  it('should reject names that are neither known nor URLs', async () => {
    await expect(resolveCloud('Mars', metadataClient(200, {}))).rejects.toThrow(
      'cloud_environment must be an endpoint discovery URL or one of AzureCloud, AzureChinaCloud, AzureUSGovernment, AzureGermanCloud, got "Mars"'
    );
    await expect(resolveCloud('ftp://stack.example.com', metadataClient(200, {}))).rejects.toBeInstanceOf(AuthError);
  });

  it('should report an unreachable or malformed metadata endpoint', async () => {
    await expect(resolveCloud('https://stack.example.com', metadataClient(404, {}))).rejects.toThrow(
      'cloud_environment https://stack.example.com could not be resolved: metadata endpoint answered HTTP 404'
    );
    await expect(resolveCloud('https://stack.example.com', metadataClient(200, { authentication: { audiences: [] } }))).rejects.toBeInstanceOf(AuthError);
  });
});
