import { createDefaultHttpClient, createPipelineRequest, HttpClient } from '@azure/core-rest-pipeline';
import { AuthError, describeError } from '@converge/contracts';
import { z } from 'zod';

export interface CloudEnvironment {
  name: string;
  resourceManager: string;
  activeDirectory: string;
  activeDirectoryResourceId: string;
}

export const KNOWN_CLOUDS: Readonly<Record<string, CloudEnvironment>> = {
  AzureCloud: {
    name: 'AzureCloud',
    resourceManager: 'https://management.azure.com/',
    activeDirectory: 'https://login.microsoftonline.com',
    activeDirectoryResourceId: 'https://management.core.windows.net/',
  },
  AzureChinaCloud: {
    name: 'AzureChinaCloud',
    resourceManager: 'https://management.chinacloudapi.cn/',
    activeDirectory: 'https://login.chinacloudapi.cn',
    activeDirectoryResourceId: 'https://management.core.chinacloudapi.cn/',
  },
  AzureUSGovernment: {
    name: 'AzureUSGovernment',
    resourceManager: 'https://management.usgovcloudapi.net/',
    activeDirectory: 'https://login.microsoftonline.us',
    activeDirectoryResourceId: 'https://management.core.usgovcloudapi.net/',
  },
  AzureGermanCloud: {
    name: 'AzureGermanCloud',
    resourceManager: 'https://management.microsoftazure.de/',
    activeDirectory: 'https://login.microsoftonline.de',
    activeDirectoryResourceId: 'https://management.core.cloudapi.de/',
  },
};

export const DEFAULT_CLOUD = 'AzureCloud';

const metadataSchema = z.object({
  authentication: z.object({
    loginEndpoint: z.string().url(),
    audiences: z.array(z.string()).min(1),
  }),
});

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/** Token scope for calls against the resource manager. */
export function resourceManagerScope(cloud: CloudEnvironment): string {
  return `${trimSlash(cloud.resourceManager)}/.default`;
}

/**
 * Resolves a well-known cloud name, or fetches `<url>/metadata/endpoints?api-version=1.0` from an endpoint-discovery URL (Azure Stack).
 */
export async function resolveCloud(nameOrUrl: string, httpClient: HttpClient = createDefaultHttpClient()): Promise<CloudEnvironment> {
  const known = KNOWN_CLOUDS[nameOrUrl];
  if (known) return known;

  const invalid = `cloud_environment must be an endpoint discovery URL or one of ${Object.keys(KNOWN_CLOUDS).join(', ')}`;
  if (!URL.canParse(nameOrUrl)) throw new AuthError(`${invalid}, got "${nameOrUrl}"`);

  const base = new URL(nameOrUrl);
  if (base.protocol !== 'https:' && base.protocol !== 'http:') throw new AuthError(`${invalid}, got "${nameOrUrl}"`);

  const resourceManager = `${trimSlash(base.toString())}/`;
  const request = createPipelineRequest({ url: `${resourceManager}metadata/endpoints?api-version=1.0`, method: 'GET' });

  let bodyText: string | null | undefined;
  try {
    const response = await httpClient.sendRequest(request);
    if (response.status !== 200) throw new Error(`metadata endpoint answered HTTP ${response.status}`);
    bodyText = response.bodyAsText;
  } catch (error) {
    throw new AuthError(`cloud_environment ${nameOrUrl} could not be resolved: ${describeError(error)}`, [], error);
  }

  let body: unknown;
  try {
    body = JSON.parse(bodyText ?? '');
  } catch (error) {
    throw new AuthError(`cloud_environment ${nameOrUrl} could not be resolved: metadata is not JSON`, [], error);
  }

  const metadata = metadataSchema.safeParse(body);
  if (!metadata.success) throw new AuthError(`cloud_environment ${nameOrUrl} could not be resolved: ${metadata.error.issues[0].message}`);

  return {
    name: nameOrUrl,
    resourceManager,
    activeDirectory: trimSlash(metadata.data.authentication.loginEndpoint),
    activeDirectoryResourceId: metadata.data.authentication.audiences[0],
  };
}
