import { ResourceManagementClient } from '@azure/arm-resources';
import { Credential, Environment, resourceManagerScope } from '@converge/auth';
import { IClientFactory, ILogger, IProviderClient, ProviderRequestError, ServiceBinding, silentLogger } from '@converge/contracts';

import { ApiProfile, DEFAULT_API_PROFILE, getApiProfile, profileApiVersion } from './apiProfiles';
import { ArmResourceClient, IArmPipeline } from './ArmResourceClient';
import { insecureTlsPolicy, userAgentPrefix } from './policies';

export interface GatewayOptions {
  apiProfile?: string;
  logger?: ILogger;
  environment?: Environment;
}

/** Provider namespace metadata needed for API version discovery. */
export interface IProviderCatalog {
  get(namespace: string): Promise<{ resourceTypes?: { resourceType?: string; apiVersions?: string[] }[] }>;
}

/**
 * Hands out resource clients that all share one authenticated ARM pipeline.
 * Clients are cached per kind and API version.
 */
export class ProviderClientGateway implements IClientFactory {
  private readonly arm: ResourceManagementClient;
  private readonly profile: ApiProfile;
  private readonly logger: ILogger;
  private readonly clients = new Map<string, IProviderClient>();
  private readonly discovered = new Map<string, Promise<string>>();

  constructor(
    readonly credential: Credential,
    options: GatewayOptions = {}
  ) {
    this.profile = getApiProfile(options.apiProfile ?? DEFAULT_API_PROFILE);
    this.logger = options.logger ?? silentLogger;

    this.arm = new ResourceManagementClient(credential.tokenCredential, credential.subscriptionId, {
      endpoint: credential.cloud.resourceManager,
      credentialScopes: [resourceManagerScope(credential.cloud)],
      userAgentOptions: { userAgentPrefix: userAgentPrefix(options.environment) },
      additionalPolicies: credential.certValidationMode === 'ignore' ? [{ policy: insecureTlsPolicy(), position: 'perCall' }] : [],
    });
  }

  get subscriptionId(): string {
    return this.credential.subscriptionId;
  }

  client(binding: ServiceBinding): IProviderClient {
    const pinned = binding.apiVersion ?? profileApiVersion(this.profile, binding.kind);
    const cacheKey = `${binding.kind.toLowerCase()}@${pinned ?? 'discovered'}`;

    let client = this.clients.get(cacheKey);
    if (!client) {
      const apiVersion = pinned ? () => Promise.resolve(pinned) : () => this.discoverApiVersion(binding.kind);
      client = new ArmResourceClient(this.pipeline(), this.credential.cloud.resourceManager, apiVersion, this.logger);
      this.clients.set(cacheKey, client);
    }
    return client;
  }

  protected pipeline(): IArmPipeline {
    return this.arm;
  }

  protected catalog(): IProviderCatalog {
    return this.arm.providers;
  }

  /** Newest non-preview API version the provider registers for the kind. */
  private discoverApiVersion(kind: string): Promise<string> {
    const key = kind.toLowerCase();
    let pending = this.discovered.get(key);

    if (!pending) {
      pending = this.lookupApiVersion(kind);
      // A failed lookup is not remembered, so the next call asks again.
      pending.catch(() => this.discovered.delete(key));
      this.discovered.set(key, pending);
    }
    return pending;
  }

  private async lookupApiVersion(kind: string): Promise<string> {
    const slash = kind.indexOf('/');
    const namespace = kind.slice(0, slash);
    const resourceType = kind.slice(slash + 1).toLowerCase();

    const provider = await this.catalog().get(namespace);
    const type = provider.resourceTypes?.find((candidate) => candidate.resourceType?.toLowerCase() === resourceType);
    const versions = [...(type?.apiVersions ?? [])].filter((version) => !version.toLowerCase().includes('preview')).sort();
    const latest = versions.at(-1);

    if (!latest) throw new ProviderRequestError(`No stable API version is registered for ${kind}`, { code: 'NoApiVersion' });

    this.logger.debug(`Using API version ${latest} for ${kind}`);
    return latest;
  }
}
