import { SubscriptionClient } from '@azure/arm-subscriptions';
import type { HttpClient } from '@azure/core-rest-pipeline';
import { AzureCliCredential, ManagedIdentityCredential, TokenCredential } from '@azure/identity';
import { AuthError, describeError, ILogger, silentLogger } from '@converge/contracts';

import { cliConfigDir, findCliSubscription, loadCliSession } from './CliSession';
import { CloudEnvironment, DEFAULT_CLOUD, resolveCloud, resourceManagerScope } from './CloudEnvironment';
import { compactFields, readEnvironmentFields } from './environment';
import { IniProfileStore, IProfileStore } from './ProfileStore';
import { buildTokenCredential, credentialShape } from './tokenCredentials';
import { AuthSource, CertValidationMode, CHAIN_ORDER, ChainSource, Credential, CredentialFields, Environment } from './types';

export interface ResolveInput {
  explicit?: CredentialFields;
  environment?: Environment;
  profiles?: IProfileStore;
  authSource?: AuthSource;
}

export interface CredentialChainOptions {
  logger?: ILogger;
  /** Used to fetch cloud metadata from endpoint-discovery URLs. */
  httpClient?: HttpClient;
}

type SourceAttempt =
  | { ok: true; fields: CredentialFields; tokenCredential?: TokenCredential; cloudName?: string }
  | { ok: false; reason: string };

interface ResolveContext {
  explicit: CredentialFields;
  environment: Environment;
  envFields: CredentialFields;
  profiles: IProfileStore;
  clouds: Map<string, Promise<CloudEnvironment>>;
}

const REMEDIATION = 'Either pass credentials as parameters, set environment variables, define a profile in ~/.azure/credentials, or log in with Azure CLI (az login).';

const MISSING_ATTRIBUTES =
  'some attributes were missing; credentials must include client_id, secret and tenant, or ad_user and password, or an access token';

function isCertValidationMode(value: string): value is CertValidationMode {
  return value === 'validate' || value === 'ignore';
}

/**
 * Resolves one credential and subscription from the first usable source.
 * Sources: managed identity, Azure CLI session, explicit parameters, environment variables, credential file.
 */
export class CredentialChain {
  private readonly logger: ILogger;
  private readonly httpClient?: HttpClient;

  constructor(options: CredentialChainOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.httpClient = options.httpClient;
  }

  async resolve(input: ResolveInput = {}): Promise<Credential> {
    const environment = input.environment ?? process.env;
    const context: ResolveContext = {
      explicit: compactFields(input.explicit ?? {}),
      environment,
      envFields: readEnvironmentFields(environment),
      profiles: input.profiles ?? new IniProfileStore(),
      clouds: new Map(),
    };

    const authSource = input.authSource ?? 'auto';
    const order: readonly ChainSource[] = authSource === 'auto' ? CHAIN_ORDER : [authSource];
    const tried: string[] = [];

    for (const source of order) {
      this.logger.debug(`Trying credential source ${source}`);
      const attempt = await this.attempt(source, context);

      if (attempt.ok) {
        this.logger.debug(`Using credentials from ${source}`);
        return this.finish(source, attempt, context);
      }

      this.logger.debug(`Credential source ${source} not usable: ${attempt.reason}`);
      tried.push(`${source} (${attempt.reason})`);
    }

    throw new AuthError(`Failed to get credentials. Tried: ${tried.join('; ')}. ${REMEDIATION}`, [...order]);
  }

  private async attempt(source: ChainSource, context: ResolveContext): Promise<SourceAttempt> {
    try {
      switch (source) {
        case 'msi':
          return await this.fromManagedIdentity(context);
        case 'cli':
          return await this.fromCliSession(context);
        case 'explicit':
          return await this.fromExplicit(context);
        case 'env':
          return await this.fromEnvironment(context);
        case 'credential_file':
          return await this.fromProfile(context.explicit.profile ?? 'default', context);
      }
    } catch (error) {
      if (error instanceof AuthError) return { ok: false, reason: error.message };
      throw error;
    }
  }

  private async fromManagedIdentity(context: ResolveContext): Promise<SourceAttempt> {
    const clientId = context.explicit.clientId;
    const credential = clientId ? new ManagedIdentityCredential({ clientId }) : new ManagedIdentityCredential();
    const cloud = await this.cloud(context.explicit.cloudEnvironment ?? context.envFields.cloudEnvironment ?? DEFAULT_CLOUD, context);

    try {
      await credential.getToken(resourceManagerScope(cloud));
    } catch (error) {
      return { ok: false, reason: `no managed identity token: ${describeError(error)}` };
    }

    let subscriptionId = context.explicit.subscriptionId ?? context.envFields.subscriptionId;
    if (!subscriptionId)
      try {
        const client = new SubscriptionClient(credential, { endpoint: cloud.resourceManager });
        for await (const subscription of client.subscriptions.list()) {
          subscriptionId = subscription.subscriptionId;
          if (subscriptionId) break;
        }
      } catch (error) {
        return { ok: false, reason: `failed to list subscriptions of the managed identity: ${describeError(error)}` };
      }

    if (!subscriptionId) return { ok: false, reason: 'the managed identity has access to no subscription' };
    return { ok: true, fields: { subscriptionId }, tokenCredential: credential };
  }

  private async fromCliSession(context: ResolveContext): Promise<SourceAttempt> {
    const session = await loadCliSession(cliConfigDir(context.environment));
    if (!session) return { ok: false, reason: 'no Azure CLI login found' };

    const wanted = context.explicit.subscriptionId ?? context.envFields.subscriptionId;
    const subscription = wanted ? findCliSubscription(session, wanted) : session.defaultSubscription;
    if (!subscription) return { ok: false, reason: wanted ? `subscription ${wanted} is not in the Azure CLI profile` : 'the Azure CLI profile lists no subscription' };

    return {
      ok: true,
      fields: { subscriptionId: subscription.id, tenant: subscription.tenantId },
      tokenCredential: new AzureCliCredential({ tenantId: subscription.tenantId }),
      cloudName: subscription.environmentName,
    };
  }

  private async fromExplicit(context: ResolveContext): Promise<SourceAttempt> {
    const { explicit } = context;
    if (explicit.profile) return this.fromProfile(explicit.profile, context);
    if (!explicit.clientId && !explicit.adUser && !explicit.token) return { ok: false, reason: 'no credential parameters given' };
    return this.usable(explicit);
  }

  private async fromEnvironment(context: ResolveContext): Promise<SourceAttempt> {
    const { envFields } = context;
    if (envFields.profile) return this.fromProfile(envFields.profile, context);
    if (!envFields.subscriptionId) return { ok: false, reason: 'AZURE_SUBSCRIPTION_ID is not set' };
    return this.usable(envFields);
  }

  private async fromProfile(profile: string, context: ResolveContext): Promise<SourceAttempt> {
    const fields = await context.profiles.load(profile);
    if (!fields) return { ok: false, reason: `profile "${profile}" not found in ${context.profiles.location}` };
    return this.usable(fields);
  }

  private usable(fields: CredentialFields): SourceAttempt {
    if (!fields.subscriptionId) return { ok: false, reason: 'credentials did not include a subscription_id value' };
    if (!credentialShape(fields)) return { ok: false, reason: MISSING_ATTRIBUTES };
    return { ok: true, fields };
  }

  private async finish(source: ChainSource, attempt: Extract<SourceAttempt, { ok: true }>, context: ResolveContext): Promise<Credential> {
    const { explicit, envFields } = context;
    const fields = attempt.fields;

    const certValidationMode = explicit.certValidationMode ?? fields.certValidationMode ?? envFields.certValidationMode ?? 'validate';
    if (!isCertValidationMode(certValidationMode)) throw new AuthError(`invalid cert_validation_mode: ${certValidationMode}`, [source]);

    const cloudName = explicit.cloudEnvironment ?? fields.cloudEnvironment ?? attempt.cloudName ?? envFields.cloudEnvironment ?? DEFAULT_CLOUD;
    const cloud = await this.cloud(cloudName, context);

    const authorityHost = explicit.adfsAuthorityUrl ?? fields.adfsAuthorityUrl ?? envFields.adfsAuthorityUrl ?? cloud.activeDirectory;

    const tokenCredential = attempt.tokenCredential ?? buildTokenCredential(fields, authorityHost);
    if (!tokenCredential) throw new AuthError(`Failed to authenticate with credentials from ${source}: ${MISSING_ATTRIBUTES}`, [source]);

    const subscriptionId = fields.subscriptionId;
    if (!subscriptionId) throw new AuthError(`Credentials from ${source} did not include a subscription_id value`, [source]);

    return Object.freeze({
      source,
      tokenCredential,
      subscriptionId,
      tenantId: fields.tenant,
      cloud,
      certValidationMode,
      authorityHost,
    });
  }

  private cloud(name: string, context: ResolveContext): Promise<CloudEnvironment> {
    let pending = context.clouds.get(name);
    if (!pending) {
      pending = resolveCloud(name, this.httpClient);
      context.clouds.set(name, pending);
    }
    return pending;
  }
}
