import { CredentialChain } from '@converge/auth';
import { IClientFactory, ILogger } from '@converge/contracts';
import { ProviderClientGateway } from '@converge/gateway';
import { ReconciliationController } from '@converge/orchestrator';
import { MemoryClientFactory, MemoryCloud, SimulationStore } from '@converge/provider-memory';

import { ConnectionOptions, credentialFields } from './options';

export const SIMULATED_SUBSCRIPTION = '00000000-0000-0000-0000-000000000000';

export interface Session {
  clients: IClientFactory;
  subscriptionId: string;
  description: string;
  /** Releases the session; `persist` writes a simulated cloud back to its file. */
  close(persist: boolean): Promise<void>;
}

async function openSimulation(file: string, subscriptionId: string): Promise<Session> {
  const store = new SimulationStore(file);
  const cloud = new MemoryCloud();

  await store.lock();
  try {
    await store.load(cloud);
  } catch (error) {
    await store.unlock();
    throw error;
  }

  return {
    clients: new MemoryClientFactory(cloud),
    subscriptionId,
    description: `simulation ${store.filePath}`,
    close: async (persist) => {
      try {
        if (persist) await store.save(cloud);
      } finally {
        await store.unlock();
      }
    },
  };
}

export async function openSession(options: ConnectionOptions, logger: ILogger): Promise<Session> {
  if (options.simulate) return openSimulation(options.simulate, options.subscriptionId ?? SIMULATED_SUBSCRIPTION);

  const credential = await new CredentialChain({ logger }).resolve({ explicit: credentialFields(options), authSource: options.authSource });
  logger.debug(`Authenticated through ${credential.source} against ${credential.cloud.name}`);

  return {
    clients: new ProviderClientGateway(credential, { apiProfile: options.apiProfile, logger }),
    subscriptionId: credential.subscriptionId,
    description: `subscription ${credential.subscriptionId} (${credential.cloud.name})`,
    close: async () => {},
  };
}

export function createController(session: Session, options: ConnectionOptions, logger: ILogger): ReconciliationController {
  return new ReconciliationController(
    session.clients,
    {
      pollIntervalMs: options.pollInterval === undefined ? undefined : options.pollInterval * 1000,
      perHandleTimeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000,
    },
    logger
  );
}
