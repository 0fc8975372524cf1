import { IClientFactory, IProviderClient, ServiceBinding } from '@converge/contracts';

import { InMemoryProviderClient } from './InMemoryProviderClient';
import { MemoryCloud } from './MemoryCloud';

export class MemoryClientFactory implements IClientFactory {
  private readonly clients = new Map<string, IProviderClient>();

  constructor(readonly cloud: MemoryCloud = new MemoryCloud()) {}

  client(binding: ServiceBinding): IProviderClient {
    const key = binding.kind.toLowerCase();

    let client = this.clients.get(key);
    if (!client) {
      client = new InMemoryProviderClient(this.cloud, binding.kind);
      this.clients.set(key, client);
    }
    return client;
  }
}
