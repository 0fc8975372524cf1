import { systemErrorCode, toSpecObject } from '@converge/contracts';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { MemoryCloud, StoredResource } from './MemoryCloud';

const simulationSchema = z.object({
  version: z.literal(1),
  resources: z.array(
    z.object({
      id: z.string(),
      power: z.enum(['running', 'stopped', 'deallocated']),
      body: z.record(z.unknown()),
    })
  ),
});

export interface SimulationState {
  version: 1;
  resources: StoredResource[];
}

/**
 * Persists a `MemoryCloud` to a JSON file so that simulated runs build on each other.
 * Writing keeps the previous file as `<file>.bak`; `lock` guards against a concurrent run.
 */
export class SimulationStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async read(): Promise<SimulationState> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') return { version: 1, resources: [] };
      throw error;
    }

    const parsed = simulationSchema.safeParse(JSON.parse(content));
    if (!parsed.success) throw new Error(`${this.filePath} is not a simulation file: ${parsed.error.issues[0]?.message ?? 'invalid content'}`);

    return {
      version: 1,
      resources: parsed.data.resources.map((resource) => ({ id: resource.id, power: resource.power, body: toSpecObject(resource.body) })),
    };
  }

  async write(state: SimulationState): Promise<void> {
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') throw error;
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf8');
  }

  async load(cloud: MemoryCloud): Promise<void> {
    cloud.restore((await this.read()).resources);
  }

  async save(cloud: MemoryCloud): Promise<void> {
    await this.write({ version: 1, resources: cloud.list() });
  }

  get lockFilePath(): string {
    return `${this.filePath}.lock`;
  }

  async lock(): Promise<void> {
    try {
      await fs.writeFile(this.lockFilePath, String(Date.now()), { flag: 'wx' });
    } catch (error) {
      if (systemErrorCode(error) === 'EEXIST') throw new Error(`Simulation ${this.filePath} is locked by another process.`);
      throw error;
    }
  }

  async unlock(): Promise<void> {
    try {
      await fs.unlink(this.lockFilePath);
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') throw error;
    }
  }
}
