import * as fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';

export const DISK_ID = '/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/disks/data-01';
export const VM_ID = '/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/virtualMachines/vm-01';

export const DISK_MANIFEST = `resources:
  - resourceGroup: rg-app
    type: Microsoft.Compute/disks
    name: data-01
    spec:
      location: westeurope
      sku:
        name: Standard_LRS
      properties:
        diskSizeGB: 64
        creationData:
          createOption: Empty
      tags:
        env: test
`;

export function diskBody(overrides: { location?: string; diskSizeGB?: number } = {}) {
  return {
    location: overrides.location ?? 'westeurope',
    sku: { name: 'Standard_LRS' },
    properties: { diskSizeGB: overrides.diskSizeGB ?? 64, creationData: { createOption: 'Empty' }, provisioningState: 'Succeeded' },
    tags: { env: 'test' },
    id: DISK_ID,
    name: 'data-01',
    type: 'Microsoft.Compute/disks',
  };
}

/** A scratch directory holding a manifest and, optionally, a simulated cloud. */
export class Workspace {
  private constructor(readonly dir: string) {}

  static async create(): Promise<Workspace> {
    return new Workspace(await fs.mkdtemp(path.join(os.tmpdir(), 'converge-cli-')));
  }

  get manifestPath(): string {
    return path.join(this.dir, 'manifest.yaml');
  }

  get simulationPath(): string {
    return path.join(this.dir, 'cloud.json');
  }

  async writeManifest(content: string): Promise<void> {
    await fs.writeFile(this.manifestPath, content, 'utf8');
  }

  async seed(resources: { id: string; body: object; power?: string }[]): Promise<void> {
    const state = { version: 1, resources: resources.map((resource) => ({ power: 'running', ...resource })) };
    await fs.writeFile(this.simulationPath, JSON.stringify(state), 'utf8');
  }

  async readSimulation(): Promise<{ resources: { id: string; power: string; body: Record<string, unknown> }[] }> {
    return JSON.parse(await fs.readFile(this.simulationPath, 'utf8'));
  }

  async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  }

  async dispose(): Promise<void> {
    await fs.rm(this.dir, { recursive: true, force: true });
  }
}

/** Turns `process.exit(code)` into a thrown error so commands stop where they would have exited. */
export function trapExit() {
  return vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${String(code)})`);
  });
}

export function simulate(workspace: Workspace, ...args: string[]): string[] {
  return ['node', 'converge', workspace.manifestPath, '--simulate', workspace.simulationPath, '--subscription-id', 'sub-1', ...args];
}
