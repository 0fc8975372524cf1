import inquirer from 'inquirer';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApplyCommand } from '../src/commands/apply';
import { DISK_ID, DISK_MANIFEST, diskBody, simulate, trapExit, VM_ID, Workspace } from './helpers';

vi.mock('inquirer');
vi.mock('chalk', () => ({
  default: {
    blue: (m: string) => m,
    green: (m: string) => m,
    yellow: (m: string) => m,
    red: (m: string) => m,
    cyan: (m: string) => m,
    gray: (m: string) => m,
    bold: (m: string) => m,
  },
}));

describe('CLI: apply command', () => {
  let workspace: Workspace;

  beforeEach(async () => {
    vi.clearAllMocks();
    workspace = await Workspace.create();
    await workspace.writeManifest(DISK_MANIFEST);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await workspace.dispose();
  });

  it('should create resources and persist the simulated cloud with --yes', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createApplyCommand().parseAsync(simulate(workspace, '--yes'));

    expect(inquirer.prompt).not.toHaveBeenCalled();
    expect(consoleSpy).toHaveBeenCalledWith(`  + ${DISK_ID} created`);
    expect(consoleSpy).toHaveBeenCalledWith('\nApply complete!');

    const cloud = await workspace.readSimulation();
    expect(cloud.resources).toHaveLength(1);
    expect(cloud.resources[0].id).toBe(DISK_ID);
    expect(cloud.resources[0].body).toMatchObject({ location: 'westeurope', tags: { env: 'test' }, properties: { diskSizeGB: 64, provisioningState: 'Succeeded' } });
    expect(await workspace.exists(`${workspace.simulationPath}.lock`)).toBe(false);
  });

  it('should apply changes when confirmed', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.mocked(inquirer.prompt).mockResolvedValue({ confirm: true });

    await createApplyCommand().parseAsync(simulate(workspace));

    expect(inquirer.prompt).toHaveBeenCalledTimes(1);
    expect((await workspace.readSimulation()).resources).toHaveLength(1);
  });

  it('should abort if confirmation declined', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.mocked(inquirer.prompt).mockResolvedValue({ confirm: false });

    await createApplyCommand().parseAsync(simulate(workspace));

    expect(consoleSpy).toHaveBeenCalledWith('Apply cancelled.');
    expect(await workspace.exists(workspace.simulationPath)).toBe(false);
  });

  it('should do nothing when resources already match', async () => {
    await workspace.seed([{ id: DISK_ID, body: diskBody() }]);
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createApplyCommand().parseAsync(simulate(workspace));

    expect(consoleSpy).toHaveBeenCalledWith('No changes needed.');
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('should exit with 4 on an immutable field conflict', async () => {
    await workspace.seed([{ id: DISK_ID, body: diskBody({ location: 'northeurope' }) }]);
    const exitSpy = trapExit();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});

    await expect(createApplyCommand().parseAsync(simulate(workspace, '--yes'))).rejects.toThrow('process.exit(4)');

    expect(exitSpy).toHaveBeenCalledWith(4);
    expect(errorSpy).toHaveBeenCalledWith(
      'Apply failed:',
      'ImmutableFieldConflict: Field "location" cannot be changed from "northeurope" to "westeurope" on an existing resource'
    );
    expect(errorSpy).toHaveBeenCalledWith(`  while Update ${DISK_ID}`);
    expect((await workspace.readSimulation()).resources[0].body).toMatchObject({ location: 'northeurope' });
  });

  it('should refuse a saved plan made for another manifest', async () => {
    trapExit();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const planPath = path.join(workspace.dir, 'plan.json');
    await fs.writeFile(planPath, JSON.stringify({ version: '1.0', timestamp: 'then', manifest_hash: 'other', resources: [], attachments: [] }), 'utf8');

    await expect(createApplyCommand().parseAsync(simulate(workspace, '--plan', planPath))).rejects.toThrow('process.exit(2)');

    expect(errorSpy).toHaveBeenCalledWith('Apply failed:', 'The manifest has changed since the plan was saved. Run `converge plan` again.');
  });

  it('should reject a malformed plan file', async () => {
    trapExit();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const planPath = path.join(workspace.dir, 'plan.json');
    await fs.writeFile(planPath, JSON.stringify({ version: '1.0' }), 'utf8');

    await expect(createApplyCommand().parseAsync(simulate(workspace, '--plan', planPath))).rejects.toThrow('process.exit(2)');

    expect(errorSpy).toHaveBeenCalledWith('Apply failed:', 'Invalid plan file format.');
  });

  it('should attach disks to existing machines', async () => {
    await workspace.seed([
      { id: DISK_ID, body: diskBody() },
      { id: VM_ID, body: { location: 'westeurope', properties: { hardwareProfile: { vmSize: 'Standard_B2s' } } } },
    ]);
    await workspace.writeManifest(`attachments:\n  - state: attached\n    resources: [${DISK_ID}]\n    targets: [${VM_ID}]\n`);
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createApplyCommand().parseAsync(simulate(workspace, '--yes'));

    expect(consoleSpy).toHaveBeenCalledWith(`  > ${DISK_ID} will be attached to ${VM_ID}`);
    expect(consoleSpy).toHaveBeenCalledWith(`  > ${DISK_ID} attached to ${VM_ID}`);

    const vm = (await workspace.readSimulation()).resources.find((resource) => resource.id === VM_ID);
    expect(vm?.body).toMatchObject({
      properties: {
        hardwareProfile: { vmSize: 'Standard_B2s' },
        storageProfile: { dataDisks: [{ lun: 0, name: 'data-01', createOption: 'Attach', managedDisk: { id: DISK_ID } }] },
      },
    });
  });
});
