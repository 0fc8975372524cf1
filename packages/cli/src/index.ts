#!/usr/bin/env tsx
import { CONVERGE_VERSION } from '@converge/gateway';
import { Command } from 'commander';

import { createApplyCommand } from './commands/apply';
import { createAuthCommand } from './commands/auth';
import { createPlanCommand } from './commands/plan';

const program = new Command();

program.name('converge').description('Declarative reconciliation of Azure resources').version(CONVERGE_VERSION);

program.addCommand(createPlanCommand());
program.addCommand(createApplyCommand());
program.addCommand(createAuthCommand());

await program.parseAsync();
