import { hashManifest, PlanFile, serializePlan, validatePlanFile } from '@converge/planner';
import { ResourceKindRegistry } from '@converge/provider-azure';
import chalk from 'chalk';
import { Command } from 'commander';
import inquirer from 'inquirer';
import * as fs from 'node:fs/promises';
import { z } from 'zod';

import { EXIT_CODES, InputError, reportFailure } from '../errors';
import { createConsoleLogger } from '../logger';
import { buildWork, loadManifest } from '../manifest';
import { addConnectionOptions, connectionOptionsSchema, parseOptions } from '../options';
import { printOutcomes, printPlan } from '../report';
import { attachmentSteps, isChanged, RunReport, runManifest } from '../runner';
import { createController, openSession } from '../session';

const applyOptionsSchema = connectionOptionsSchema.extend({
  yes: z.boolean().default(false),
  plan: z.string().optional(),
});

async function confirmApply(autoConfirm: boolean): Promise<boolean> {
  if (autoConfirm) return true;

  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: 'Do you want to perform these actions?',
      default: false,
    },
  ]);

  return confirm;
}

async function readSavedPlan(file: string, manifestContent: string): Promise<PlanFile> {
  let planData: unknown;
  try {
    planData = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (error) {
    throw new InputError(`Cannot read plan file ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!validatePlanFile(planData)) throw new InputError('Invalid plan file format.');
  if (planData.manifest_hash !== hashManifest(manifestContent)) throw new InputError('The manifest has changed since the plan was saved. Run `converge plan` again.');
  return planData;
}

function planKey(plan: PlanFile): string {
  const resources = plan.resources.map((resource) => `${resource.id.toLowerCase()}:${resource.action}:${resource.secondaryAction ?? ''}`);
  const attachments = plan.attachments.map((step) => `${step.resource.toLowerCase()}:${step.action}:${step.target.toLowerCase()}`);
  return [...resources, ...attachments].join('\n');
}

function warnIfDrifted(saved: PlanFile, current: RunReport, manifestContent: string): void {
  const live = serializePlan(current.batch.outcomes, attachmentSteps(current), manifestContent);
  if (planKey(live) === planKey(saved)) return;

  console.log(chalk.yellow('\nWarning: Resources have changed since the plan was saved.'));
  console.log(chalk.yellow('The actions below replace the saved plan.'));
}

async function executeApply(manifestPath: string, rawOptions: unknown): Promise<number> {
  const options = parseOptions(applyOptionsSchema, rawOptions);
  const logger = createConsoleLogger(options.verbose);
  const loaded = await loadManifest(manifestPath);
  const saved = options.plan ? await readSavedPlan(options.plan, loaded.content) : undefined;

  const session = await openSession(options, logger);
  let persist = false;
  try {
    const work = buildWork(loaded.manifest, session.subscriptionId, new ResourceKindRegistry());
    const controller = createController(session, options, logger);

    logger.info('Calculating plan...');
    const planned = await runManifest(controller, work, { checkMode: true });
    if (saved) warnIfDrifted(saved, planned, loaded.content);

    if (!isChanged(planned)) {
      console.log(chalk.green('No changes needed.'));
      return EXIT_CODES.success;
    }

    printPlan(planned);

    if (!(await confirmApply(options.yes))) {
      console.log(chalk.yellow('Apply cancelled.'));
      return EXIT_CODES.success;
    }

    logger.info('\nApplying...');
    persist = true;
    const report = await runManifest(controller, work);

    const failed = printOutcomes(report);
    if (failed > 0) {
      console.log(chalk.red(`\nApply finished with ${failed} failure(s).`));
      return EXIT_CODES.partialFailure;
    }

    console.log(chalk.green('\nApply complete!'));
    return EXIT_CODES.success;
  } finally {
    await session.close(persist);
  }
}

export function createApplyCommand(): Command {
  return addConnectionOptions(
    new Command('apply')
      .description('Bring resources to the state a manifest describes')
      .argument('<manifest>', 'YAML manifest')
      .option('-y, --yes', 'Approve changes automatically')
      .option('--plan <file>', 'Plan saved by `converge plan --out`; refuses to run if the manifest changed since')
  ).action(async (manifestPath: string, rawOptions: unknown) => {
    let code: number;
    try {
      code = await executeApply(manifestPath, rawOptions);
    } catch (error) {
      code = reportFailure('Apply failed:', error);
    }
    if (code !== EXIT_CODES.success) process.exit(code);
  });
}
