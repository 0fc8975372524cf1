import { serializePlan } from '@converge/planner';
import { ResourceKindRegistry } from '@converge/provider-azure';
import chalk from 'chalk';
import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import { z } from 'zod';

import { EXIT_CODES, reportFailure } from '../errors';
import { createConsoleLogger } from '../logger';
import { buildWork, loadManifest } from '../manifest';
import { addConnectionOptions, connectionOptionsSchema, parseOptions } from '../options';
import { printPlan } from '../report';
import { attachmentSteps, isChanged, runManifest } from '../runner';
import { createController, openSession } from '../session';

const planOptionsSchema = connectionOptionsSchema.extend({
  out: z.string().optional(),
});

async function executePlan(manifestPath: string, rawOptions: unknown): Promise<void> {
  const options = parseOptions(planOptionsSchema, rawOptions);
  const logger = createConsoleLogger(options.verbose);
  const loaded = await loadManifest(manifestPath);

  const session = await openSession(options, logger);
  try {
    const work = buildWork(loaded.manifest, session.subscriptionId, new ResourceKindRegistry());
    logger.info(`Refreshing state from ${session.description}...`);

    const report = await runManifest(createController(session, options, logger), work, { checkMode: true });

    if (!isChanged(report)) console.log(chalk.green('No changes. Your infrastructure matches the manifest.'));
    else printPlan(report);

    if (options.out) {
      const planFile = serializePlan(report.batch.outcomes, attachmentSteps(report), loaded.content);
      await fs.writeFile(options.out, JSON.stringify(planFile, null, 2), 'utf8');
      console.log(chalk.green(`Plan saved to ${options.out}`));
    }
  } finally {
    await session.close(false);
  }
}

export function createPlanCommand(): Command {
  return addConnectionOptions(
    new Command('plan')
      .description('Show the changes required by a manifest')
      .argument('<manifest>', 'YAML manifest')
      .option('-o, --out <file>', 'Save the plan as JSON')
  ).action(async (manifestPath: string, rawOptions: unknown) => {
    let code: number = EXIT_CODES.success;
    try {
      await executePlan(manifestPath, rawOptions);
    } catch (error) {
      code = reportFailure('Planning failed:', error);
    }
    if (code !== EXIT_CODES.success) process.exit(code);
  });
}
