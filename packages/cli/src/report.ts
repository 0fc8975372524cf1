import { Action, SpecValue } from '@converge/contracts';
import { DiffEntry } from '@converge/diff';
import { PlanSummary, summarizePlans } from '@converge/planner';
import chalk from 'chalk';

import { attachmentSteps, RunReport } from './runner';

const SYMBOLS: Record<Action, string> = {
  Create: '+',
  Update: '~',
  Delete: '-',
  Start: '>',
  Stop: '>',
  AttachOnly: '>',
  DetachOnly: '>',
  NoAction: ' ',
};

const VERBS: Record<Action, string> = {
  Create: 'created',
  Update: 'updated',
  Delete: 'destroyed',
  Start: 'started',
  Stop: 'stopped',
  AttachOnly: 'attached to',
  DetachOnly: 'detached from',
  NoAction: 'left unchanged',
};

function colorSymbol(action: Action): string {
  const symbol = SYMBOLS[action];
  if (action === 'Create') return chalk.green(symbol);
  if (action === 'Update') return chalk.yellow(symbol);
  if (action === 'Delete') return chalk.red(symbol);
  return chalk.cyan(symbol);
}

function show(value: SpecValue | undefined): string {
  return value === undefined ? '(unset)' : JSON.stringify(value);
}

export function formatChange(entry: DiffEntry): string {
  if (entry.kind === 'clear' || entry.kind === 'remove') return `      ${entry.path}: ${show(entry.actual)} -> (removed)`;
  return `      ${entry.path}: ${show(entry.actual)} -> ${show(entry.desired)}`;
}

export function formatSummary(summary: PlanSummary): string {
  return `Plan: ${summary.create} to add, ${summary.update} to change, ${summary.delete} to destroy, ${summary.start + summary.stop} to power, ${summary.attach + summary.detach} to attach or detach.`;
}

/** Prints what a check-mode run found and returns its summary. */
export function printPlan(report: RunReport): PlanSummary {
  console.log(chalk.bold('\nConverge will perform the following actions:\n'));

  for (const outcome of report.batch.outcomes) {
    const id = outcome.identity.toString();
    if (outcome.action !== 'NoAction') console.log(`  ${colorSymbol(outcome.action)} ${id} will be ${VERBS[outcome.action]}`);
    if (outcome.ok && outcome.action === 'Update') for (const entry of outcome.diff?.entries ?? []) console.log(formatChange(entry));
    if (outcome.secondaryAction) console.log(`  ${colorSymbol(outcome.secondaryAction)} ${id} will be ${VERBS[outcome.secondaryAction]}`);
  }

  const steps = attachmentSteps(report);
  for (const step of steps) console.log(`  ${colorSymbol(step.action)} ${step.resource.toString()} will be ${VERBS[step.action]} ${step.target.toString()}`);

  const summary = summarizePlans(report.batch.outcomes, steps);
  console.log(chalk.bold(`\n${formatSummary(summary)}`));
  return summary;
}

/** Prints the result of a run and returns the number of failures. */
export function printOutcomes(report: RunReport): number {
  let failed = 0;

  for (const outcome of report.batch.outcomes) {
    const id = outcome.identity.toString();
    if (!outcome.ok) {
      failed++;
      console.log(chalk.red(`  ! ${id}: ${outcome.error.kind}: ${outcome.error.message}${outcome.changed ? ' (partially applied)' : ''}`));
    } else if (outcome.changed) {
      const actions = [outcome.action, outcome.secondaryAction].filter((action): action is Action => action !== undefined && action !== 'NoAction');
      console.log(`  ${colorSymbol(actions[0] ?? 'NoAction')} ${id} ${actions.map((action) => VERBS[action]).join(' and ')}`);
    }
  }

  for (const result of report.attachments)
    for (const outcome of result.outcomes) {
      const pair = `${outcome.resource.toString()} ${VERBS[outcome.action]} ${outcome.target.toString()}`;
      if (!outcome.ok) {
        failed++;
        console.log(chalk.red(`  ! ${pair}: ${outcome.error.kind}: ${outcome.error.message}`));
      } else if (outcome.changed) console.log(`  ${colorSymbol(outcome.action)} ${pair}`);
    }

  return failed;
}
