/**
 * Console rendering of reconciliation plans and results
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { diffLines } from 'diff';
import { formatCounts } from './sync-engine';
import { OwnedField, ProjectPlan, SyncAction, SyncState } from './types';

const CONTEXT_LINES = 2;
const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';

/**
 * Line diff of two descriptions: `+ ` added, `- ` removed, four spaces for context
 */
export function descriptionDiff(before: string, after: string): string[] {
  const parts = diffLines(before.endsWith('\n') ? before : `${before}\n`, after.endsWith('\n') ? after : `${after}\n`);
  const output: string[] = [];

  const linesOf = (value: string) => value.replace(/\n$/, '').split('\n');

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (!part.added && !part.removed) continue;

    const previous = parts[i - 1];
    if (previous && !previous.added && !previous.removed) {
      linesOf(previous.value).slice(-CONTEXT_LINES).forEach((line) => output.push(`    ${line}`));
    }

    const marker = part.added ? '+' : '-';
    linesOf(part.value).forEach((line) => output.push(`  ${marker} ${line}`));

    const next = parts[i + 1];
    if (next && !next.added && !next.removed) {
      linesOf(next.value).slice(0, CONTEXT_LINES).forEach((line) => output.push(`    ${line}`));
    }
  }

  return output;
}

function describeChange(action: Extract<SyncAction, { type: 'update' }>, field: OwnedField): string {
  const before = action.actual[field];
  const after = action.desired[field];
  const show = (value: string | string[] | undefined) =>
    Array.isArray(value) ? value.join(', ') || '(none)' : value || '(none)';
  return `${field}: ${show(before)} → ${show(after)}`;
}

export class PlanViewer {
  private print: (line: string) => void;

  constructor(print: (line: string) => void = (line) => console.log(line)) {
    this.print = print;
  }

  showPlans(plans: ProjectPlan[]): void {
    for (const plan of plans) {
      this.showPlan(plan);
    }
  }

  showPlan(plan: ProjectPlan): void {
    this.print(chalk.bold(`\n${RULE}`));
    this.print(chalk.bold.cyan(`${plan.project.name} (${plan.project.identifier}) → ${plan.calendar.name}`));
    this.print(chalk.bold(`${RULE}\n`));

    if (!plan.calendar.url) {
      this.print(chalk.gray('Calendar does not exist yet and would be created'));
    }

    for (const action of plan.actions) {
      this.showAction(action);
    }

    for (const error of plan.errors) {
      this.print(chalk.red(`✗ ${error.issueId ?? error.uid ?? plan.project.identifier}: ${error.error}`));
    }

    if (plan.actions.length === 0 && plan.errors.length === 0) {
      this.print(chalk.gray(`Up to date (${plan.unchanged} event(s))`));
    } else {
      this.print(chalk.gray(`\n${plan.unchanged} unchanged`));
    }
  }

  showAction(action: SyncAction): void {
    switch (action.type) {
      case 'create':
        this.print(chalk.green(`+ create ${action.desired.summary} (${action.desired.start})`));
        break;
      case 'update':
        this.print(chalk.blue(`~ update ${action.desired.summary}`));
        for (const field of action.changed) {
          if (field === 'description') {
            this.print(chalk.gray('  description:'));
            for (const line of descriptionDiff(action.actual.description, action.desired.description)) {
              this.print(this.colorDiffLine(line));
            }
          } else {
            this.print(chalk.gray(`  ${describeChange(action, field)}`));
          }
        }
        break;
      case 'delete':
        this.print(chalk.red(`- delete ${action.actual.summary || action.uid} (${action.reason})`));
        break;
    }
  }

  showResult(title: string, state: SyncState): void {
    this.print(chalk.bold(`\n${RULE}`));
    this.print(chalk.bold.cyan(title));
    this.print(chalk.bold(`${RULE}\n`));

    if (state.created > 0) this.print(chalk.green(`✓ Created: ${state.created} event(s)`));
    if (state.updated > 0) this.print(chalk.blue(`✓ Updated: ${state.updated} event(s)`));
    if (state.deleted > 0) this.print(chalk.red(`✓ Deleted: ${state.deleted} event(s)`));
    if (state.skipped > 0) this.print(chalk.gray(`⊘ Skipped: ${state.skipped} item(s)`));
    if (state.created + state.updated + state.deleted === 0) {
      this.print(chalk.gray('No changes'));
    }

    if (state.errors.length > 0) {
      this.print(chalk.red(`✗ Errors: ${state.errors.length}`));
      for (const error of state.errors) {
        const subject = error.issueId ?? error.uid ?? error.projectId ?? 'run';
        this.print(chalk.red(`  ${subject}: [${error.kind}] ${error.error}`));
      }
    }

    if (state.aborted) {
      this.print(chalk.yellow('⚠ Run was cancelled before all actions were applied'));
    }

    this.print(chalk.gray(`\n${formatCounts(state)}`));
  }

  async confirm(message: string): Promise<boolean> {
    const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
      {
        type: 'confirm',
        name: 'proceed',
        message,
        default: false,
      },
    ]);
    return proceed;
  }

  private colorDiffLine(line: string): string {
    if (line.startsWith('  + ')) return chalk.green(line);
    if (line.startsWith('  - ')) return chalk.red(line);
    return chalk.gray(line);
  }
}
