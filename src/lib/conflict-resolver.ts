/**
 * Interactive conflict resolver with diff display
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { diffLines } from 'diff';
import { CommonFields, ConflictResolution, KindDetail, NormalizedContent, SyncConflict } from './types';

const SCALAR_FIELDS: ReadonlyArray<keyof CommonFields> = [
  'status',
  'priority',
  'assignee',
  'environment',
  'timeEstimate',
  'dueDate',
];

const LIST_FIELDS = ['labels', 'components', 'versions'] as const;

const CONTEXT_LINES = 2;

type Action = ConflictResolution | 'skip-all';

const isAction = (value: unknown): value is Action =>
  value === 'local' || value === 'remote' || value === 'skip' || value === 'skip-all';

/** Plain-text rendering of the kind detail, one line per row. */
export function renderDetail(detail: KindDetail): string {
  switch (detail.kind) {
    case 'REQUIREMENT':
      return detail.epicName ? `Epic: ${detail.epicName}\n` : '';
    case 'TEST_CASE': {
      const lines = detail.preconditions ? [`Preconditions: ${detail.preconditions}`] : [];
      for (const step of detail.steps) {
        lines.push(`${step.group}.${step.order} ${step.action} | ${step.input} | ${step.expected}`);
      }
      return lines.map((line) => `${line}\n`).join('');
    }
    case 'TEST_PLAN':
      return detail.memberships.map((m) => `${m.order}. ${m.testCaseKey}\n`).join('');
    case 'TEST_EXECUTION': {
      const lines = [`Plan: ${detail.testPlanKey || '(none)'}`, `Result: ${detail.result || '(none)'}`];
      for (const item of detail.details) {
        lines.push(`${item.order}. ${item.testCaseKey} ${item.result}`);
      }
      return lines.map((line) => `${line}\n`).join('');
    }
    case 'DEFECT':
      return detail.issueTypeId ? `Issue type: ${detail.issueTypeId}\n` : '';
  }
}

export class ConflictResolver {
  /**
   * Resolve conflicts interactively
   */
  async resolveConflicts(conflicts: SyncConflict[]): Promise<Map<number, ConflictResolution>> {
    const resolutions = new Map<number, ConflictResolution>();

    console.log(chalk.yellow(`\n⚠️  Found ${conflicts.length} conflict(s)\n`));

    let skipAll = false;

    for (let i = 0; i < conflicts.length; i++) {
      const conflict = conflicts[i];

      if (skipAll) {
        resolutions.set(conflict.issueId, 'skip');
        continue;
      }

      const resolution = await this.resolveConflict(conflict, i + 1, conflicts.length);

      if (resolution === 'skip-all') {
        skipAll = true;
        resolutions.set(conflict.issueId, 'skip');
      } else {
        resolutions.set(conflict.issueId, resolution);
      }
    }

    return resolutions;
  }

  private async resolveConflict(conflict: SyncConflict, index: number, total: number): Promise<Action> {
    console.log(chalk.bold(`\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`));
    console.log(chalk.bold.cyan(`Conflict ${index}/${total}: ${conflict.key} (${conflict.kind})`));
    console.log(chalk.bold(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n`));

    const { local, remote } = conflict;
    console.log(chalk.gray(`Remote updated: ${remote.fields.updatedAt || 'unknown'}`));
    console.log();

    this.showSummaryDiff(local, remote);
    this.showFieldDiff(local, remote);
    this.showTextDiff('Description', local.fields.description, remote.fields.description);
    this.showTextDiff('Details', renderDetail(local.detail), renderDetail(remote.detail));
    this.showListDiffs(local, remote);

    const choices = [
      {
        name: chalk.red('Use local version (keep mirror, update remote)'),
        value: 'local',
      },
      {
        name: chalk.green('Use remote version (overwrite mirror)'),
        value: 'remote',
      },
      {
        name: chalk.yellow('Skip this conflict for now'),
        value: 'skip',
      },
    ];

    if (total > 1 && index < total) {
      choices.push({
        name: chalk.gray('Skip all remaining conflicts'),
        value: 'skip-all',
      });
    }

    const answer = await inquirer.prompt<{ action: string }>([
      {
        type: 'list',
        name: 'action',
        message: 'How do you want to resolve this conflict?',
        choices,
      },
    ]);

    return isAction(answer.action) ? answer.action : 'skip';
  }

  private showSummaryDiff(local: NormalizedContent, remote: NormalizedContent): void {
    if (local.fields.summary !== remote.fields.summary) {
      console.log(chalk.bold('Summary:'));
      console.log(chalk.red(`  Local:  ${local.fields.summary}`));
      console.log(chalk.green(`  Remote: ${remote.fields.summary}`));
      console.log();
    }
  }

  private showFieldDiff(local: NormalizedContent, remote: NormalizedContent): void {
    const differences: string[] = [];

    for (const field of SCALAR_FIELDS) {
      const localValue = local.fields[field];
      const remoteValue = remote.fields[field];
      if (localValue !== remoteValue) {
        differences.push(
          chalk.bold(`${field}:`) +
            chalk.red(`\n  Local:  ${localValue || '(none)'}`) +
            chalk.green(`\n  Remote: ${remoteValue || '(none)'}`)
        );
      }
    }

    if (differences.length > 0) {
      console.log(differences.join('\n\n'));
      console.log();
    }
  }

  /**
   * Line diff with a little context around each change
   */
  private showTextDiff(title: string, localText: string, remoteText: string): void {
    if (localText === remoteText) {
      return;
    }
    console.log(chalk.bold(`${title}:`));

    const diff = diffLines(localText, remoteText);
    let hasChanges = false;

    for (let i = 0; i < diff.length; i++) {
      const part = diff[i];
      if (!part.added && !part.removed) {
        continue;
      }

      const before = i > 0 ? diff[i - 1] : undefined;
      if (before && !before.added && !before.removed) {
        before.value
          .split('\n')
          .slice(-CONTEXT_LINES - 1, -1)
          .forEach((line) => console.log(chalk.gray('    ' + line)));
      }

      const colour = part.added ? chalk.green : chalk.red;
      const marker = part.added ? '  + ' : '  - ';
      part.value
        .split('\n')
        .filter((line) => line)
        .forEach((line) => console.log(colour(marker + line)));
      hasChanges = true;

      const after = i < diff.length - 1 ? diff[i + 1] : undefined;
      if (after && !after.added && !after.removed) {
        after.value
          .split('\n')
          .slice(0, CONTEXT_LINES)
          .forEach((line) => line && console.log(chalk.gray('    ' + line)));
      }
    }

    if (!hasChanges) {
      console.log(chalk.gray('  (No changes detected)'));
    }
    console.log();
  }

  private showListDiffs(local: NormalizedContent, remote: NormalizedContent): void {
    for (const field of LIST_FIELDS) {
      this.showSetDiff(field, local.fields[field], remote.fields[field]);
    }
    const relationLabel = (r: { relationType: string; targetKey: string }): string => `${r.relationType} ${r.targetKey}`;
    this.showSetDiff('relations', local.relations.map(relationLabel), remote.relations.map(relationLabel));
  }

  private showSetDiff(title: string, localValues: string[], remoteValues: string[]): void {
    const localSet = new Set(localValues);
    const remoteSet = new Set(remoteValues);

    const added = [...remoteSet].filter((v) => !localSet.has(v));
    const removed = [...localSet].filter((v) => !remoteSet.has(v));

    if (added.length > 0 || removed.length > 0) {
      console.log(chalk.bold(`${title}:`));

      if (added.length > 0) {
        console.log(chalk.green(`  + ${added.join(', ')}`));
      }

      if (removed.length > 0) {
        console.log(chalk.red(`  - ${removed.join(', ')}`));
      }

      console.log();
    }
  }

  /**
   * Show summary of resolutions
   */
  showSummary(resolutions: Map<number, ConflictResolution>, keys: Map<number, string> = new Map()): void {
    console.log(chalk.bold(`\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`));
    console.log(chalk.bold.cyan(`Resolution Summary`));
    console.log(chalk.bold(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n`));

    const byType: Record<ConflictResolution, string[]> = {
      local: [],
      remote: [],
      skip: [],
    };

    for (const [issueId, resolution] of resolutions) {
      byType[resolution].push(keys.get(issueId) ?? `#${issueId}`);
    }

    if (byType.local.length > 0) {
      console.log(chalk.red(`✓ Using local version: ${byType.local.join(', ')}`));
    }

    if (byType.remote.length > 0) {
      console.log(chalk.green(`✓ Using remote version: ${byType.remote.join(', ')}`));
    }

    if (byType.skip.length > 0) {
      console.log(chalk.yellow(`⊘ Skipped: ${byType.skip.join(', ')}`));
    }

    console.log();
  }
}
