import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { resolveRunConfig } from '../../config.js';
import { detectStateShape, listScopes, openCheckpointStore, type CompletedSet } from '../../plan/state.js';
import { stepTarget, type Plan } from '../../plan/types.js';
import { pendingSteps } from '../../runner/find-next.js';
import { loadOptionalPlan } from '../context.js';

export interface StepStatusRow {
  name: string;
  target: string | null;
  done: boolean;
}

/** Plan steps in order, then any completed names the plan no longer lists */
export function buildStatusRows(plan: Plan | null, state: CompletedSet): StepStatusRow[] {
  const rows: StepStatusRow[] = (plan?.steps ?? []).map((s) => ({
    name: s.name,
    target: stepTarget(s),
    done: state.completed.includes(s.name),
  }));
  for (const name of state.completed) {
    if (!rows.some((r) => r.name === name)) {
      rows.push({ name, target: null, done: true });
    }
  }
  return rows;
}

function printRows(title: string, rows: StepStatusRow[], next: string | null): void {
  console.log(title);
  if (rows.length === 0) {
    console.log(chalk.dim('  No steps recorded.'));
    return;
  }
  const width = Math.max(4, ...rows.map((r) => r.name.length));
  for (const r of rows) {
    const icon = r.done ? chalk.green('✅') : chalk.dim('○');
    const label = r.done ? 'done' : r.name === next ? 'next' : 'pending';
    const note = r.target === null ? chalk.dim('  (not in plan)') : '';
    console.log(`  ${icon} ${r.name.padEnd(width)}  ${label}${note}`);
  }
}

export const statusCommand = new Command('status')
  .description('Show which steps have completed')
  .argument('[plan-file]', 'Path to plan YAML file (default: provision.yaml)')
  .option('--state <file>', 'Checkpoint file (default: orchestration_state.json)')
  .option('--scope <key>', 'Scope key to show')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (planArg: string | undefined, options: {
      state?: string;
      scope?: string;
      json?: boolean;
    }) => {
      const { plan, planFile } = loadOptionalPlan(planArg);
      const config = resolveRunConfig(plan, planFile, options);

      // Scoped file, no scope chosen: summarize every scope
      if (!config.scope && detectStateShape(config.stateFile) === 'scoped') {
        const scopes = listScopes(config.stateFile);
        const total = plan?.steps.length;
        if (options.json) {
          console.log(JSON.stringify(scopes.map((s) => ({
            scope: s.scope,
            completed: s.completed,
            steps_total: total ?? null,
          }))));
          return;
        }
        console.log(`Scopes in ${config.stateFile}:`);
        const width = Math.max(5, ...scopes.map((s) => s.scope.length));
        for (const s of scopes) {
          const progress = total !== undefined ? `${s.completed.length}/${total} steps` : `${s.completed.length} steps`;
          console.log(`  ${s.scope.padEnd(width)}  ${progress}`);
        }
        return;
      }

      const store = openCheckpointStore(config.stateFile, config.scope);
      const state = store.load();
      const rows = buildStatusRows(plan, state);
      const next = plan ? pendingSteps(plan.steps, state)[0] ?? null : null;

      if (options.json) {
        console.log(JSON.stringify({
          plan: plan?.name ?? null,
          scope: store.scope,
          state_file: config.stateFile,
          steps: rows,
          next,
        }));
        return;
      }

      const title = plan
        ? `Plan: ${chalk.bold(plan.name)} ${chalk.dim(`(scope: ${store.scope})`)}`
        : `Checkpoint: ${config.stateFile} ${chalk.dim(`(scope: ${store.scope})`)}`;
      printRows(title, rows, next);
    }),
  );
