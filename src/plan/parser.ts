import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import { ZodError } from 'zod';
import { ProvisionError, ErrorCode } from '../lib/errors.js';
import { planSchema, stepTarget, type Plan } from './types.js';
import type { ResolvedStep } from '../runner/types.js';
import type { StepRegistry } from '../steps/define.js';

// ── Variable expansion ──

const VARIABLE_PATTERN = /\$\{\{\s*(env|secrets)\.\s*([a-zA-Z_]\w*)\s*\}\}/g;

export function expandVariables(
  text: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return text.replace(VARIABLE_PATTERN, (match, source: string, name: string) => {
    if (source === 'env') return env[name] ?? match;
    // secrets not supported: leave marker intact
    return match;
  });
}

/** Expand variables in every string of a parsed YAML document */
export function expandDeep(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') return expandVariables(value, env);
  if (Array.isArray(value)) return value.map((v) => expandDeep(v, env));
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandDeep(v, env)]),
    );
  }
  return value;
}

// ── Pre-validation (catch structural errors before Zod) ──

function preValidate(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return '✗ provision.yaml must contain a YAML object\n  Example:\n    name: my-env\n    steps:\n      - name: enable_apis\n        args:\n          project_id: my-project';
  }

  if ('steps' in raw && !Array.isArray(raw.steps)) {
    return '✗ plan.steps must be a list\n  Each step needs: name, args';
  }

  if ('name' in raw && typeof raw.name === 'number') {
    return '✗ plan.name must be a string, not a number\n  Example: name: "uat-environment"';
  }

  return null;
}

// ── Error formatting ──

export function formatPlanError(error: ZodError): string {
  const lines: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');

    if (path === 'steps' && issue.code === 'too_small') {
      lines.push('✗ plan.steps must have at least one step');
      lines.push('  Example:\n    steps:\n      - name: enable_apis\n        args: { project_id: my-project }');
      continue;
    }

    if (path === 'name' && issue.code === 'invalid_string') {
      lines.push('✗ plan.name must be kebab-case');
      lines.push('  Example: uat-environment, prod-navigator');
      continue;
    }

    if (issue.code === 'custom') {
      lines.push(`✗ ${issue.message}`);
      continue;
    }

    lines.push(`✗ ${path}: ${issue.message}`);
  }

  return lines.join('\n');
}

// ── Business rule validation (superRefine) ──

const planWithRules = planSchema.superRefine((plan, ctx) => {
  const seen = new Set<string>();
  for (const step of plan.steps) {
    if (seen.has(step.name)) {
      ctx.addIssue({ code: 'custom', message: `duplicate step name: "${step.name}"` });
    }
    seen.add(step.name);
  }
});

// ── Public API ──

/** Parse a YAML string into a validated Plan. Throws ProvisionError on failure. */
export function parsePlanYaml(content: string, env: NodeJS.ProcessEnv = process.env): Plan {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ProvisionError(
      ErrorCode.PLAN_PARSE_ERROR,
      `Invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      'Check your provision.yaml for syntax errors (indentation, colons, etc.)',
    );
  }

  const preError = preValidate(raw);
  if (preError) {
    throw new ProvisionError(ErrorCode.PLAN_VALIDATION_ERROR, preError);
  }

  const result = planWithRules.safeParse(expandDeep(raw, env));
  if (!result.success) {
    throw new ProvisionError(
      ErrorCode.PLAN_VALIDATION_ERROR,
      formatPlanError(result.error),
      'Fix the issues above and try again',
    );
  }

  return result.data;
}

/** Load and parse a provision.yaml file. Throws ProvisionError on failure. */
export function loadPlanFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Plan {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new ProvisionError(
      ErrorCode.PLAN_NOT_FOUND,
      `plan not found: ${filePath}`,
      'Run: provision init (to write a provision.yaml), or pass the plan path',
    );
  }

  return parsePlanYaml(content, env);
}

/**
 * Bind every step to its registered target and validate its arguments.
 * All problems are reported together; nothing runs unless every step resolves.
 */
export function resolvePlan(plan: Plan, registry: StepRegistry): ResolvedStep[] {
  const problems: string[] = [];
  const resolved: ResolvedStep[] = [];

  for (const step of plan.steps) {
    const target = stepTarget(step);
    const kind = registry.get(target);
    if (!kind) {
      problems.push(
        `✗ step "${step.name}": unknown target "${target}" (available: ${registry.targets().join(', ')})`,
      );
      continue;
    }

    const result = kind.resolve(step.args);
    if (!result.ok) {
      for (const issue of result.issues) {
        problems.push(`✗ step "${step.name}": ${issue}`);
      }
      continue;
    }

    resolved.push({ name: step.name, target, invoke: result.invoke });
  }

  if (problems.length > 0) {
    throw new ProvisionError(
      ErrorCode.PLAN_VALIDATION_ERROR,
      problems.join('\n'),
      'Fix the step arguments above and try again',
    );
  }

  return resolved;
}
