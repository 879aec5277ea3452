import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  attributeFailures,
  formatValidationCounts,
  getCheckPath,
  getPlanPath,
  type FailedItem,
  type PhaseContext,
  type TaskDescriptor,
  type ValidationResult,
} from '@fixloop/core';

export const promptNames = [
  'propose_fix',
  'scaffold_harness',
  'scaffold_checks',
  'apply_work',
  'verify_work',
  'analyze_failures',
] as const;
export type PromptName = (typeof promptNames)[number];

export type PromptTemplates = Readonly<Record<PromptName, string>>;

export class PromptTemplateError extends Error {
  override name = 'PromptTemplateError';
}

/** Templates shipped with the package; `src/` and `dist/` both sit beside `prompts/`. */
export function bundledPromptsDir(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../prompts');
}

/**
 * Loads every template. A file in `overrideDir` named `<prompt>.md` replaces the bundled one;
 * prompts it does not provide fall back to the bundled set.
 */
export async function loadPromptTemplates(overrideDir?: string): Promise<PromptTemplates> {
  const bundled = bundledPromptsDir();
  const entries = await Promise.all(
    promptNames.map(async (name) => {
      const file = `${name}.md`;
      if (overrideDir) {
        const overridden = await fs.readFile(path.join(overrideDir, file), 'utf-8').catch(() => null);
        if (overridden !== null) return [name, overridden] as const;
      }
      const bundledPath = path.join(bundled, file);
      const text = await fs.readFile(bundledPath, 'utf-8').catch(() => null);
      if (text === null) throw new PromptTemplateError(`Prompt not found: ${bundledPath}`);
      return [name, text] as const;
    }),
  );
  const templates: Record<PromptName, string> = {
    propose_fix: '',
    scaffold_harness: '',
    scaffold_checks: '',
    apply_work: '',
    verify_work: '',
    analyze_failures: '',
  };
  for (const [name, text] of entries) templates[name] = text;
  return Object.freeze(templates);
}

/** Substitutes `{{name}}` placeholders. An unknown placeholder is an error. */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>, templateName = 'template'): string {
  return template.replace(/\{\{\s*([a-z_]+)\s*\}\}/g, (_whole, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      throw new PromptTemplateError(`Unknown placeholder {{${name}}} in ${templateName}`);
    }
    return value;
  });
}

export type PayloadInputs = Readonly<{
  templates: PromptTemplates;
  context: PhaseContext;
  workDir: string;
}>;

function formatFailures(items: readonly FailedItem[]): string {
  if (items.length === 0) return '(none)';
  return items.map((f) => (f.message ? `- ${f.name}: ${f.message}` : `- ${f.name}`)).join('\n');
}

function formatGuidance(guidance: readonly string[]): string {
  if (guidance.length === 0) return '(none)';
  return guidance.map((text, i) => `### After iteration ${i + 1}\n\n${text.trim()}`).join('\n\n');
}

export function formatTaskList(tasks: readonly TaskDescriptor[]): string {
  if (tasks.length === 0) return '(none)';
  return tasks.map((t) => `- ${t.identity} [${t.category}] ${t.sourceLocation}`).join('\n');
}

function taskVars(task: TaskDescriptor, inputs: PayloadInputs): Record<string, string> {
  const { context } = inputs;
  return {
    identity: task.identity,
    original_identity: task.originalIdentity,
    category: task.category,
    source: task.sourceLocation,
    iteration: String(context.iteration),
    work_dir: inputs.workDir,
    run_dir: context.runDir,
    plan_path: context.plans[task.identity] ?? getPlanPath(context.runDir, task.identity),
    check_path: context.checks[task.identity] ?? getCheckPath(context.runDir, task.identity),
    harness_dir: context.harnessPath ?? '(not prepared)',
  };
}

function failuresFor(task: TaskDescriptor, validation: ValidationResult | null): string {
  if (!validation) return '(none)';
  const { byTask } = attributeFailures([task], validation.failedItems);
  return formatFailures(byTask.get(task.identity) ?? []);
}

export function proposeFixPayload(task: TaskDescriptor, inputs: PayloadInputs): string {
  return renderTemplate(inputs.templates.propose_fix, taskVars(task, inputs), 'propose_fix.md');
}

export function scaffoldHarnessPayload(tasks: readonly TaskDescriptor[], harnessDir: string, inputs: PayloadInputs): string {
  return renderTemplate(
    inputs.templates.scaffold_harness,
    {
      harness_dir: harnessDir,
      task_count: String(tasks.length),
      task_list: formatTaskList(tasks),
      iteration: String(inputs.context.iteration),
      work_dir: inputs.workDir,
      run_dir: inputs.context.runDir,
    },
    'scaffold_harness.md',
  );
}

export function scaffoldChecksPayload(task: TaskDescriptor, inputs: PayloadInputs): string {
  return renderTemplate(inputs.templates.scaffold_checks, taskVars(task, inputs), 'scaffold_checks.md');
}

export function applyWorkPayload(task: TaskDescriptor, inputs: PayloadInputs): string {
  return renderTemplate(
    inputs.templates.apply_work,
    {
      ...taskVars(task, inputs),
      guidance: formatGuidance(inputs.context.guidance),
      task_failures: failuresFor(task, inputs.context.previousValidation),
    },
    'apply_work.md',
  );
}

export function verifyWorkPayload(task: TaskDescriptor, inputs: PayloadInputs, applyLog: string): string {
  return renderTemplate(
    inputs.templates.verify_work,
    {
      ...taskVars(task, inputs),
      guidance: formatGuidance(inputs.context.guidance),
      task_failures: failuresFor(task, inputs.context.previousValidation),
      apply_log: applyLog,
    },
    'verify_work.md',
  );
}

export function analyzeFailuresPayload(
  tasks: readonly TaskDescriptor[],
  validation: ValidationResult,
  guidancePath: string,
  inputs: PayloadInputs,
): string {
  return renderTemplate(
    inputs.templates.analyze_failures,
    {
      iteration: String(inputs.context.iteration),
      validation_counts: formatValidationCounts(validation),
      failures: formatFailures(validation.failedItems),
      task_list: formatTaskList(tasks),
      guidance: formatGuidance(inputs.context.guidance),
      guidance_path: guidancePath,
      work_dir: inputs.workDir,
      run_dir: inputs.context.runDir,
    },
    'analyze_failures.md',
  );
}

/** Guidance written on the worker's behalf when the analysis job leaves no file behind. */
export function fallbackGuidance(validation: ValidationResult, tasks: readonly TaskDescriptor[]): string {
  const { byTask, unmatched } = attributeFailures(tasks, validation.failedItems);
  const lines = [`Validation still failing (${formatValidationCounts(validation)}).`, ''];
  for (const task of tasks) {
    const items = byTask.get(task.identity);
    if (!items) continue;
    lines.push(`${task.identity}:`, formatFailures(items), '');
  }
  if (unmatched.length > 0) {
    lines.push('Not attributed to a task:', formatFailures(unmatched), '');
  }
  return lines.join('\n').trimEnd();
}
