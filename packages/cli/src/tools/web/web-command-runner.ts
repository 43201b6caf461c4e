import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createLogScope } from '@planview/core/logging';
import { renderPlanReport } from '@planview/diff';

import type { CliKernelContext } from '../../kernel/types.js';
import {
  prepareCommandEnvironment,
  type PlanCommandDependencies,
} from '../shared/command-environment.js';
import { loadPlan } from '../shared/load-plan.js';

export const DEFAULT_REPORT_OUTPUT = 'planview.html';

// Static reports leave out unchanged resources unless asked to keep them.
const DEFAULT_HIDE_NO_OP = true;

export interface WebCommandOptions {
  readonly output?: string;
  readonly title?: string;
  readonly hideNoOp?: boolean;
  readonly stdout?: boolean;
}

export interface WebCommandDependencies extends PlanCommandDependencies {
  readonly now?: () => Date;
}

export interface ExecuteWebCommandInput {
  readonly plan: string;
  readonly options: WebCommandOptions;
  readonly context: CliKernelContext;
  readonly dependencies?: WebCommandDependencies;
}

/**
 * Renders a plan as a static HTML document and writes it to a file or stdout.
 */
export async function executeWebCommand(input: ExecuteWebCommandInput): Promise<void> {
  const { io } = input.context;
  const dependencies = input.dependencies ?? {};
  const environment = await prepareCommandEnvironment(input.context, dependencies);
  const { config, logger } = environment;
  const hideNoOp = input.options.hideNoOp ?? config.hideNoOp ?? DEFAULT_HIDE_NO_OP;
  const title = input.options.title ?? config.report?.title;
  const terraformBinary = config.terraform?.binary;

  const { buckets } = await loadPlan({
    path: input.plan,
    cwd: environment.cwd,
    logger,
    hideNoOp,
    ...(terraformBinary === undefined ? {} : { terraformBinary }),
    ...(dependencies.runCommand === undefined ? {} : { runCommand: dependencies.runCommand }),
  });

  const html = await renderPlanReport(
    buckets,
    {
      format: 'html',
      generatedAt: (dependencies.now ?? (() => new Date()))(),
      ...(title === undefined ? {} : { title }),
    },
    { logger },
  );

  if (input.options.stdout === true) {
    io.writeOut(html);
    return;
  }

  const output = input.options.output ?? config.report?.output ?? DEFAULT_REPORT_OUTPUT;
  const outputPath = path.resolve(environment.cwd, output);
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, html, 'utf8');

  createLogScope(logger, 'planview.web').info('report.html.written', {
    path: outputPath,
    bytes: Buffer.byteLength(html, 'utf8'),
  });
  io.writeOut(`Generated ${output}\n`);
}
