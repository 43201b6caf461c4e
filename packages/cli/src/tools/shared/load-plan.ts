import { createLogScope, noopLogger, type StructuredLogger } from '@planview/core/logging';
import {
  classifyResourceChanges,
  parsePlanDocument,
  summarizeBuckets,
  type PlanBuckets,
  type PlanDocument,
} from '@planview/diff';

import { readPlanInput, type CommandRunner, type PlanInput } from './plan-input.js';

export interface LoadPlanOptions {
  readonly path: string;
  readonly cwd?: string;
  readonly terraformBinary?: string;
  readonly hideNoOp?: boolean;
  readonly logger?: StructuredLogger;
  readonly runCommand?: CommandRunner;
}

export interface LoadedPlan {
  readonly input: PlanInput;
  readonly document: PlanDocument;
  readonly buckets: PlanBuckets;
}

/**
 * Reads, parses and classifies a plan file. Every step completes before any
 * output is produced.
 */
export async function loadPlan(options: LoadPlanOptions): Promise<LoadedPlan> {
  const logger = options.logger ?? noopLogger;
  const input = await readPlanInput({
    path: options.path,
    logger,
    ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
    ...(options.terraformBinary === undefined ? {} : { terraformBinary: options.terraformBinary }),
    ...(options.runCommand === undefined ? {} : { runCommand: options.runCommand }),
  });

  const scope = createLogScope(logger, 'planview.plan');
  const document = parsePlanDocument(input.text);
  scope.info('plan.parse.complete', {
    resources: document.resourceChanges.length,
    ...(document.terraformVersion === undefined
      ? {}
      : { terraformVersion: document.terraformVersion }),
  });

  const buckets = classifyResourceChanges(document.resourceChanges, {
    ...(options.hideNoOp === undefined ? {} : { hideNoOp: options.hideNoOp }),
  });
  scope.info('plan.classify.complete', { ...summarizeBuckets(buckets) });

  return { input, document, buckets };
}
