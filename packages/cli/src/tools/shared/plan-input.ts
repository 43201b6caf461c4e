import { execFile } from 'node:child_process';
import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';

import { createLogScope, noopLogger, type StructuredLogger } from '@planview/core/logging';

import { PlanInputError } from './errors.js';

const execFileAsync = promisify(execFile);

const DEFAULT_TERRAFORM_BINARY = 'terraform';
const MAX_COMMAND_OUTPUT_BYTES = 512 * 1024 * 1024;

/**
 * Runs an external command and resolves with its standard output.
 */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], {
    encoding: 'utf8',
    maxBuffer: MAX_COMMAND_OUTPUT_BYTES,
  });
  return stdout;
};

export type PlanInputSource = 'json' | 'terraform';

export interface PlanInput {
  readonly path: string;
  readonly source: PlanInputSource;
  readonly text: string;
}

export interface ReadPlanInputOptions {
  readonly path: string;
  readonly cwd?: string;
  readonly terraformBinary?: string;
  readonly logger?: StructuredLogger;
  readonly runCommand?: CommandRunner;
}

/**
 * Produces plan JSON for a plan file. Files whose content starts with `{` are
 * used as they are; anything else is handed to `terraform show -json`.
 *
 * @param options - Plan path and the command used to convert binary plans.
 * @returns The plan JSON text and where it came from.
 * @throws {PlanInputError} When the file is missing or cannot be converted.
 */
export async function readPlanInput(options: ReadPlanInputOptions): Promise<PlanInput> {
  const resolvedPath = path.resolve(options.cwd ?? process.cwd(), options.path);
  const scope = createLogScope(options.logger ?? noopLogger, 'planview.input');

  await assertPlanFileExists(resolvedPath, options.path);

  let content: string;
  try {
    content = await readFile(resolvedPath, 'utf8');
  } catch (error) {
    throw new PlanInputError(
      `Unable to read plan file ${options.path}: ${describeError(error)}`,
      options.path,
      { cause: error },
    );
  }

  if (content.trimStart().startsWith('{')) {
    scope.info('plan.input.read', { path: resolvedPath, source: 'json', bytes: content.length });
    return { path: resolvedPath, source: 'json', text: content };
  }

  const binary = options.terraformBinary ?? DEFAULT_TERRAFORM_BINARY;
  const args = ['show', '-json', resolvedPath] as const;
  const run = options.runCommand ?? runCommand;

  let text: string;
  try {
    text = await run(binary, args);
  } catch (error) {
    throw new PlanInputError(
      `Failed to run "${binary} show -json ${options.path}" (${describeError(error)}), and the file is not plan JSON.`,
      options.path,
      { cause: error },
    );
  }

  scope.info('plan.input.terraform', { path: resolvedPath, binary, bytes: text.length });
  return { path: resolvedPath, source: 'terraform', text };
}

async function assertPlanFileExists(resolvedPath: string, displayPath: string): Promise<void> {
  try {
    const stats = await stat(resolvedPath);
    if (!stats.isFile()) {
      throw new PlanInputError(`Not a file: ${displayPath}`, displayPath);
    }
  } catch (error) {
    if (error instanceof PlanInputError) {
      throw error;
    }
    throw new PlanInputError(`File does not exist: ${displayPath}`, displayPath, { cause: error });
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
