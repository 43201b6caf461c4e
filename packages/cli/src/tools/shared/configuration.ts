import { findConfigModule } from '@planview/core/config';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

const nonEmptyString = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'String must not be empty.' });

const planviewConfigSchema = z
  .object({
    terraform: z
      .object({
        binary: nonEmptyString.optional(),
      })
      .passthrough()
      .optional(),
    report: z
      .object({
        output: nonEmptyString.optional(),
        title: nonEmptyString.optional(),
      })
      .passthrough()
      .optional(),
    hideNoOp: z.boolean().optional(),
    unicode: z.boolean().optional(),
  })
  .passthrough();

export type PlanviewConfig = z.infer<typeof planviewConfigSchema>;

export interface LoadedPlanviewConfig {
  /** Absolute path of the loaded file; absent when no configuration file was found. */
  readonly path?: string;
  readonly config: PlanviewConfig;
}

export interface LoadPlanviewConfigOptions {
  readonly cwd?: string;
  readonly configPath?: string;
}

/**
 * Loads and validates the planview configuration. Without an explicit path a
 * missing configuration file yields the empty configuration.
 *
 * @throws {ConfigurationError} When the file cannot be loaded or fails validation.
 */
export async function loadPlanviewConfig(
  options: LoadPlanviewConfigOptions = {},
): Promise<LoadedPlanviewConfig> {
  let loaded: Awaited<ReturnType<typeof findConfigModule>>;
  try {
    loaded = await findConfigModule({
      ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
      ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Unable to load configuration: ${reason}`, options.configPath, {
      cause: error,
    });
  }

  if (loaded === undefined) {
    return { config: {} };
  }

  const result = planviewConfigSchema.safeParse(loaded.config ?? {});
  if (!result.success) {
    const [issue] = result.error.issues;
    const location = issue === undefined || issue.path.length === 0 ? 'root' : issue.path.join('.');
    throw new ConfigurationError(
      `Invalid configuration in ${loaded.path} at ${location}: ${issue?.message ?? 'unexpected structure'}`,
      loaded.path,
    );
  }

  return { path: loaded.path, config: result.data };
}
