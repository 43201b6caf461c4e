import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

export const DEFAULT_PLANVIEW_CONFIG_FILES = Object.freeze([
  'planview.config.mjs',
  'planview.config.js',
  'planview.config.cjs',
  'planview.config.json',
] as const);

export interface FindConfigModuleOptions {
  readonly cwd?: string;
  readonly configPath?: string;
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule {
  readonly path: string;
  readonly directory: string;
  readonly config: unknown;
}

const MODULE_NAME = 'planview';

const moduleLoader: Loader = async (filepath: string, _content: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!isRecord(importedModule)) {
    return importedModule;
  }

  if ('default' in importedModule) {
    return importedModule['default'];
  }
  if ('config' in importedModule) {
    return importedModule['config'];
  }

  return importedModule;
};

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) =>
      result ? { ...result, config: await resolveExportedValue(result.config) } : result,
  });
}

/**
 * Locates and loads a planview configuration module. An explicit path must exist;
 * without one the working directory is searched and a missing file is not an error.
 *
 * @param options - Working directory and optional explicit path.
 * @returns The loaded module, or `undefined` when no configuration file was found.
 * @throws {Error} When an explicitly requested configuration file does not exist.
 */
export async function findConfigModule(
  options: FindConfigModuleOptions = {},
): Promise<LoadedConfigModule | undefined> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (options.configPath) {
    return loadConfigModule({ path: options.configPath, cwd });
  }

  const result = await createExplorer(DEFAULT_PLANVIEW_CONFIG_FILES, cwd).search(cwd);
  if (!result || result.isEmpty) {
    return undefined;
  }

  return toLoadedModule(result.filepath, result.config);
}

/**
 * Loads a configuration module, resolving any function or promise exports.
 *
 * @param options - Module loading options including the relative or absolute path.
 * @returns Loaded configuration metadata and the resolved configuration value.
 */
export async function loadConfigModule(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_PLANVIEW_CONFIG_FILES, path.dirname(resolvedPath));

  try {
    const result = await explorer.load(resolvedPath);
    if (!result || result.isEmpty) {
      throw new Error(`Configuration file not found at ${resolvedPath}`);
    }

    return toLoadedModule(result.filepath, result.config);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new Error(`Configuration file not found at ${resolvedPath}`);
    }
    throw error;
  }
}

function toLoadedModule(filepath: string, config: unknown): LoadedConfigModule {
  return {
    path: filepath,
    directory: path.dirname(filepath),
    config,
  } satisfies LoadedConfigModule;
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value = candidate;

  for (;;) {
    if (typeof value === 'function') {
      const produced: unknown = value();
      value = produced;
      continue;
    }

    if (value instanceof Promise) {
      const settled: unknown = await value;
      value = settled;
      continue;
    }

    return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
