#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import process from 'node:process';

import { z } from 'zod';

import {
  createCliKernel,
  createProcessCliIo,
  exploreCommandModule,
  showCommandModule,
  webCommandModule,
} from './index.js';

const packageManifestSchema = z
  .object({
    version: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

type PackageManifest = z.infer<typeof packageManifestSchema>;

const loadPackageManifest = (): PackageManifest => {
  const manifestUrl = new URL('../package.json', import.meta.url);
  const parsed = packageManifestSchema.safeParse(JSON.parse(readFileSync(manifestUrl, 'utf8')));
  return parsed.success ? parsed.data : {};
};

const packageManifest = loadPackageManifest();

const io = createProcessCliIo({ process });

const kernel = createCliKernel({
  programName: 'planview',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

kernel.register(exploreCommandModule);
kernel.register(webCommandModule);
kernel.register(showCommandModule);

const exitCode = await kernel.run();

io.exit(exitCode);
