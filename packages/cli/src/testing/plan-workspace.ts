import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

export const SAMPLE_PLAN = {
  format_version: '1.2',
  terraform_version: '1.9.0',
  resource_changes: [
    {
      address: 'aws_s3_bucket.logs',
      type: 'aws_s3_bucket',
      name: 'logs',
      change: {
        actions: ['create'],
        before: null,
        after: { bucket: 'logs' },
        after_unknown: { arn: true },
      },
    },
    {
      address: 'aws_instance.web',
      type: 'aws_instance',
      name: 'web',
      change: {
        actions: ['update'],
        before: { instance_type: 't3.micro' },
        after: { instance_type: 't3.small' },
        after_unknown: {},
      },
    },
    {
      address: 'aws_iam_role.ci',
      type: 'aws_iam_role',
      name: 'ci',
      change: {
        actions: ['no-op'],
        before: { name: 'ci' },
        after: { name: 'ci' },
        after_unknown: {},
      },
    },
  ],
} as const;

export interface PlanWorkspace {
  readonly directory: string;
  resolve(file: string): string;
  write(file: string, content: string): Promise<string>;
  dispose(): Promise<void>;
}

/**
 * Creates a scratch directory holding `plan.json` with {@link SAMPLE_PLAN}.
 */
export const createPlanWorkspace = async (): Promise<PlanWorkspace> => {
  const directory = await mkdtemp(path.join(tmpdir(), 'planview-cli-'));
  const resolve = (file: string): string => path.join(directory, file);
  const write = async (file: string, content: string): Promise<string> => {
    const target = resolve(file);
    await writeFile(target, content, 'utf8');
    return target;
  };

  await write('plan.json', JSON.stringify(SAMPLE_PLAN, undefined, 2));

  return {
    directory,
    resolve,
    write,
    dispose: () => rm(directory, { recursive: true, force: true }),
  };
};
