import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import { createMemoryCliIo, type MemoryCliIo } from '../../testing/memory-cli-io.js';
import { createPlanWorkspace, type PlanWorkspace } from '../../testing/plan-workspace.js';
import { createShowCommandModule } from './show-command-module.js';

const CREATE_SECTION = [
  'CREATE (+ 1)',
  '--------------------',
  '# aws_s3_bucket.logs will be created',
  '  + resource "aws_s3_bucket" "logs" {',
  '      + arn = (known after apply)',
  '      + bucket = "logs"',
  '    }',
];

const UPDATE_SECTION = [
  'UPDATE (~ 1)',
  '--------------------',
  '# aws_instance.web will be updated in-place',
  '  ~ resource "aws_instance" "web" {',
  '      ~ instance_type = "t3.micro" -> "t3.small"',
  '    }',
];

const IMPORT_SECTION = [
  'IMPORT (1)',
  '--------------------',
  '# aws_iam_role.ci will be left unchanged',
  '   resource "aws_iam_role" "ci" {',
  '    }',
];

const PLAIN_FLAGS = ['--no-color', '--no-unicode', '--width', '20'];

describe('show command', () => {
  let workspace: PlanWorkspace;
  let io: MemoryCliIo;

  const run = async (...args: string[]): Promise<number> => {
    const kernel = createCliKernel({ programName: 'planview', version: '0.0.0-test', io });
    kernel.register(createShowCommandModule({ cwd: workspace.directory }));
    return kernel.run(['node', 'planview', ...args]);
  };

  beforeEach(async () => {
    workspace = await createPlanWorkspace();
    io = createMemoryCliIo();
  });

  afterEach(async () => {
    await workspace.dispose();
  });

  it('prints every category that has resources', async () => {
    const exitCode = await run('show', 'plan.json', ...PLAIN_FLAGS);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe(
      [
        'Plan: 1 to create, 0 to destroy, 0 to replace, 1 to update, 1 other.',
        '',
        ...CREATE_SECTION,
        '',
        ...UPDATE_SECTION,
        '',
        ...IMPORT_SECTION,
        '',
      ].join('\n'),
    );
    expect(io.stderrBuffer).toBe('');
  });

  it('leaves out unchanged resources with --hide-no-op', async () => {
    await run('show', 'plan.json', ...PLAIN_FLAGS, '--hide-no-op');

    expect(io.stdoutBuffer).toBe(
      [
        'Plan: 1 to create, 0 to destroy, 0 to replace, 1 to update, 0 other.',
        '',
        ...CREATE_SECTION,
        '',
        ...UPDATE_SECTION,
        '',
      ].join('\n'),
    );
  });

  it('reads hideNoOp from the configuration file', async () => {
    await workspace.write('planview.config.json', JSON.stringify({ hideNoOp: true }));

    await run('show', 'plan.json', ...PLAIN_FLAGS);

    expect(io.stdoutBuffer).not.toContain('IMPORT (1)');
    expect(io.stdoutBuffer.split('\n')[0]).toBe(
      'Plan: 1 to create, 0 to destroy, 0 to replace, 1 to update, 0 other.',
    );
  });

  it('colours the report when asked to', async () => {
    await run('show', 'plan.json', '--color', '--no-unicode', '--width', '20');

    expect(io.stdoutBuffer).toContain('\u001B[32mCREATE (+ 1)\u001B[0m');
    expect(io.stdoutBuffer).toContain(
      '\u001B[35m      ~ instance_type = "t3.micro" -> "t3.small"\u001B[0m',
    );
  });

  it('exits with 2 for plans with changes under --detailed-exitcode', async () => {
    expect(await run('show', 'plan.json', ...PLAIN_FLAGS, '--detailed-exitcode')).toBe(2);
  });

  it('exits with 0 for empty plans under --detailed-exitcode', async () => {
    await workspace.write('empty.json', '{"resource_changes": []}');

    const exitCode = await run('show', 'empty.json', '--detailed-exitcode');

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('No changes. Your infrastructure matches the configuration.\n');
  });

  it('rejects invalid widths', async () => {
    const exitCode = await run('show', 'plan.json', '--width', 'wide');

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toContain('Width must be a positive integer.');
  });

  it('prints a single diagnostic line for missing plans', async () => {
    const exitCode = await run('show', 'missing.tfplan');

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe('File does not exist: missing.tfplan\n');
  });

  it('prints a single diagnostic line for malformed plans', async () => {
    await workspace.write('broken.json', '{"resource_changes": [{"address": true}]}');

    const exitCode = await run('show', 'broken.json');

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe(
      'Invalid plan document at resource_changes[0].address: Expected string, received boolean\n',
    );
  });

  it('emits structured logs with --json-logs', async () => {
    await run('--json-logs', 'show', 'plan.json', ...PLAIN_FLAGS);

    const events = io.stderrBuffer
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line));

    expect(events).toEqual([
      expect.objectContaining({ event: 'plan.input.read' }),
      expect.objectContaining({
        event: 'plan.parse.complete',
        data: { resources: 3, terraformVersion: '1.9.0' },
      }),
      expect.objectContaining({
        event: 'plan.classify.complete',
        data: { create: 1, destroy: 0, replace: 0, update: 1, other: 1, total: 3 },
      }),
      expect.objectContaining({ event: 'report.render.complete' }),
    ]);
  });
});
