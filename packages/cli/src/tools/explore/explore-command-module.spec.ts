import { PassThrough } from 'node:stream';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ESCAPES,
  createNavigationState,
  type NavigationState,
  type TerminalSessionOptions,
} from '@planview/explorer';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import { createMemoryCliIo, type MemoryCliIo } from '../../testing/memory-cli-io.js';
import { createPlanWorkspace, type PlanWorkspace } from '../../testing/plan-workspace.js';
import type { ExploreCommandDependencies } from './explore-command-runner.js';
import { createExploreCommandModule } from './explore-command-module.js';

class FakeTerminalInput extends PassThrough {
  readonly isTTY = true;
  readonly rawModes: boolean[] = [];

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  press(name: string): void {
    this.emit('keypress', undefined, { name });
  }
}

describe('tui command', () => {
  let workspace: PlanWorkspace;

  const run = async (
    io: MemoryCliIo,
    dependencies: ExploreCommandDependencies,
    ...args: string[]
  ): Promise<number> => {
    const kernel = createCliKernel({ programName: 'planview', version: '0.0.0-test', io });
    kernel.register(createExploreCommandModule({ cwd: workspace.directory, ...dependencies }));
    return kernel.run(['node', 'planview', ...args]);
  };

  beforeEach(async () => {
    workspace = await createPlanWorkspace();
  });

  afterEach(async () => {
    await workspace.dispose();
  });

  it('refuses to start without a terminal', async () => {
    const io = createMemoryCliIo();
    const runSession = vi.fn<(options: TerminalSessionOptions) => Promise<NavigationState>>();

    const exitCode = await run(io, { runSession }, 'tui', 'plan.json');

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe('The interactive explorer requires a TTY.\n');
    expect(runSession).not.toHaveBeenCalled();
  });

  it('hands the classified plan to the terminal session', async () => {
    const input = new FakeTerminalInput();
    const io = createMemoryCliIo({ stdin: input, terminal: { columns: 100, rows: 30 } });
    const runSession = vi
      .fn<(options: TerminalSessionOptions) => Promise<NavigationState>>()
      .mockImplementation((options) => Promise.resolve(createNavigationState(options.buckets)));

    const exitCode = await run(
      io,
      { runSession },
      'tui',
      'plan.json',
      '--hide-no-op',
      '--no-unicode',
    );

    expect(exitCode).toBe(0);
    const options = runSession.mock.calls[0]?.[0];
    expect(options?.buckets.create.map((change) => change.address)).toEqual([
      'aws_s3_bucket.logs',
    ]);
    expect(options?.buckets.update.map((change) => change.address)).toEqual(['aws_instance.web']);
    expect(options?.buckets.other).toEqual([]);
    expect(options?.input).toBe(input);
    expect(options?.unicode).toBe(false);
    expect(options?.color).toBe(true);
    expect(options?.output.columns).toBe(100);
    expect(options?.output.rows).toBe(30);
  });

  it('runs the explorer until the user quits', async () => {
    const input = new FakeTerminalInput();
    const io = createMemoryCliIo({ stdin: input, terminal: { columns: 80, rows: 12 } });

    const pending = run(io, {}, 'tui', 'plan.json');
    await vi.waitFor(() => {
      expect(input.listenerCount('keypress')).toBeGreaterThan(0);
    });
    input.press('return');
    input.press('q');

    expect(await pending).toBe(0);
    expect(input.rawModes).toEqual([true, false]);
    expect(io.stdoutBuffer.startsWith(`${ESCAPES.altScreenOn}${ESCAPES.hideCursor}`)).toBe(true);
    expect(io.stdoutBuffer).toContain('# aws_s3_bucket.logs will be created');
    expect(io.stdoutBuffer.endsWith(`${ESCAPES.showCursor}${ESCAPES.altScreenOff}`)).toBe(true);
  });
});
