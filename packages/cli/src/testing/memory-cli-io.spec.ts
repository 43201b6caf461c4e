import { describe, expect, it } from 'vitest';

import { createMemoryCliIo } from './memory-cli-io.js';

describe('createMemoryCliIo', () => {
  it('captures output buffers and recorded exit codes', () => {
    const io = createMemoryCliIo();

    io.writeOut('hello');
    io.writeErr('error');

    expect(io.stdoutBuffer).toBe('hello');
    expect(io.stderrBuffer).toBe('error');
    expect(io.exitCodes).toEqual([]);

    expect(() => io.exit(2)).toThrow(/process exit called with code 2/);
    expect(io.exitCodes).toEqual([2]);
  });

  it('reports non-interactive streams by default', () => {
    const io = createMemoryCliIo();

    expect(io.stdin.isTTY).toBeUndefined();
    expect(io.stdout.isTTY).toBe(false);
    expect(io.stdout.columns).toBeUndefined();
  });

  it('describes a terminal when a size is given', () => {
    const io = createMemoryCliIo({ terminal: { columns: 100, rows: 30 } });

    expect(io.stdout).toMatchObject({ isTTY: true, columns: 100, rows: 30 });
    expect(io.stderr.isTTY).toBe(true);
  });
});
