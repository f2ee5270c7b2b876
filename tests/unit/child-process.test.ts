import { describe, it, expect } from 'vitest';
import {
  parseCommandLine,
  runChild,
  waitForChild,
} from '../../src/bootstrap/child-process.js';
import { ErrorCodes } from '../../src/core/errors.js';
import { FakeChild } from '../fixtures/test-helpers.js';

describe('parseCommandLine', () => {
  it('should split on whitespace', () => {
    expect(parseCommandLine('  node  dist/cli.js init-db ')).toEqual([
      'node',
      'dist/cli.js',
      'init-db',
    ]);
  });

  it('should reject an empty command line', () => {
    expect(parseCommandLine('   ')).toBeUndefined();
  });
});

describe('waitForChild', () => {
  it('should resolve with the exit code', async () => {
    const child = new FakeChild();
    const result = waitForChild(child, 'init');
    child.exit(3);

    await expect(result).resolves.toEqual({ kind: 'exited', code: 3 });
  });

  it('should resolve with the signal that killed the child', async () => {
    const child = new FakeChild();
    const result = waitForChild(child, 'init');
    child.exit(null, 'SIGKILL');

    await expect(result).resolves.toEqual({ kind: 'signaled', signal: 'SIGKILL' });
  });

  it('should resolve a spawn failure once, ignoring a later exit', async () => {
    const child = new FakeChild();
    const result = waitForChild(child, 'missing-binary');
    child.fail(new Error('spawn missing-binary ENOENT'));
    child.exit(null);

    const settled = await result;
    expect(settled.kind).toBe('spawn-error');
    if (settled.kind === 'spawn-error') {
      expect(settled.error.code).toBe(ErrorCodes.SPAWN_ERROR);
      expect(settled.error.message).toBe(
        'Could not start `missing-binary`: spawn missing-binary ENOENT'
      );
    }
  });
});

describe('runChild', () => {
  it('should pass command, arguments and environment to spawn', async () => {
    const child = new FakeChild();
    const calls: Array<{ command: string; args: readonly string[]; env: NodeJS.ProcessEnv }> = [];

    const result = runChild(['node', 'cli.js', 'init-db'], {
      env: { PARFUME_DB_PATH: 'x.db' },
      spawnChild: (command, args, options) => {
        calls.push({ command, args, env: options.env });
        return child;
      },
    });
    child.exit(0);

    await expect(result).resolves.toEqual({ kind: 'exited', code: 0 });
    expect(calls).toEqual([
      { command: 'node', args: ['cli.js', 'init-db'], env: { PARFUME_DB_PATH: 'x.db' } },
    ]);
  });

  it('should resolve a synchronous spawn failure as a spawn error', async () => {
    const result = await runChild(['x'], {
      env: {},
      spawnChild: () => {
        throw new Error('boom');
      },
    });

    expect(result.kind).toBe('spawn-error');
    if (result.kind === 'spawn-error') {
      expect(result.error.message).toBe('Could not start `x`: boom');
    }
  });

  it('should resolve an empty command line as a spawn error', async () => {
    const result = await runChild([], { env: {} });
    expect(result.kind).toBe('spawn-error');
  });
});
