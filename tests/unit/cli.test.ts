import { describe, it, expect, afterEach, vi } from 'vitest';
import { CommanderError } from 'commander';
import { createProgram, exitCodeForCommanderError, runCli } from '../../src/cli/index.js';
import { VERSION } from '../../src/version.js';

describe('exitCodeForCommanderError', () => {
  it('should keep 0 for help and version', () => {
    expect(exitCodeForCommanderError(new CommanderError(0, 'commander.version', VERSION))).toBe(0);
  });

  it('should map usage errors to Fatal rather than 1', () => {
    expect(
      exitCodeForCommanderError(new CommanderError(1, 'commander.unknownOption', 'unknown option'))
    ).toBe(2);
  });
});

describe('createProgram', () => {
  it('should register the deployment and operations commands', () => {
    const names = createProgram().commands.map((cmd) => cmd.name());
    expect(names).toEqual(['start', 'init-db', 'serve', 'status', 'reset', 'config']);
  });
});

describe('runCli', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should exit 2 on an unknown option', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await runCli(['init-db', '--bogus']);

    expect(process.exitCode).toBe(2);
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining("unknown option '--bogus'"));
  });

  it('should exit 2 on an unknown command', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await runCli(['frobnicate']);

    expect(process.exitCode).toBe(2);
  });

  it('should print the version and exit 0', async () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await runCli(['--version']);

    expect(process.exitCode).toBe(0);
    expect(stdout).toHaveBeenCalledWith(`${VERSION}\n`);
  });

  it('should refuse to reset without --confirm', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await runCli(['reset']);

    expect(process.exitCode).toBe(2);
    expect(error).toHaveBeenCalledWith(
      JSON.stringify({ error: 'Refusing to reset without --confirm', code: 'E1002' }, null, 2)
    );
  });

  it('should list environment variables as JSON', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runCli(['config']);

    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(Array.isArray(printed)).toBe(true);
    expect(printed).toContainEqual({
      envKey: 'PARFUME_PORT',
      section: 'server',
      default: 8000,
      description: 'HTTP server port. The container image exposes this port.',
    });
  });
});
