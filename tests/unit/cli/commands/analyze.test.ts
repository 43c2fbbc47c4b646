/**
 * Tests for the analyze command definition.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { CommanderError } from 'commander';
import { createAnalyzeCommand } from '../../../../src/cli/commands/analyze.js';
import { createCli } from '../../../../src/cli/index.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = resolve(__dirname, '../../../fixtures/trajectories');
const AIRLINE_FILE = resolve(FIXTURES, 'simulations/20250102_airline_test.json');

function silentCommand() {
  return createAnalyzeCommand()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
}

describe('createAnalyzeCommand', () => {
  it('should register the analyze options', () => {
    const cmd = createAnalyzeCommand();

    expect(cmd.name()).toBe('analyze');
    expect(cmd.options.map((option) => option.long)).toEqual([
      '--tasks',
      '--domain',
      '--config',
      '--output',
      '--json',
      '--top',
      '--verbose',
    ]);
  });

  it('should require at least one input', async () => {
    await expect(silentCommand().parseAsync([], { from: 'user' })).rejects.toBeInstanceOf(CommanderError);
  });

  it('should reject a non-positive --top', async () => {
    await expect(silentCommand().parseAsync(['runs.json', '--top', '0'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });
});

describe('analyze failures', () => {
  const missingPlanArgs = [AIRLINE_FILE, '--domain', 'retail', '--tasks', resolve(FIXTURES, 'tasks')];
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
  });

  it('should print the error as JSON on stderr under --json', async () => {
    await expect(
      createAnalyzeCommand().parseAsync([...missingPlanArgs, '--json'], { from: 'user' })
    ).rejects.toThrow('process.exit(1)');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const output: unknown = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(output).toEqual({
      error: {
        name: 'InputMismatchError',
        code: ErrorCodes.MISSING_PLAN,
        message: 'Run air-1 references task 10 with no expected plan in domain retail',
        details: { runId: 'air-1', taskId: '10', domain: 'retail' },
      },
    });
  });

  it('should log the error message without --json', async () => {
    await expect(createAnalyzeCommand().parseAsync(missingPlanArgs, { from: 'user' })).rejects.toThrow(
      'process.exit(1)'
    );

    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('Run air-1 references task 10 with no expected plan in domain retail')
    );
  });
});

describe('createCli', () => {
  it('should expose the analyze command and the package version', () => {
    const program = createCli();

    expect(program.name()).toBe('trajeval');
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['analyze']);
    expect(program.version()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
