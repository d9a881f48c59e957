import { describe, it, expect, beforeEach } from 'vitest';
import { OperationRunner, OperationFailedError, StepFailedError } from '../operation-runner.js';
import {
  CommandCancelledError,
  CommandLaunchError,
  ShellExecutor,
} from '../../executor/shell-executor.js';
import {
  createMockExecutor,
  createMockLogger,
  createSink,
  exited,
  ok,
  operation,
  type CaptureSink,
} from '../../__tests__/test-helpers.js';

const SEPARATOR = `${'='.repeat(80)}\n`;

describe('OperationRunner', () => {
  let stdout: CaptureSink;
  let stderr: CaptureSink;
  let signal: AbortSignal;

  beforeEach(() => {
    stdout = createSink();
    stderr = createSink();
    signal = new AbortController().signal;
  });

  function createRunner(mock: ReturnType<typeof createMockExecutor>, logger = createMockLogger()) {
    return new OperationRunner({
      executor: mock.executor,
      ambientEnv: { PATH: '/usr/bin' },
      stdout,
      stderr,
      logger,
    });
  }

  describe('empty operations', () => {
    it('should succeed without touching the executor', async () => {
      const mock = createMockExecutor();

      await expect(createRunner(mock).run(signal, operation([]))).resolves.toBeUndefined();

      expect(mock.addEnv).not.toHaveBeenCalled();
      expect(mock.execute).not.toHaveBeenCalled();
      expect(stdout.output).toBe('');
    });
  });

  describe('successful runs', () => {
    it('should run steps in order and forward their output', async () => {
      const mock = createMockExecutor({
        'echo hello': ok('hello'),
        'echo world': ok('world\n', 'note'),
      });

      await createRunner(mock).run(signal, operation(['echo hello', 'echo world']));

      expect(mock.execute.mock.calls.map(([, command]) => command)).toEqual([
        'echo hello',
        'echo world',
      ]);
      expect(stdout.output).toBe(`[1] echo hello\nhello\n[2] echo world\nworld\n${SEPARATOR}`);
      expect(stderr.output).toBe('note\n');
    });

    it('should pass the signal to every step', async () => {
      const mock = createMockExecutor();

      await createRunner(mock).run(signal, operation(['a', 'b']));

      expect(mock.execute).toHaveBeenNthCalledWith(1, signal, 'a');
      expect(mock.execute).toHaveBeenNthCalledWith(2, signal, 'b');
    });

    it('should install the merged environment exactly once', async () => {
      const mock = createMockExecutor();
      const logger = createMockLogger();

      await createRunner(mock, logger).run(
        signal,
        operation(['echo $TEST_VAR', 'echo again'], { env: { TEST_VAR: 'test_value' } })
      );

      expect(mock.addEnv).toHaveBeenCalledTimes(1);
      expect(mock.addEnv).toHaveBeenCalledWith(['PATH=/usr/bin', 'TEST_VAR=test_value']);
      expect(logger.info).toHaveBeenCalledWith('Loading 1 additional environment variable(s)', {
        variables: ['TEST_VAR'],
      });
    });

    it('should size the separator to the output width', async () => {
      stdout = createSink(12);
      const mock = createMockExecutor();

      await createRunner(mock).run(signal, operation(['true']));

      expect(stdout.output).toBe(`[1] true\n${'='.repeat(12)}\n`);
    });
  });

  describe('fail-fast', () => {
    it('should stop at the first failing step', async () => {
      const mock = createMockExecutor({
        'echo a': ok('a\n'),
        'exit 2': exited(2),
      });

      const run = createRunner(mock).run(
        signal,
        operation(['echo a', 'exit 2', 'echo b'], { failFast: true })
      );

      await expect(run).rejects.toThrow(StepFailedError);
      await expect(run).rejects.toThrow("error while running 'exit 2' (exit code 2)");
      expect(mock.execute).toHaveBeenCalledTimes(2);
      expect(mock.execute).not.toHaveBeenCalledWith(signal, 'echo b');
    });

    it('should still write the failing output and the separator', async () => {
      const mock = createMockExecutor({ 'false': exited(1, 'command failed') });

      await expect(
        createRunner(mock).run(signal, operation(['false', 'true'], { failFast: true }))
      ).rejects.toThrow(StepFailedError);

      expect(stderr.output).toBe('command failed\n');
      expect(stdout.output).toBe(`[1] false\n${SEPARATOR}`);
    });

    it('should include the underlying error', async () => {
      const launchError = new CommandLaunchError('build', new Error('spawn /bin/sh ENOENT'));
      const mock = createMockExecutor({ build: { stdout: '', stderr: '', exitCode: -1, error: launchError } });

      const error = await createRunner(mock)
        .run(signal, operation(['build'], { failFast: true }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StepFailedError);
      expect((error as StepFailedError).message).toBe(
        "error while running 'build' (exit code -1): Failed to launch 'build': spawn /bin/sh ENOENT"
      );
      expect((error as StepFailedError).cause).toBe(launchError);
    });
  });

  describe('collect-all', () => {
    it('should run every step once and name only the failed ones', async () => {
      const mock = createMockExecutor({ 'false': exited(1) });

      const error = await createRunner(mock)
        .run(signal, operation(['true', 'false', 'true']))
        .catch((e: unknown) => e);

      expect(mock.execute).toHaveBeenCalledTimes(3);
      expect(error).toBeInstanceOf(OperationFailedError);
      expect((error as OperationFailedError).failedSteps).toEqual(['false']);
      expect((error as OperationFailedError).message).toBe("failed to run steps: ['false']");
    });

    it('should aggregate nonzero exits and launch errors', async () => {
      const mock = createMockExecutor({
        'false': exited(1),
        invalid_command: exited(127, 'invalid_command: not found'),
        launch: {
          stdout: '',
          stderr: '',
          exitCode: -1,
          error: new CommandLaunchError('launch', new Error('spawn EACCES')),
        },
      });

      const error = await createRunner(mock)
        .run(signal, operation(['echo hello', 'false', 'launch', 'invalid_command']))
        .catch((e: unknown) => e);

      expect(mock.execute).toHaveBeenCalledTimes(4);
      expect((error as OperationFailedError).failedSteps).toEqual([
        'false',
        'launch',
        'invalid_command',
      ]);
      expect(stderr.output).toBe('invalid_command: not found\n');
      expect(stdout.output.endsWith(SEPARATOR)).toBe(true);
    });

    it('should record a step the shell cannot accept and run the rest', async () => {
      const runner = new OperationRunner({
        executor: new ShellExecutor(),
        ambientEnv: { PATH: process.env.PATH ?? '/usr/bin:/bin' },
        stdout,
        stderr,
      });

      const error = await runner
        .run(signal, operation(['true', 'echo a\0b', 'echo last']))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OperationFailedError);
      expect((error as OperationFailedError).failedSteps).toEqual(['echo a\0b']);
      expect(stdout.output).toBe(`[1] true\n[2] echo a\0b\n[3] echo last\nlast\n${SEPARATOR}`);
    });

    it('should stop on cancellation even without fail-fast', async () => {
      const cancelled = new CommandCancelledError('sleep 10', 'received SIGINT');
      const mock = createMockExecutor({
        'sleep 10': { stdout: '', stderr: '', exitCode: -1, error: cancelled },
      });

      const error = await createRunner(mock)
        .run(signal, operation(['sleep 10', 'echo after']))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StepFailedError);
      expect((error as StepFailedError).cause).toBe(cancelled);
      expect(mock.execute).toHaveBeenCalledTimes(1);
    });

    it('should stop when the signal is aborted between steps', async () => {
      const controller = new AbortController();
      const mock = createMockExecutor();
      mock.execute.mockImplementationOnce(async () => {
        controller.abort();
        return exited(143);
      });

      await expect(
        createRunner(mock).run(controller.signal, operation(['first', 'second']))
      ).rejects.toThrow("error while running 'first' (exit code 143)");
      expect(mock.execute).toHaveBeenCalledTimes(1);
    });
  });
});
