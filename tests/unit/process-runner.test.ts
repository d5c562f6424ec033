import { BinaryNotFoundError, InvalidArgumentError } from '../../src/types';
import { Logger, noopLogger } from '../../src/utils/logger';
import { ProcessReaper } from '../../src/utils/process-pool';
import {
  ProcessRunner,
  ProcessRunnerOptions,
  decodeOutput,
  filterLines,
  mergeOutput,
  toLinePattern,
} from '../../src/utils/process-runner';
import { FakeSpawner, detachedReaper } from '../mocks/adb.mock';

const resolver = (name: string) => `/opt/bin/${name}`;

function createRunner(spawner: FakeSpawner, options: ProcessRunnerOptions = {}): ProcessRunner {
  return new ProcessRunner('adb', {
    resolver,
    spawner: spawner.spawn,
    reaper: detachedReaper(),
    ...options,
  });
}

describe('ProcessRunner', () => {
  describe('construction', () => {
    it('should resolve the executable once', () => {
      const resolve = jest.fn(resolver);
      const runner = new ProcessRunner('adb', { resolver: resolve, reaper: detachedReaper() });

      expect(runner.executable).toBe('/opt/bin/adb');
      expect(resolve).toHaveBeenCalledTimes(1);
      expect(resolve).toHaveBeenCalledWith('adb');
    });

    it('should keep extra tokens of the executable command as base arguments', () => {
      const runner = new ProcessRunner('adb -P 5037', { resolver, reaper: detachedReaper() });

      expect(runner.baseArgs).toEqual(['/opt/bin/adb', '-P', '5037']);
    });

    it('should throw BinaryNotFoundError when the binary is not on PATH', () => {
      expect(
        () => new ProcessRunner('adb', { resolver: () => null, reaper: detachedReaper() })
      ).toThrow(BinaryNotFoundError);
      expect(
        () => new ProcessRunner('adb', { resolver: () => null, reaper: detachedReaper() })
      ).toThrow('Binary not found in path: "adb"');
    });

    it('should skip resolution when there is no executable', () => {
      const resolve = jest.fn(resolver);
      const runner = new ProcessRunner(null, { resolver: resolve, reaper: detachedReaper() });

      expect(runner.executable).toBeUndefined();
      expect(resolve).not.toHaveBeenCalled();
    });

    it('should install a single exit hook for all runners on one reaper', () => {
      const host = { once: jest.fn() };
      const reaper = new ProcessReaper(noopLogger, host);
      new ProcessRunner('adb', { resolver, reaper });
      new ProcessRunner('adb', { resolver, reaper });

      expect(host.once).toHaveBeenCalledTimes(1);
      expect(host.once).toHaveBeenCalledWith('exit', expect.any(Function));
      expect(reaper.trackedPools).toBe(2);
    });
  });

  describe('execute', () => {
    it('should spawn the executable with base and call arguments', async () => {
      const spawner = new FakeSpawner();
      const runner = new ProcessRunner('adb -P 5037', {
        resolver,
        spawner: spawner.spawn,
        reaper: detachedReaper(),
      });

      await runner.execute(['-s', 'emulator-5554', 'shell', 'ls']);

      expect(spawner.calls).toEqual([
        { command: '/opt/bin/adb', args: ['-P', '5037', '-s', 'emulator-5554', 'shell', 'ls'] },
      ]);
    });

    it('should split string commands with shell quoting', async () => {
      const spawner = new FakeSpawner();
      const runner = createRunner(spawner);

      await runner.execute(`shell input text 'hello world'`);

      expect(spawner.calls[0].args).toEqual(['shell', 'input', 'text', 'hello world']);
    });

    it('should run the first token unresolved when the runner has no executable', async () => {
      const spawner = new FakeSpawner();
      const runner = new ProcessRunner(null, {
        resolver,
        spawner: spawner.spawn,
        reaper: detachedReaper(),
      });

      await runner.execute('echo hi');

      expect(spawner.calls).toEqual([{ command: 'echo', args: ['hi'] }]);
    });

    it('should reject an empty command without spawning', async () => {
      const spawner = new FakeSpawner();
      const runner = new ProcessRunner(null, {
        resolver,
        spawner: spawner.spawn,
        reaper: detachedReaper(),
      });

      await expect(runner.execute([])).rejects.toThrow(InvalidArgumentError);
      expect(spawner.calls).toHaveLength(0);
    });

    it('should return the exit code and stderr ahead of stdout', async () => {
      const spawner = new FakeSpawner(() => ({
        stdout: 'List of devices attached\n',
        stderr: 'warning: old server\n',
        code: 0,
      }));
      const runner = createRunner(spawner);

      const result = await runner.execute('devices');

      expect(result).toEqual({
        exitCode: 0,
        output: 'warning: old server\nList of devices attached',
        timedOut: false,
      });
    });

    it('should trim trailing whitespace only', async () => {
      const spawner = new FakeSpawner(() => ({ stdout: '  hello \n\n' }));
      const runner = createRunner(spawner);

      const result = await runner.execute('shell echo');

      expect(result.output).toBe('  hello');
    });

    it('should pass non-zero exit codes through', async () => {
      const spawner = new FakeSpawner(() => ({ stderr: 'error: no devices/emulators found', code: 1 }));
      const runner = createRunner(spawner);

      const result = await runner.execute('shell ls');

      expect(result.exitCode).toBe(1);
      expect(result.output).toBe('error: no devices/emulators found');
    });

    it('should keep only lines matching a filter', async () => {
      const spawner = new FakeSpawner(() => ({ stdout: 'a=1\nb=2\na=3' }));
      const runner = createRunner(spawner);

      await expect(runner.execute('x', { filter: /^a/g })).resolves.toMatchObject({
        output: 'a=1\na=3',
      });
      await expect(runner.execute('x', { filter: 'b=' })).resolves.toMatchObject({ output: 'b=2' });
    });

    it('should reject an invalid filter before spawning', async () => {
      const spawner = new FakeSpawner();
      const runner = createRunner(spawner);

      await expect(runner.execute('x', { filter: '(' })).rejects.toThrow(InvalidArgumentError);
      expect(spawner.calls).toHaveLength(0);
    });

    it('should call onComplete with the final result before resolving', async () => {
      const spawner = new FakeSpawner(() => ({ stdout: 'ok', code: 0 }));
      const runner = createRunner(spawner);
      const order: string[] = [];

      const promise = runner
        .execute('get-state', {
          onComplete: (code, output) => order.push(`callback:${code}:${output}`),
        })
        .then(() => order.push('resolved'));
      await promise;

      expect(order).toEqual(['callback:0:ok', 'resolved']);
    });

    it('should decode invalid UTF-8 with replacement characters', async () => {
      const spawner = new FakeSpawner(() => ({ stdout: Buffer.from([0x66, 0x6f, 0xff, 0x6f]) }));
      const runner = createRunner(spawner);

      const result = await runner.execute('shell cat');

      expect(result.output).toBe('fo\uFFFDo');
    });

    it('should report a spawn failure in the output', async () => {
      const spawner = new FakeSpawner(() => ({ error: new Error('spawn EACCES') }));
      const runner = createRunner(spawner);

      const result = await runner.execute('devices');

      expect(result).toEqual({
        exitCode: null,
        output: 'Process failed to start: spawn EACCES',
        timedOut: false,
      });
      expect(runner.activeProcesses).toBe(0);
    });

    it('should track the child only while it runs', async () => {
      const spawner = new FakeSpawner(() => ({ delayMs: 10 }));
      const runner = createRunner(spawner);

      const pending = runner.execute('devices');
      expect(runner.activeProcesses).toBe(1);

      await pending;
      expect(runner.activeProcesses).toBe(0);
    });

    it('should log the command and output in debug mode', async () => {
      const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      const spawner = new FakeSpawner(() => ({ stdout: '1.0.41' }));
      const runner = createRunner(spawner, { debug: true, logger });

      await runner.execute('version');

      expect(logger.debug).toHaveBeenNthCalledWith(1, '> /opt/bin/adb version');
      expect(logger.debug).toHaveBeenNthCalledWith(2, '1.0.41');
    });

    it('should stay quiet without debug', async () => {
      const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      const spawner = new FakeSpawner(() => ({ stdout: '1.0.41' }));
      const runner = createRunner(spawner, { logger });

      await runner.execute('version');

      expect(logger.debug).not.toHaveBeenCalled();
    });
  });

  describe('timeouts', () => {
    it('should kill a child that outlives its timeout', async () => {
      const spawner = new FakeSpawner(() => ({ hang: true }));
      const runner = createRunner(spawner);

      const result = await runner.execute('logcat', { timeoutMs: 30, filter: /never/ });

      expect(result).toEqual({
        exitCode: null,
        output: 'Process "1000" timed out after 30 ms',
        timedOut: true,
      });
      expect(spawner.children[0].killSignals).toEqual(['SIGKILL']);
      expect(runner.activeProcesses).toBe(0);
    });

    it('should not bound a call whose timeout is zero', async () => {
      const spawner = new FakeSpawner(() => ({ stdout: 'done', delayMs: 20 }));
      const runner = createRunner(spawner);

      const result = await runner.execute('shell sleep', { timeoutMs: 0 });

      expect(result).toEqual({ exitCode: 0, output: 'done', timedOut: false });
    });
  });

  describe('concurrency', () => {
    it('should serialize calls in singleton mode', async () => {
      const spawner = new FakeSpawner(() => ({ delayMs: 15 }));
      const runner = createRunner(spawner, { singleton: true });

      await Promise.all([runner.execute('first'), runner.execute('second')]);

      expect(spawner.events).toEqual(['start:1000', 'end:1000', 'start:1001', 'end:1001']);
      expect(spawner.commandLines).toEqual(['first', 'second']);
    });

    it('should run calls side by side otherwise', async () => {
      const spawner = new FakeSpawner(() => ({ delayMs: 15 }));
      const runner = createRunner(spawner);

      await Promise.all([runner.execute('first'), runner.execute('second')]);

      expect(spawner.events.slice(0, 2)).toEqual(['start:1000', 'start:1001']);
    });
  });

  describe('dispose', () => {
    it('should kill running children and detach from the reaper', async () => {
      const reaper = detachedReaper();
      const spawner = new FakeSpawner(() => ({ hang: true }));
      const runner = createRunner(spawner, { reaper });

      const pending = runner.execute('logcat');
      expect(runner.dispose()).toBe(1);
      expect(reaper.trackedPools).toBe(0);

      const result = await pending;
      expect(result).toEqual({ exitCode: null, output: '', timedOut: false });
      expect(spawner.children[0].killSignals).toEqual(['SIGKILL']);
    });
  });
});

describe('output helpers', () => {
  it('should merge stderr ahead of stdout', () => {
    expect(mergeOutput('', 'out\n')).toBe('out');
    expect(mergeOutput('err\n', 'out\n')).toBe('err\nout');
    expect(mergeOutput('err\n', '')).toBe('err');
  });

  it('should decode valid UTF-8 unchanged', () => {
    expect(decodeOutput(Buffer.from('héllo', 'utf-8'))).toBe('héllo');
  });

  it('should drop stateful regex flags from filters', () => {
    const pattern = toLinePattern(/^a/gi);

    expect(pattern.flags).toBe('i');
    expect(filterLines('a1\r\nb2\nA3', pattern)).toBe('a1\nA3');
  });
});
