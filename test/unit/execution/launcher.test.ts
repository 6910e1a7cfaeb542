import { EventEmitter } from 'events';
import { jest } from '@jest/globals';
import { launch, toLaunchError, FORWARDED_SIGNALS } from '../../../src/execution/launcher.js';
import type { SpawnFn } from '../../../src/execution/launcher.js';
import { LaunchError, LaunchErrorCode } from '../../../src/shared/errors.js';
import { FakeChild } from '../../fixtures/fake-child.js';

describe('launch', () => {
  let child: FakeChild;
  let signals: EventEmitter;
  let spawn: jest.Mock<SpawnFn>;

  beforeEach(() => {
    child = new FakeChild();
    signals = new EventEmitter();
    spawn = jest.fn<SpawnFn>(() => child);
  });

  it('spawns the command with inherited stdio and the given environment', async () => {
    const env = { PATH: '/usr/bin', HOME: '/home/dev' };
    const pending = launch(['echo', 'hi'], { env, spawn, signals });
    child.exit(0);
    await expect(pending).resolves.toEqual({ kind: 'exited', code: 0 });
    expect(spawn).toHaveBeenCalledWith('echo', ['hi'], { stdio: 'inherit', env });
  });

  it('reports the exit code untranslated', async () => {
    const pending = launch(['false'], { spawn, signals });
    child.exit(42);
    await expect(pending).resolves.toEqual({ kind: 'exited', code: 42 });
  });

  it('reports death by signal', async () => {
    const pending = launch(['sleep', '60'], { spawn, signals });
    child.exit(null, 'SIGKILL');
    await expect(pending).resolves.toEqual({ kind: 'signaled', signal: 'SIGKILL' });
  });

  it('forwards received signals to the child while it runs', async () => {
    const pending = launch(['sleep', '60'], { spawn, signals, terminalAttached: false });
    signals.emit('SIGTERM', 'SIGTERM');
    signals.emit('SIGINT', 'SIGINT');
    expect(child.kill.mock.calls).toEqual([['SIGTERM'], ['SIGINT']]);
    child.exit(null, 'SIGTERM');
    await pending;
  });

  it('does not send terminal signals a second time when a terminal is attached', async () => {
    const pending = launch(['vim'], { spawn, signals, terminalAttached: true });
    signals.emit('SIGINT', 'SIGINT');
    signals.emit('SIGQUIT', 'SIGQUIT');
    signals.emit('SIGTERM', 'SIGTERM');
    signals.emit('SIGHUP', 'SIGHUP');
    expect(child.kill.mock.calls).toEqual([['SIGTERM'], ['SIGHUP']]);
    expect(signals.listenerCount('SIGINT')).toBe(1);
    child.exit(0);
    await expect(pending).resolves.toEqual({ kind: 'exited', code: 0 });
  });

  it('stops listening for signals once the child has ended', async () => {
    const pending = launch(['true'], { spawn, signals, terminalAttached: false });
    for (const signal of FORWARDED_SIGNALS) {
      expect(signals.listenerCount(signal)).toBe(1);
    }
    child.exit(0);
    await pending;
    for (const signal of FORWARDED_SIGNALS) {
      expect(signals.listenerCount(signal)).toBe(0);
    }
    signals.emit('SIGTERM', 'SIGTERM');
    expect(child.kill).not.toHaveBeenCalled();
  });

  it('rejects with exit code 127 when the command is not found', async () => {
    const pending = launch(['/no/such/binary'], { spawn, signals });
    child.fail('ENOENT', 'spawn /no/such/binary ENOENT');
    await expect(pending).rejects.toMatchObject({
      code: LaunchErrorCode.COMMAND_NOT_FOUND,
      exitCode: 127,
      message: '/no/such/binary: command not found',
    });
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('rejects with exit code 126 when the command cannot be executed', async () => {
    const pending = launch(['./script.sh'], { spawn, signals });
    child.fail('EACCES');
    await expect(pending).rejects.toMatchObject({
      code: LaunchErrorCode.COMMAND_NOT_EXECUTABLE,
      exitCode: 126,
      message: './script.sh: Permission denied',
    });
  });

  it('rejects when spawn throws synchronously', async () => {
    spawn.mockImplementation(() => {
      throw Object.assign(new Error('invalid argument'), { code: 'EINVAL' });
    });
    await expect(launch(['tool'], { spawn, signals })).rejects.toMatchObject({
      code: LaunchErrorCode.COMMAND_NOT_EXECUTABLE,
      message: 'tool: EINVAL',
    });
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('reports a file the kernel cannot execute as 126 without running it through a shell', async () => {
    spawn.mockImplementation(() => {
      throw Object.assign(new Error('spawn ENOEXEC'), { code: 'ENOEXEC' });
    });
    await expect(launch(['./notes.txt'], { spawn, signals })).rejects.toMatchObject({
      code: LaunchErrorCode.COMMAND_NOT_EXECUTABLE,
      exitCode: 126,
      message: './notes.txt: ENOEXEC',
    });
    expect(spawn).toHaveBeenCalledTimes(1);
  });

  it('ignores an error reported after the child exited', async () => {
    const pending = launch(['true'], { spawn, signals });
    child.exit(3);
    child.fail('EPIPE');
    await expect(pending).resolves.toEqual({ kind: 'exited', code: 3 });
  });

  it('rejects an empty command without spawning', async () => {
    await expect(launch([], { spawn, signals })).rejects.toMatchObject({
      code: LaunchErrorCode.NO_COMMAND,
      exitCode: 127,
    });
    await expect(launch([''], { spawn, signals })).rejects.toBeInstanceOf(LaunchError);
    expect(spawn).not.toHaveBeenCalled();
  });
});

describe('toLaunchError', () => {
  it('uses the error message when there is no errno code', () => {
    const err = toLaunchError('tool', new Error('boom'));
    expect(err.code).toBe(LaunchErrorCode.COMMAND_NOT_EXECUTABLE);
    expect(err.message).toBe('tool: boom');
    expect(err.context).toEqual({ file: 'tool', cause: 'boom' });
  });

  it('accepts non-Error values', () => {
    expect(toLaunchError('tool', 'weird').message).toBe('tool: weird');
  });
});
