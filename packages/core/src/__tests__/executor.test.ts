import { EventEmitter } from 'node:events';
import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { LocalProcessExecutor } from '../executor.js';

vi.mock('node:child_process', () => ({ spawn: vi.fn() }));

function fakeChild() {
  return Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
    kill: vi.fn(),
  });
}

describe('LocalProcessExecutor', () => {
  let child: ReturnType<typeof fakeChild>;

  beforeEach(() => {
    child = fakeChild();
    vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess);
  });

  afterEach(() => {
    vi.mocked(spawn).mockReset();
    vi.useRealTimers();
  });

  it('spawns the command without a shell and captures its output', async () => {
    const pending = new LocalProcessExecutor().exec(['nst', '-t', 'individual'], { cwd: '/work', env: { MODE: 'x' } });
    child.stdout.emit('data', Buffer.from('hello '));
    child.stdout.emit('data', Buffer.from('world'));
    child.stderr.emit('data', Buffer.from('warn'));
    child.emit('close', 0);

    const result = await pending;
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('hello world');
    expect(result.stderr).toBe('warn');
    expect(result.timedOut).toBe(false);
    expect(spawn).toHaveBeenCalledWith(
      'nst',
      ['-t', 'individual'],
      expect.objectContaining({
        cwd: '/work',
        stdio: ['ignore', 'pipe', 'pipe'],
        env: expect.objectContaining({ MODE: 'x' }),
      }),
    );
  });

  it('reports a non-zero exit code', async () => {
    const pending = new LocalProcessExecutor().exec(['false']);
    child.emit('close', 3);
    await expect(pending).resolves.toMatchObject({ exitCode: 3, stdout: '', stderr: '' });
  });

  it('kills a command that outlives its timeout', async () => {
    vi.useFakeTimers();
    const pending = new LocalProcessExecutor().exec(['sleep', '60'], { timeoutMs: 1_000 });
    await vi.advanceTimersByTimeAsync(1_000);
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    child.emit('close', null);
    await expect(pending).resolves.toMatchObject({ exitCode: 124, timedOut: true });
  });

  it('escalates to SIGKILL when the command ignores SIGTERM', async () => {
    vi.useFakeTimers();
    const pending = new LocalProcessExecutor().exec(['stubborn'], { timeoutMs: 1_000, killGraceMs: 2_000 });
    await vi.advanceTimersByTimeAsync(1_000);
    expect(child.kill).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1_999);
    expect(child.kill).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(child.kill).toHaveBeenLastCalledWith('SIGKILL');
    child.emit('close', null);
    await expect(pending).resolves.toMatchObject({ exitCode: 124, timedOut: true });
  });

  it('does not send SIGKILL once the command has exited', async () => {
    vi.useFakeTimers();
    const pending = new LocalProcessExecutor().exec(['sleep', '60'], { timeoutMs: 1_000 });
    await vi.advanceTimersByTimeAsync(1_000);
    child.emit('close', null);
    await pending;
    await vi.advanceTimersByTimeAsync(10_000);
    expect(child.kill.mock.calls).toEqual([['SIGTERM']]);
  });

  it('truncates output beyond the capture limit', async () => {
    const pending = new LocalProcessExecutor().exec(['yes']);
    child.stdout.emit('data', Buffer.alloc(1024 * 1024, 'y'));
    child.stdout.emit('data', Buffer.from('overflow'));
    child.emit('close', 0);
    const result = await pending;
    expect(result.stdout).toBe('y'.repeat(1024 * 1024) + '\n[stdout truncated]\n');
  });

  it('rejects when the command cannot start', async () => {
    const pending = new LocalProcessExecutor().exec(['missing-binary']);
    child.emit('error', new Error('spawn missing-binary ENOENT'));
    await expect(pending).rejects.toThrow('spawn missing-binary ENOENT');
  });

  it('rejects an empty command', async () => {
    await expect(new LocalProcessExecutor().exec([])).rejects.toThrow('command argv must be non-empty');
    expect(spawn).not.toHaveBeenCalled();
  });
});
