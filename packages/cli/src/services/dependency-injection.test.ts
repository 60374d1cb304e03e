jest.mock('child_process', () => ({
  spawn: jest.fn(),
}));

import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { Git } from '@app-commit/core';
import { DependencyInjectionService, spawnExecCommand } from './dependency-injection';

const mockSpawn = jest.mocked(spawn);

/** Minimal child process: emitters for stdout, stderr and the process itself */
function fakeProcess() {
  const proc = Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
  });
  mockSpawn.mockReturnValue(proc as unknown as ReturnType<typeof spawn>);
  return proc;
}

describe('spawnExecCommand', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should collect stdout as text and raw bytes', async () => {
    const proc = fakeProcess();

    const pending = spawnExecCommand('git', ['cat-file', 'blob', 'abc'], { cwd: '/repo' });
    proc.stdout.emit('data', Buffer.from([0x68, 0x69]));
    proc.stdout.emit('data', Buffer.from([0x80]));
    proc.stderr.emit('data', Buffer.from('warning\n'));
    proc.emit('close', 0);
    const result = await pending;

    expect(mockSpawn).toHaveBeenCalledWith('git', ['cat-file', 'blob', 'abc'], expect.objectContaining({ cwd: '/repo' }));
    expect(result.exitCode).toBe(0);
    expect(result.rawStdout.equals(Buffer.from([0x68, 0x69, 0x80]))).toBe(true);
    expect(result.stdout.startsWith('hi')).toBe(true);
    expect(result.stderr).toBe('warning\n');
  });

  it('should report the exit code of a failed command', async () => {
    const proc = fakeProcess();

    const pending = spawnExecCommand('git', ['symbolic-ref', 'HEAD']);
    proc.emit('close', 128);

    await expect(pending).resolves.toMatchObject({ exitCode: 128, stdout: '' });
  });

  it('should resolve with the spawn error instead of rejecting', async () => {
    const proc = fakeProcess();

    const pending = spawnExecCommand('git', ['status']);
    proc.emit('error', new Error('spawn git ENOENT'));

    await expect(pending).resolves.toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'spawn git ENOENT',
      rawStdout: Buffer.alloc(0),
    });
  });
});

describe('DependencyInjectionService', () => {
  it('should be a singleton', () => {
    expect(DependencyInjectionService.getInstance()).toBe(DependencyInjectionService.getInstance());
  });

  it('should build one git-backed local repository', () => {
    const service = DependencyInjectionService.getInstance();

    const repository = service.getLocalRepository();

    expect(repository).toBeInstanceOf(Git.LocalGitModule);
    expect(service.getLocalRepository()).toBe(repository);
  });
});
