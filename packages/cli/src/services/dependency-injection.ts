import { spawn } from 'child_process';
import { Git } from '@app-commit/core';

/**
 * Runs a command and collects its output. Raw stdout bytes are kept so
 * binary blobs survive `git cat-file`.
 */
export const spawnExecCommand: Git.ExecCommand = (command, args, options) => {
  return new Promise<Git.ExecResult>((resolve) => {
    const proc = spawn(command, args, {
      cwd: options?.cwd || process.cwd(),
      env: { ...process.env, ...options?.env },
      timeout: options?.timeout,
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    proc.stdout?.on('data', (data: Buffer) => { stdoutChunks.push(data); });
    proc.stderr?.on('data', (data: Buffer) => { stderrChunks.push(data); });

    proc.on('close', (code: number | null) => {
      const rawStdout = Buffer.concat(stdoutChunks);
      resolve({
        exitCode: code ?? 1,
        stdout: rawStdout.toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        rawStdout,
      });
    });

    proc.on('error', (error: Error) => {
      resolve({ exitCode: 1, stdout: '', stderr: error.message, rawStdout: Buffer.alloc(0) });
    });
  });
};

/**
 * Dependency Injection Service for the app-commit CLI
 *
 * Creates and caches the collaborators commands need.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private repository: Git.LocalRepository | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Local repository of the working directory, read through the git CLI
   */
  getLocalRepository(): Git.LocalRepository {
    if (!this.repository) {
      this.repository = new Git.LocalGitModule({ execCommand: spawnExecCommand });
    }
    return this.repository;
  }
}
