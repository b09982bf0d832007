import { ChildProcess, execFileSync, spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import { EmulatorHandle, EmulatorNotFoundError, ProcessController } from '../types';
import { describeError } from './error';
import { Logger, createLogger } from './logger';

const PKILL_TIMEOUT = 5000;
const DEFAULT_KILL_GRACE_MS = 3000;

export interface ProcessSupervisorOptions {
  emulatorBinaries: string[];
  socketPath: string;
  killGraceMs?: number;
  logger?: Logger;
}

function isExecutable(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

function exitStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (hasExited(child)) {
    return Promise.resolve(true);
  }

  return new Promise(resolve => {
    const timer = setTimeout(() => {
      child.off('exit', onExit);
      resolve(false);
    }, timeoutMs);
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    child.once('exit', onExit);
  });
}

/**
 * Owns the emulator process lifecycle, independently of any socket
 * connection. Retrying a failed launch is the boot orchestrator's job.
 */
export class ProcessSupervisor implements ProcessController {
  private readonly children = new WeakMap<EmulatorHandle, ChildProcess>();
  private readonly logger: Logger;

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.logger = options.logger ?? createLogger('process');
  }

  resolveBinary(): string {
    const binary = this.options.emulatorBinaries.find(isExecutable);
    if (!binary) {
      throw new EmulatorNotFoundError(this.options.emulatorBinaries);
    }
    return binary;
  }

  launch(): EmulatorHandle {
    const binaryPath = this.resolveBinary();
    const child = spawn(binaryPath, ['--automation', this.options.socketPath], {
      // The emulator looks for its prefs and ROM next to the binary.
      cwd: path.dirname(binaryPath),
      stdio: 'ignore',
    });

    child.on('error', error => {
      this.logger.error('emulator process error', { binaryPath, error: error.message });
    });
    child.on('exit', (code, signal) => {
      this.logger.debug('emulator exited', { pid: child.pid, code, signal });
    });

    const handle: EmulatorHandle = { pid: child.pid, binaryPath, startedAt: Date.now() };
    this.children.set(handle, child);
    this.logger.info('emulator launched', { pid: child.pid, binaryPath });
    return handle;
  }

  async kill(handle: EmulatorHandle): Promise<void> {
    const child = this.children.get(handle);
    if (!child || hasExited(child)) {
      return;
    }

    child.kill('SIGTERM');
    const exited = await waitForExit(child, this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    if (!exited) {
      this.logger.warn('emulator ignored SIGTERM, sending SIGKILL', { pid: handle.pid });
      child.kill('SIGKILL');
      await waitForExit(child, this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    }
    this.children.delete(handle);
  }

  // Returns true when a matching process was signalled.
  async forceKill(processName: string): Promise<boolean> {
    try {
      execFileSync('pkill', ['-9', '-x', processName], { stdio: 'pipe', timeout: PKILL_TIMEOUT });
      this.logger.info('killed stale emulator processes', { processName });
      return true;
    } catch (error: unknown) {
      const status = exitStatus(error);
      if (status === 1) {
        return false; // nothing matched
      }

      this.logger.warn('could not clear stale emulator processes', {
        processName,
        status,
        error: describeError(error),
      });
      return false;
    }
  }
}
