import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';
import { promisify } from 'util';
import { ArtifactNotFoundError, BuildCollaborator, BuildError, TestTarget } from '../types';
import { describeError } from './error';
import { Logger, createLogger } from './logger';

const execFileAsync = promisify(execFile);

const CMAKE_TIMEOUT = 120_000;
const MAKE_TIMEOUT = 300_000;
const MAX_BUFFER = 16 * 1024 * 1024;

// The emulator's shared volume maps this host extension to the application file type.
const TYPE_MARKER_EXTENSION = /\.APPL$/i;

export type CommandRunner = (
  command: string,
  args: string[],
  options: { cwd: string; timeout: number }
) => Promise<unknown>;

const runCommand: CommandRunner = (command, args, options) =>
  execFileAsync(command, args, { ...options, maxBuffer: MAX_BUFFER });

export interface CMakeBuilderOptions {
  projectPath: string;
  toolchainFile?: string;
  jobs?: number;
  runCommand?: CommandRunner;
  logger?: Logger;
}

function processOutput(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = error.stderr;
    if (typeof stderr === 'string' && stderr.trim()) {
      return stderr.trim();
    }
    if (Buffer.isBuffer(stderr) && stderr.length > 0) {
      return stderr.toString('utf8').trim();
    }
  }
  return describeError(error);
}

/**
 * Builds guest test applications with the cross toolchain's CMake project:
 * configure once into <project>/build, then make one target at a time.
 */
export class CMakeBuilder implements BuildCollaborator {
  private readonly logger: Logger;

  constructor(private readonly options: CMakeBuilderOptions) {
    this.logger = options.logger ?? createLogger('build');
  }

  get buildDir(): string {
    return path.join(this.options.projectPath, 'build');
  }

  async build(target: TestTarget): Promise<void> {
    await fs.promises.mkdir(this.buildDir, { recursive: true });

    if (!fs.existsSync(path.join(this.buildDir, 'CMakeCache.txt'))) {
      const args = ['..'];
      if (this.options.toolchainFile) {
        args.push(`-DCMAKE_TOOLCHAIN_FILE=${this.options.toolchainFile}`);
      }
      this.logger.info('configuring build directory', { buildDir: this.buildDir });
      await this.run(target, 'cmake', args, CMAKE_TIMEOUT);
    }

    this.logger.info(`building ${target.displayName}`, { buildTarget: target.buildTarget });
    await this.run(target, 'make', [target.buildTarget, `-j${this.options.jobs ?? 4}`], MAKE_TIMEOUT);
  }

  async locateArtifact(target: TestTarget): Promise<string> {
    const artifactPath = path.join(this.buildDir, `${target.appName}.APPL`);
    if (!fs.existsSync(artifactPath)) {
      throw new ArtifactNotFoundError(artifactPath);
    }
    return artifactPath;
  }

  private async run(target: TestTarget, command: string, args: string[], timeout: number): Promise<void> {
    try {
      await (this.options.runCommand ?? runCommand)(command, args, { cwd: this.buildDir, timeout });
    } catch (error) {
      throw new BuildError(target.name, processOutput(error));
    }
  }
}

export function guestFileName(artifactPath: string): string {
  return path.basename(artifactPath).replace(TYPE_MARKER_EXTENSION, '');
}

// Copies a built app onto the shared volume, replacing any previous copy.
export async function deployArtifact(artifactPath: string, sharedFolder: string): Promise<string> {
  if (!fs.existsSync(artifactPath)) {
    throw new ArtifactNotFoundError(artifactPath);
  }

  const destination = path.join(sharedFolder, guestFileName(artifactPath));
  await fs.promises.rm(destination, { force: true });
  await fs.promises.copyFile(artifactPath, destination);
  return destination;
}
