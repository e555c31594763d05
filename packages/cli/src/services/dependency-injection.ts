import * as path from 'path';
import { spawn } from 'child_process';
import { Git, Inspector, Override, Config, Logger } from '@pushgate/core';

/**
 * Builds the execCommand used by LocalGitModule on top of child_process.spawn.
 *
 * Always resolves: a spawn error becomes exitCode 1 with the error message on
 * stderr, and a process killed by a signal reports exitCode 1.
 */
export function createExecCommand(defaultCwd: string): Git.ExecCommand {
  return (command, args, options) => {
    return new Promise<Git.ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd || defaultCwd,
        env: { ...process.env, ...options?.env },
      });

      let stdout = '';
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 1, stdout, stderr: error.message });
      });
    });
  };
}

export type DependencyOptions = {
  /** Repository root; auto-detected from the working directory when absent */
  repo?: string;
  /** Explicit config file */
  config?: string;
};

/**
 * Dependency Injection Service for the pushgate CLI
 *
 * Creates the core modules once per configuration and hands them to the
 * commands.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private options: DependencyOptions = {};
  private repoRoot: string | null = null;
  private gitModule: Git.IGitModule | null = null;
  private inspector: Inspector.RepositoryInspector | null = null;
  private configManager: Config.ConfigManager | null = null;

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
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Sets repository and config paths, dropping modules built for earlier ones
   */
  configure(options: DependencyOptions): void {
    this.options = { ...options };
    this.repoRoot = null;
    this.gitModule = null;
    this.inspector = null;
    this.configManager = null;
  }

  /**
   * Resolves the repository root: the --repo option, else the git top level
   * of the current directory, else the current directory itself.
   */
  async getRepoRoot(): Promise<string> {
    if (this.repoRoot) {
      return this.repoRoot;
    }

    if (this.options.repo) {
      this.repoRoot = path.resolve(this.options.repo);
      return this.repoRoot;
    }

    const cwd = process.cwd();
    const result = await createExecCommand(cwd)('git', ['rev-parse', '--show-toplevel']);
    this.repoRoot = result.exitCode === 0 && result.stdout.trim() ? result.stdout.trim() : cwd;
    return this.repoRoot;
  }

  /**
   * Creates and returns the CLI-backed GitModule
   */
  async getGitModule(): Promise<Git.IGitModule> {
    if (this.gitModule) {
      return this.gitModule;
    }

    const repoRoot = await this.getRepoRoot();
    this.gitModule = new Git.LocalGitModule({
      repoRoot,
      execCommand: createExecCommand(repoRoot),
    });
    return this.gitModule;
  }

  async getInspector(): Promise<Inspector.RepositoryInspector> {
    if (this.inspector) {
      return this.inspector;
    }

    this.inspector = new Inspector.RepositoryInspector({ git: await this.getGitModule() });
    return this.inspector;
  }

  async getConfigManager(): Promise<Config.ConfigManager> {
    if (this.configManager) {
      return this.configManager;
    }

    const projectRoot = await this.getRepoRoot();
    this.configManager = new Config.ConfigManager({
      projectRoot,
      ...(this.options.config ? { configPath: path.resolve(this.options.config) } : {}),
    });
    return this.configManager;
  }

  /**
   * Creates an OverrideRecorder using the effective configuration.
   * Built per call so the logger can follow the command's output mode.
   */
  async getOverrideRecorder(logger?: Logger.Logger): Promise<Override.OverrideRecorder> {
    const { config } = await (await this.getConfigManager()).loadConfig();

    return new Override.OverrideRecorder({
      git: await this.getGitModule(),
      inspector: await this.getInspector(),
      fileSystem: new Override.FsOverrideFileSystem(),
      options: config.override,
      ...(logger ? { logger } : {}),
    });
  }
}
