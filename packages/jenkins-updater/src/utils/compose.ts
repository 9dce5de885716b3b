/**
 * Docker Compose utilities shared across CLI commands
 */

import { execAsync, type CommandRunner } from '../utils.js';

/**
 * The controller service as seen by the orchestrator. Every call resolves
 * once the underlying command has exited, and rejects on a non-zero exit.
 */
export interface ServiceRuntime {
  stop(): Promise<void>;
  build(options?: { noCache?: boolean }): Promise<void>;
  start(): Promise<void>;
  isRunning(): Promise<boolean>;
}

export interface ComposeRuntimeOptions {
  projectDir: string;
  service: string;
  composeFile?: string | null;
  run?: CommandRunner;
}

/**
 * Get base docker compose arguments for compose commands.
 */
export function getComposeBaseArgs(composeFile?: string | null): string[] {
  return composeFile ? ['compose', '-f', composeFile] : ['compose'];
}

/**
 * Render a compose invocation for remediation output
 */
export function composeCommand(composeFile: string | null, ...args: string[]): string {
  return ['docker', ...getComposeBaseArgs(composeFile), ...args].join(' ');
}

export class ComposeRuntime implements ServiceRuntime {
  private readonly run: CommandRunner;

  constructor(private readonly options: ComposeRuntimeOptions) {
    this.run = options.run ?? execAsync;
  }

  async stop(): Promise<void> {
    await this.compose(['down']);
  }

  async build({ noCache = false }: { noCache?: boolean } = {}): Promise<void> {
    await this.compose(noCache ? ['build', '--no-cache'] : ['build']);
  }

  async start(): Promise<void> {
    await this.compose(['up', '-d']);
  }

  /**
   * Whether the controller service has a running container
   */
  async isRunning(): Promise<boolean> {
    const { stdout } = await this.compose([
      'ps',
      '--services',
      '--filter',
      'status=running',
    ]);

    return stdout
      .split('\n')
      .map((line) => line.trim())
      .includes(this.options.service);
  }

  /**
   * `docker compose ps` streamed to the terminal
   */
  async printStatus(): Promise<void> {
    await this.run('docker', [...getComposeBaseArgs(this.options.composeFile), 'ps'], {
      cwd: this.options.projectDir,
      inherit: true,
    });
  }

  private compose(args: string[]) {
    return this.run('docker', [...getComposeBaseArgs(this.options.composeFile), ...args], {
      cwd: this.options.projectDir,
    });
  }
}
