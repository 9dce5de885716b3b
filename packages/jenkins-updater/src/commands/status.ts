/**
 * status command - Show service status
 */

import path from 'path';
import chalk from 'chalk';
import { isJenkinsProject } from '../utils.js';
import { loadConfig } from '../utils/config.js';
import { ComposeRuntime } from '../utils/compose.js';
import { JenkinsHealthProbe } from '../utils/health.js';
import { DockerfileVersionStore } from '../utils/version-store.js';
import type { CommandEnvironment } from './update.js';

export async function status(directory: string, env: CommandEnvironment = {}): Promise<void> {
  const dir = path.resolve(process.cwd(), directory);
  const config = await loadConfig(dir);

  if (!isJenkinsProject(dir, config.dockerfile, config.composeFile)) {
    console.error(chalk.red('\n❌ Error: Not a Jenkins controller project'));
    process.exitCode = 1;
    return;
  }

  console.log(chalk.blue.bold('\n📊 Service Status\n'));

  const runtime = new ComposeRuntime({
    projectDir: dir,
    service: config.service,
    composeFile: config.composeFile,
    run: env.run,
  });

  try {
    await runtime.printStatus();
  } catch (error) {
    console.error(chalk.red('\n❌ Failed to get status'));
    throw error;
  }

  const store = new DockerfileVersionStore(dir, config.dockerfile, config.image);
  const probe = new JenkinsHealthProbe({
    jenkinsUrl: config.jenkinsUrl,
    healthPath: config.healthPath,
    timeout: config.requestTimeoutMs,
  });

  const [pinned, healthy, version] = await Promise.all([
    store.readCurrentVersion().catch(() => 'unknown'),
    probe.isHealthy(),
    probe.fetchVersion(),
  ]);

  console.log('');
  console.log(chalk.gray('   Pinned image:'), `${config.image}:${pinned}`);
  console.log(
    chalk.gray('   Health:      '),
    healthy ? chalk.green(`✓ ${probe.url}`) : chalk.red(`✗ ${probe.url} not responding`)
  );
  console.log(chalk.gray('   Running:     '), version ?? 'unknown');
  console.log('');
}
