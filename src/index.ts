#!/usr/bin/env node
/**
 * scp-prompt - Interactive SCP file upload
 *
 * Features:
 * - Interactive prompts for file, host, port, user and remote path
 * - Key authentication (~/.ssh/id_rsa, id_ed25519, id_ecdsa) with passphrase fallback
 * - Password authentication as the last resort
 * - Chunked upload with byte-level progress
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { describeError } from './errors.js';
import { readPackageVersion } from './config.js';
import { createConsoleLogger } from './logger.js';
import { TerminalPrompter } from './prompt.js';
import { SpinnerProgress } from './progress.js';
import { runUpload } from './scp-upload.js';
import { openSshSession } from './session-manager.js';

const VERSION = readPackageVersion(new URL('../package.json', import.meta.url));

const BANNER = [
  chalk.cyan('====================================='),
  chalk.bold.cyan('🔐 Interactive SCP File Transfer Tool'),
  chalk.cyan('====================================='),
].join('\n');

interface CliOptions {
  host?: string;
  port?: string;
  user?: string;
  remotePath?: string;
  verbose?: boolean;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('scp-prompt')
    .description('Copy a local file to a remote host over SSH, prompting for anything not given')
    .version(VERSION, '-V, --version', 'Output the version number')
    .argument('[localFile]', 'Local file to upload')
    .option('-H, --host <host>', 'Remote host')
    .option('-p, --port <port>', 'SSH port (default 22)')
    .option('-u, --user <username>', 'Remote username')
    .option('-r, --remote-path <path>', 'Destination path on the remote host')
    .option('-v, --verbose', 'Verbose output')
    .action(async (localFile: string | undefined, options: CliOptions) => {
      console.log(BANNER);
      const logger = createConsoleLogger({ verbose: options.verbose });
      const prompter = new TerminalPrompter();

      try {
        await runUpload(
          {
            localFile,
            host: options.host,
            port: options.port,
            username: options.user,
            remotePath: options.remotePath,
          },
          {
            prompter,
            logger,
            openSession: openSshSession,
            createProgress: () => new SpinnerProgress(),
            homeDir: process.env.HOME,
          }
        );
        console.log('\n' + chalk.green.bold('✅ File transfer completed successfully!'));
      } catch (err) {
        console.error('\n' + chalk.red.bold('❌ Transfer failed:'));
        console.error(chalk.red(describeError(err)));
        process.exitCode = 1;
      } finally {
        prompter.close();
      }
    });

  return program;
}

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(describeError(err)));
  process.exit(1);
});
