#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import * as packageJson from '../package.json';
import { loadConfig } from './config/loader';
import { validateAndNormalizeConfig } from './config/validator';
import { ProvisionerConfig } from './config/types';
import { ProvisioningError, describeError, isProvisioningError, remediationFor } from './errors';
import { createSpinnerLogger, maskIdentifier } from './logging/logger';
import { createPipelineOrchestrator } from './orchestration/pipeline-orchestrator';
import { PipelineResult } from './orchestration/types';
import { generateBaselineTemplate, serializeTemplate, templateFormatFor } from './templates/baseline-template';
import { renderConfigFile } from './templates/config-template';
import {
  RunCommandOptions,
  EXIT_FAILURE,
  EXIT_USAGE,
  buildCredential,
  buildIntents,
  buildOverrides,
  describeConfig,
  exitCodeFor,
  formatFailure,
  parsePositiveInteger
} from './commands/options';

const program = new Command();

program
  .name('secret-provisioner')
  .description('Deploy the pre-apply stack, issue IAM access keys and publish them as GitHub Actions secrets')
  .version(packageJson.version);

program
  .command('run', { isDefault: true })
  .description('Run the requested pipeline stages')
  .option('--deploy-pre-apply', 'Deploy the pre-apply CloudFormation stack')
  .option('--generate-key', 'Generate a new IAM access key for the deployer user')
  .option('--update-secrets', 'Publish the AWS credential as GitHub Actions secrets')
  .addOption(new Option('--gh-token <token>', 'GitHub token with access to repository secrets').env('GH_SECRET_TOKEN'))
  .option('--repo-owner <owner>', 'GitHub repository owner')
  .option('--repo-name <name>', 'GitHub repository name')
  .option('--profile <profile>', 'AWS CLI profile')
  .option('--region <region>', 'AWS region')
  .option('--iam-user <name>', 'IAM user whose access key is generated')
  .option('--template <path>', 'CloudFormation template of the pre-apply stack')
  .option('--stack-name <name>', 'Name of the pre-apply stack')
  .option('--access-key-id <id>', 'Existing access key id to publish instead of generating one')
  .option('--secret-access-key <secret>', 'Secret of the existing access key')
  .option('--prune-keys', 'Delete the oldest access keys when the user is at its key limit')
  .option('--timeout <ms>', 'Timeout of each remote request in milliseconds', parsePositiveInteger)
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--dry-run', 'Show what would run without calling AWS or GitHub')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: RunCommandOptions) => {
    const spinner = ora('Preparing provisioning run...').start();

    try {
      const credential = buildCredential(options);
      const config = await loadRunConfig(options);
      const orchestrator = createPipelineOrchestrator(config, createSpinnerLogger(spinner, { verbose: options.verbose }));

      const result = await orchestrator.run(buildIntents(options), { credential, dryRun: options.dryRun });

      if (result.success) {
        spinner.succeed(options.dryRun ? 'Dry run completed - nothing was changed' : 'Provisioning completed successfully!');
        if (options.dryRun) {
          console.log(chalk.blue('\n📋 Resolved configuration:'));
          console.log(JSON.stringify(describeConfig(config), null, 2));
        }
        printSummary(result);
        return;
      }

      spinner.fail('Provisioning failed');
      printFailure(result);
      process.exit(exitCodeFor(result));
    } catch (error) {
      spinner.fail('Provisioning failed');
      if (isProvisioningError(error)) {
        console.error(chalk.red(`\n❌ ${error.code}: ${error.message}`));
        console.error(chalk.yellow(`💡 ${remediationFor(error.code)}`));
        process.exit(EXIT_USAGE);
      }
      console.error(chalk.red('❌ Error:'), describeError(error).message);
      if (options.verbose) {
        console.error(error);
      }
      process.exit(EXIT_FAILURE);
    }
  });

program
  .command('init')
  .description('Write a starter configuration file and pre-apply template')
  .option('-c, --config <path>', 'Output configuration file path', 'provisioner.yml')
  .option('--template <path>', 'Output template path')
  .option('--region <region>', 'AWS region')
  .option('--iam-user <name>', 'IAM user for CI deployments')
  .option('--stack-name <name>', 'Name of the pre-apply stack')
  .option('--repo-owner <owner>', 'GitHub repository owner')
  .option('--repo-name <name>', 'GitHub repository name')
  .option('-f, --force', 'Overwrite existing files')
  .action(async (options: RunCommandOptions & { config: string; force?: boolean }) => {
    const spinner = ora('Initializing provisioner configuration...').start();

    try {
      const { github, ...overrides } = buildOverrides(options);
      const config = validateAndNormalizeConfig({ ...overrides, github: { ...github, token: undefined } });
      const templatePath = config.stack.template;

      for (const path of [options.config, templatePath]) {
        if (existsSync(path) && !options.force) {
          throw new Error(`${path} already exists; use --force to overwrite it`);
        }
      }

      writeFileSync(options.config, renderConfigFile(config));
      mkdirSync(dirname(templatePath), { recursive: true });
      writeFileSync(templatePath, serializeTemplate(generateBaselineTemplate(config), templateFormatFor(templatePath)));

      spinner.succeed(`Configuration file created: ${options.config}`);
      console.log(chalk.green(`✅ Template created: ${templatePath}`));
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review and customize the configuration file and template');
      console.log('2. Ensure your AWS credentials are configured');
      console.log('3. Export GH_SECRET_TOKEN with a token that can write repository secrets');
      console.log(`4. Run: ${chalk.cyan('secret-provisioner --deploy-pre-apply --generate-key --update-secrets')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red('❌ Error:'), describeError(error).message);
      process.exit(EXIT_FAILURE);
    }
  });

async function loadRunConfig(options: RunCommandOptions): Promise<ProvisionerConfig> {
  try {
    return await loadConfig({ path: options.config, overrides: buildOverrides(options) });
  } catch (error) {
    throw new ProvisioningError('InvalidConfiguration', describeError(error).message, { stage: 'plan', cause: error });
  }
}

function printSummary(result: PipelineResult): void {
  console.log(chalk.green('\n✅ Stages:'));
  result.stages.forEach(report => {
    console.log(`  ${report.stage}: ${report.status}${report.detail ? ` (${report.detail})` : ''}`);
  });

  if (result.deployment) {
    console.log(`🏗️  Stack ${result.deployment.stackName}: ${result.deployment.outcome}`);
  }
  if (result.issuedAccessKeyId) {
    console.log(`🔑 Access key: ${maskIdentifier(result.issuedAccessKeyId)}`);
  }
  if (result.published.length > 0) {
    console.log(`🔒 Secrets published: ${result.published.join(', ')}`);
  }

  console.log(chalk.gray(`\n⏱️  Run took ${result.metadata.duration}ms`));
  console.log(chalk.gray(`🆔 Run ID: ${result.metadata.runId}`));
}

function printFailure(result: PipelineResult): void {
  const report = formatFailure(result);
  if (!report) {
    return;
  }

  console.error(chalk.red(`\n❌ ${report.headline}`));
  if (report.details) {
    console.error(chalk.gray(`Response: ${report.details}`));
  }
  console.error(chalk.yellow(`💡 ${report.remediation}`));
  report.notes.forEach(note => console.error(chalk.gray(note)));
}

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(EXIT_USAGE);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('❌ Error:'), describeError(error).message);
  process.exit(EXIT_FAILURE);
});
