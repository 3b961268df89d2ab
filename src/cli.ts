#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CliCommand, parseCliArgs, USAGE } from './cli/cli-args';
import { CliModule } from './cli/cli.module';
import { ConfigurationError, errorMessage, errorStack, MarketplaceAuthError } from './common/errors';
import { MarketplaceVerificationService } from './marketplace/marketplace-verification.service';
import { StageRunnerService } from './tasks/stage-runner.service';

const logger = new Logger('Cli');

async function execute(command: Exclude<CliCommand, { kind: 'help' }>): Promise<void> {
  const levels: LogLevel[] = command.verbose ? ['error', 'warn', 'log', 'debug', 'verbose'] : ['error', 'warn', 'log'];
  const app = await NestFactory.createApplicationContext(CliModule, { logger: levels });
  try {
    if (command.kind === 'verify-marketplace') {
      const user = await app.get(MarketplaceVerificationService).verify(command.sandbox);
      console.log(`Marketplace account ${user.id} (${user.nickname})${command.sandbox ? ' [sandbox]' : ''}`);
      return;
    }

    const summary = await app.get(StageRunnerService).run(command.stage, command.options);
    const { labels } = summary;
    console.log(
      `${summary.dryRun ? '[DRY RUN] ' : ''}${summary.stage}: ${labels.succeeded}=${summary.succeeded} ` +
        `${labels.skipped}=${summary.skipped} ${labels.failed}=${summary.failed}`,
    );
  } finally {
    await app.close();
  }
}

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  try {
    await execute(command);
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof MarketplaceAuthError) {
      logger.error(error.message);
    } else {
      logger.error(`Run aborted: ${errorMessage(error)}`, errorStack(error));
    }
    return 1;
  }
}

main().then((code) => process.exit(code));
