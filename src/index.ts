#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runDoctorCheck } from './lib/doctor.js';
import { getEnvironmentConfig } from './lib/env-config.js';
import { getErrorMessage, isRelayError } from './lib/errors.js';
import { languageIndicator } from './lib/language.js';
import { logError, logKeyValue, logSection } from './lib/logger-extended.js';
import { createRelayServices } from './lib/services.js';
import { startServer } from './server/index.js';
import type { TranslationResult } from './types/index.js';

type TranslateOptions = {
  languages?: string[];
  author?: string;
  json: boolean;
};

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function parseLanguageList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

const program = new Command();

program
  .name('polyglot-relay')
  .description('Translate chat messages into several languages at once')
  .version('1.0.0');

program
  .command('serve', { isDefault: true })
  .description('Start the HTTP server (direct API and chat webhook)')
  .option('-p, --port <number>', 'Port to listen on (defaults to PORT)', parsePort)
  .action((options: { port?: number }) => {
    const config = getEnvironmentConfig();
    startServer(config, options.port ?? config.port);
  });

program
  .command('translate')
  .description('Translate a single message and print the result')
  .argument('<text>', 'Message to translate')
  .option('-l, --languages <codes>', 'Comma separated target languages', parseLanguageList)
  .option('-a, --author <name>', 'Author shown in the result')
  .option('--json', 'Output as JSON', false)
  .action(async (text: string, options: TranslateOptions) => {
    await translateCommand(text, options);
  });

program
  .command('doctor')
  .description('Check whether the environment is ready to relay translations')
  .action(() => {
    if (!runDoctorCheck(getEnvironmentConfig())) {
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);

async function translateCommand(text: string, options: TranslateOptions): Promise<void> {
  const { translator } = createRelayServices(getEnvironmentConfig());
  const spinner = options.json ? null : ora('Translating...').start();

  try {
    const result = await translator.translate({
      author: options.author,
      text,
      languages: options.languages,
    });
    spinner?.succeed('Translated');

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printTranslation(result);
    }
  } catch (error) {
    spinner?.fail('Translation failed');
    const code = isRelayError(error) ? ` (${error.code})` : '';
    logError(`Could not translate message${code}`, getErrorMessage(error));
    process.exitCode = 1;
  }
}

function printTranslation(result: TranslationResult): void {
  logSection('Translation', '🌐');
  logKeyValue('Author', result.author);
  logKeyValue('Detected', result.detectedLanguage);
  logKeyValue('Original', result.originalText);
  console.log();

  for (const [code, translated] of Object.entries(result.translations)) {
    const value = translated || chalk.gray('(no translation returned)');
    console.log(`  ${chalk.cyan(languageIndicator(code))} ${value}`);
  }
}
