#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { loadConfig, VERSION } from './config';
import { createEntity, EntityOptions } from './commands/bootstrap';
import { runTalk } from './commands/talk';
import { runIAm, runWhoAmI } from './commands/iAm';
import { runSelfCheck } from './commands/selfCheck';
import { startShell } from './cli/shell';
import { normalizeLanguageHint } from './dialogue/languageDetector';
import { ConfigurationError, dbg, setDebug } from './utils';

const GENERAL_ERROR = 1;
const CONFIGURATION_ERROR = 2;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

interface GlobalOptions {
  graphFile?: string;
  templatesConfig?: string;
  debug?: boolean;
}

interface TalkCommandOptions {
  language?: string;
  json?: boolean;
}

interface ReportCommandOptions {
  json?: boolean;
  claims?: boolean;
}

// Load environment variables from .env file
dotenv.config();
const config = loadConfig();
setDebug(config.debug);

function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? CONFIGURATION_ERROR : GENERAL_ERROR;
}

async function main() {
  const program = new Command();

  // --- Global Options ---
  program
    .name('entity')
    .version(VERSION)
    .description('Epistemic dialogue entity: bilingual templated replies and an honest self-report')
    .option('--graph-file <path>', 'JSON file with the semantic graph whose size the entity reports', config.graphFilePath)
    .option('--templates-config <path>', 'JSON file overriding reply templates', config.templatesConfigPath)
    .option('--debug', 'Print diagnostic output', config.debug);

  program.hook('preAction', () => {
    setDebug(Boolean(program.opts<GlobalOptions>().debug));
  });

  function entityOptions(): EntityOptions {
    const globalOpts = program.opts<GlobalOptions>();
    return { graphFile: globalOpts.graphFile, templatesConfig: globalOpts.templatesConfig };
  }

  // --- Define Commands ---

  program
    .command('talk')
    .description('Say something to the entity and print its reply')
    .argument('<input...>', 'The text to say')
    .option('-l, --language <language>', 'Reply language: auto, ru or en', config.defaultLanguage)
    .option('--json', 'Print the structured response')
    .action(async (inputParts: string[], options: TalkCommandOptions) => {
      const inputText = inputParts.join(' ');
      try {
        const entity = await createEntity(entityOptions());
        dbg(`Talking with language hint "${options.language}": "${inputText}"`);
        runTalk(entity, inputText, options.language ?? config.defaultLanguage, { json: options.json });
      } catch (error) {
        console.error(`Talk command failed: ${error}`);
        process.exit(exitCodeFor(error));
      }
    });

  program
    .command('i-am')
    .description('Print the self-report: observed, inferred, untestable, affirmations, negations')
    .option('--json', 'Print the structured report')
    .option('--claims', 'Also list the report as epistemic claims')
    .action(async (options: ReportCommandOptions) => {
      try {
        const entity = await createEntity(entityOptions());
        runIAm(entity, options);
      } catch (error) {
        console.error(`i-am command failed: ${error}`);
        process.exit(exitCodeFor(error));
      }
    });

  program
    .command('who-am-i')
    .description('Print the identity report built from operational patterns')
    .option('--json', 'Print the structured report')
    .action(async (options: ReportCommandOptions) => {
      try {
        const entity = await createEntity(entityOptions());
        runWhoAmI(entity, options);
      } catch (error) {
        console.error(`who-am-i command failed: ${error}`);
        process.exit(exitCodeFor(error));
      }
    });

  program
    .command('shell')
    .description('Start an interactive dialogue')
    .option('-l, --language <language>', 'Initial reply language: auto, ru or en', config.defaultLanguage)
    .action(async (options: TalkCommandOptions) => {
      try {
        const entity = await createEntity(entityOptions());
        await startShell(entity, normalizeLanguageHint(options.language));
      } catch (error) {
        console.error(`Shell failed: ${error}`);
        process.exit(exitCodeFor(error));
      }
    });

  program
    .command('self-check')
    .description('Verify templates and the self-report contract')
    .action(() => {
      if (!runSelfCheck(program.opts<GlobalOptions>().templatesConfig)) {
        process.exit(CONFIGURATION_ERROR);
      }
    });

  // --- Parse and Execute ---
  try {
    if (process.argv.length <= 2) {
      program.help();
    }
    await program.parseAsync(process.argv);
  } catch (error) {
    dbg(`Error during command parsing or execution: ${error}`);
    process.exit(COMMAND_PARSING_ERROR);
  }
}

main().catch(error => {
  console.error(`Unhandled application error: ${error}`);
  process.exit(UNHANDLED_ERROR);
});
