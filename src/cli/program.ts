import { Command } from 'commander';
import { registerModelCommands } from '../commands/models.js';
import { registerSpeechCommands } from '../commands/speech.js';
import { registerTranslateCommands } from '../commands/translate.js';
import { VERSION } from '../lib/constants.js';
import { createCliContext, type GlobalOptions } from './shared.js';

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('nlcloud')
    .description('Translate, identify languages and synthesize speech with cloud language services')
    .version(VERSION)
    .option('--url <url>', 'Service endpoint (defaults to the public endpoint of each service)')
    .option('--username <username>', 'Service username')
    .option('--password <password>', 'Service password')
    .option('--timeout <ms>', 'Request timeout in milliseconds (0 disables)')
    .option('--plain', 'Plain text prefixes instead of emoji');

  const ctx = createCliContext({ env, getOptions: () => program.opts<GlobalOptions>() });

  registerTranslateCommands(program, ctx);
  registerModelCommands(program, ctx);
  registerSpeechCommands(program, ctx);

  return program;
}
