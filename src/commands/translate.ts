import type { Command } from 'commander';
import { formatIdentifiableLanguage, formatIdentifiedLanguage } from '../cli/format.js';
import type { CliContext } from '../cli/shared.js';
import { isLanguage, type Language } from '../lib/language-translation-types.js';

function parseLanguage(ctx: CliContext, flag: string, value: string): Language {
  const code = value.trim().toLowerCase();
  if (!isLanguage(code)) {
    return ctx.fail(`Unsupported language for ${flag}: "${value}"`);
  }
  return code;
}

export function registerTranslateCommands(program: Command, ctx: CliContext): void {
  program
    .command('identify')
    .description('Identify the language a text is written in')
    .argument('<text>', 'Text to identify')
    .option('--json', 'Output as JSON')
    .action(async (text: string, cmdOpts: { json?: boolean }) => {
      const service = ctx.languageTranslation();
      try {
        const languages = await service.identify(text).execute();
        if (cmdOpts.json) {
          ctx.printJson(languages);
          return;
        }
        if (languages.length === 0) {
          console.error(`${ctx.p('info')}No language identified.`);
          return;
        }
        for (const language of languages) {
          console.log(formatIdentifiedLanguage(language));
        }
      } catch (error) {
        ctx.fail('Failed to identify language', error);
      }
    });

  program
    .command('translate')
    .description('Translate text with a model or a source/target language pair')
    .argument('<text>', 'Text to translate')
    .option('--model <id>', 'Model to translate with (takes precedence over --from/--to)')
    .option('--from <lang>', 'Source language code')
    .option('--to <lang>', 'Target language code')
    .option('--json', 'Output as JSON')
    .action(async (text: string, cmdOpts: { model?: string; from?: string; to?: string; json?: boolean }) => {
      if (!cmdOpts.model && !(cmdOpts.from && cmdOpts.to)) {
        ctx.fail('Specify --model, or both --from and --to');
      }

      const pair =
        cmdOpts.model === undefined
          ? ([parseLanguage(ctx, '--from', cmdOpts.from ?? ''), parseLanguage(ctx, '--to', cmdOpts.to ?? '')] as const)
          : undefined;

      const service = ctx.languageTranslation();
      try {
        const call = pair ? service.translate(text, pair[0], pair[1]) : service.translate(text, cmdOpts.model ?? '');
        const result = await call.execute();
        if (cmdOpts.json) {
          ctx.printJson(result);
          return;
        }
        for (const { translation } of result.translations) {
          console.log(translation);
        }
      } catch (error) {
        ctx.fail('Failed to translate', error);
      }
    });

  program
    .command('languages')
    .description('List the languages the service can identify')
    .option('--json', 'Output as JSON')
    .action(async (cmdOpts: { json?: boolean }) => {
      const service = ctx.languageTranslation();
      try {
        const languages = await service.getIdentifiableLanguages().execute();
        if (cmdOpts.json) {
          ctx.printJson(languages);
          return;
        }
        for (const language of languages) {
          console.log(formatIdentifiableLanguage(language));
        }
      } catch (error) {
        ctx.fail('Failed to list identifiable languages', error);
      }
    });
}
