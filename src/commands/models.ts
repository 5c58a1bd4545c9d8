import type { Command } from 'commander';
import { formatModel } from '../cli/format.js';
import type { CliContext } from '../cli/shared.js';
import type { CreateModelOptions } from '../lib/language-translation-types.js';

interface CreateModelCommandOptions {
  base: string;
  name?: string;
  forcedGlossary?: string;
  monolingualCorpus?: string;
  parallelCorpus?: string;
  json?: boolean;
}

export function registerModelCommands(program: Command, ctx: CliContext): void {
  program
    .command('models')
    .description('List translation models')
    .option('--default', 'Only default models')
    .option('--no-default', 'Only custom (non-default) models')
    .option('--source <lang>', 'Filter by source language')
    .option('--target <lang>', 'Filter by target language')
    .option('--json', 'Output as JSON')
    .action(async (cmdOpts: { default?: boolean; source?: string; target?: string; json?: boolean }) => {
      const service = ctx.languageTranslation();
      try {
        const models = await service
          .getModels({ showDefault: cmdOpts.default, source: cmdOpts.source, target: cmdOpts.target })
          .execute();
        if (cmdOpts.json) {
          ctx.printJson(models);
          return;
        }
        if (models.length === 0) {
          console.error(`${ctx.p('info')}No models found.`);
          return;
        }
        for (const model of models) {
          console.log(formatModel(model));
        }
      } catch (error) {
        ctx.fail('Failed to list models', error);
      }
    });

  program
    .command('model')
    .description('Show one translation model')
    .argument('<model-id>', 'Model identifier')
    .option('--json', 'Output as JSON')
    .action(async (modelId: string, cmdOpts: { json?: boolean }) => {
      const service = ctx.languageTranslation();
      try {
        const model = await service.getModel(modelId).execute();
        if (cmdOpts.json) {
          ctx.printJson(model);
        } else {
          console.log(formatModel(model));
        }
      } catch (error) {
        ctx.fail(`Failed to fetch model ${modelId}`, error);
      }
    });

  program
    .command('create-model')
    .description('Create a custom model from glossary and corpus files')
    .requiredOption('--base <model-id>', 'Base model to customize')
    .option('--name <name>', 'Name of the new model')
    .option('--forced-glossary <path>', 'TMX file with terms the model must use')
    .option('--monolingual-corpus <path>', 'Plain text in the target language')
    .option('--parallel-corpus <path>', 'TMX file with aligned source/target sentences')
    .option('--json', 'Output as JSON')
    .action(async (cmdOpts: CreateModelCommandOptions) => {
      if (!cmdOpts.forcedGlossary && !cmdOpts.monolingualCorpus && !cmdOpts.parallelCorpus) {
        console.error(`${ctx.p('warn')}No training files given; the model will match its base.`);
      }

      const service = ctx.languageTranslation();
      try {
        const options: CreateModelOptions = { baseModelId: cmdOpts.base, name: cmdOpts.name };
        if (cmdOpts.forcedGlossary) {
          options.forcedGlossary = await ctx.readModelFile(cmdOpts.forcedGlossary);
        }
        if (cmdOpts.monolingualCorpus) {
          options.monolingualCorpus = await ctx.readModelFile(cmdOpts.monolingualCorpus);
        }
        if (cmdOpts.parallelCorpus) {
          options.parallelCorpus = await ctx.readModelFile(cmdOpts.parallelCorpus);
        }

        const model = await service.createModel(options).execute();
        if (cmdOpts.json) {
          ctx.printJson(model);
        } else {
          console.log(`${ctx.p('ok')}Created model ${formatModel(model)}`);
        }
      } catch (error) {
        ctx.fail('Failed to create model', error);
      }
    });

  program
    .command('delete-model')
    .description('Delete a custom translation model')
    .argument('<model-id>', 'Model identifier')
    .action(async (modelId: string) => {
      const service = ctx.languageTranslation();
      try {
        await service.deleteModel(modelId).execute();
        console.log(`${ctx.p('ok')}Deleted model ${modelId}`);
      } catch (error) {
        ctx.fail(`Failed to delete model ${modelId}`, error);
      }
    });
}
