import { HttpMediaType } from './constants.js';
import { translationModelSchema } from './language-translation-schemas.js';
import type { CreateModelOptions, GetModelsOptions, ModelFile, TranslationModel } from './language-translation-types.js';
import { type FormFilePart, RequestBuilder } from './request-builder.js';
import { ResponseConverters } from './response-converter.js';
import type { AbstractConstructor, Mixin, ServiceBase } from './service-base.js';
import type { ServiceCall } from './service-call.js';
import { notEmpty, notNull } from './validator.js';

const PATH_MODELS = '/v2/models';

const modelPath = (modelId: string) => `${PATH_MODELS}/${encodeURIComponent(modelId)}`;

export interface LanguageTranslationModelMethods {
  createModel(options: CreateModelOptions): ServiceCall<TranslationModel>;
  deleteModel(modelId: string): ServiceCall<void>;
  getModel(modelId: string): ServiceCall<TranslationModel>;
  getModels(options?: GetModelsOptions): ServiceCall<TranslationModel[]>;
  getModels(showDefault?: boolean, source?: string, target?: string): ServiceCall<TranslationModel[]>;
}

export function withModels<TBase extends AbstractConstructor<ServiceBase>>(
  Base: TBase,
): Mixin<TBase, LanguageTranslationModelMethods> {
  abstract class LanguageTranslationModels extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Trains a custom model on top of `baseModelId` from any of the supplied
     * glossary and corpus files. Only the files given are uploaded.
     */
    createModel(options: CreateModelOptions): ServiceCall<TranslationModel> {
      notNull(options, 'options cannot be null');
      notEmpty(options.baseModelId, 'options.baseModelId cannot be null or empty');

      const parts: FormFilePart[] = [];
      const addPart = (name: string, file: ModelFile | undefined) => {
        if (file) {
          parts.push({ name, filename: file.filename, data: file.data, contentType: HttpMediaType.BINARY_FILE });
        }
      };
      addPart('forced_glossary', options.forcedGlossary);
      addPart('monolingual_corpus', options.monolingualCorpus);
      addPart('parallel_corpus', options.parallelCorpus);

      const request = RequestBuilder.post(PATH_MODELS)
        .withQuery('base_model_id', options.baseModelId)
        .withQuery('name', options.name || undefined)
        .withForm(parts)
        .build();

      return this.createServiceCall(request, ResponseConverters.object(translationModelSchema));
    }

    /**
     * Deletes a custom model. Resolves with no value.
     */
    deleteModel(modelId: string): ServiceCall<void> {
      notEmpty(modelId, 'modelId cannot be null or empty');
      const request = RequestBuilder.delete(modelPath(modelId)).build();
      return this.createServiceCall(request, ResponseConverters.void());
    }

    getModel(modelId: string): ServiceCall<TranslationModel> {
      notEmpty(modelId, 'modelId cannot be null or empty');
      const request = RequestBuilder.get(modelPath(modelId)).build();
      return this.createServiceCall(request, ResponseConverters.object(translationModelSchema));
    }

    /**
     * Lists models, optionally filtered by default flag and language pair.
     * Empty filters are left off the query.
     */
    getModels(
      optionsOrShowDefault?: GetModelsOptions | boolean,
      source?: string,
      target?: string,
    ): ServiceCall<TranslationModel[]> {
      const filters: GetModelsOptions =
        typeof optionsOrShowDefault === 'object' && optionsOrShowDefault !== null
          ? optionsOrShowDefault
          : { showDefault: optionsOrShowDefault, source, target };

      const request = RequestBuilder.get(PATH_MODELS)
        .withQuery('source', filters.source || undefined)
        .withQuery('target', filters.target || undefined)
        .withQuery('default', filters.showDefault)
        .build();

      return this.createServiceCall(request, ResponseConverters.list('models', translationModelSchema));
    }
  }

  return LanguageTranslationModels;
}
