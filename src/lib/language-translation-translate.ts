import { HttpHeaders, HttpMediaType } from './constants.js';
import {
  identifiableLanguageSchema,
  identifiedLanguageSchema,
  translationResultSchema,
} from './language-translation-schemas.js';
import type {
  IdentifiableLanguage,
  IdentifiedLanguage,
  Language,
  TranslateOptions,
  TranslationResult,
} from './language-translation-types.js';
import { RequestBuilder } from './request-builder.js';
import { ResponseConverters } from './response-converter.js';
import type { AbstractConstructor, Mixin, ServiceBase } from './service-base.js';
import type { ServiceCall } from './service-call.js';
import { notEmpty, notNull } from './validator.js';

const PATH_IDENTIFY = '/v2/identify';
const PATH_TRANSLATE = '/v2/translate';
const PATH_IDENTIFIABLE_LANGUAGES = '/v2/identifiable_languages';

export interface LanguageTranslationTranslateMethods {
  identify(text: string): ServiceCall<IdentifiedLanguage[]>;
  getIdentifiableLanguages(): ServiceCall<IdentifiableLanguage[]>;
  translate(text: string, modelId: string): ServiceCall<TranslationResult>;
  translate(text: string, source: Language, target: Language): ServiceCall<TranslationResult>;
  translate(options: TranslateOptions): ServiceCall<TranslationResult>;
}

export function withTranslate<TBase extends AbstractConstructor<ServiceBase>>(
  Base: TBase,
): Mixin<TBase, LanguageTranslationTranslateMethods> {
  abstract class LanguageTranslationTranslate extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Identify the language a text is written in. Results come back ordered
     * by the service, most likely language first.
     */
    identify(text: string): ServiceCall<IdentifiedLanguage[]> {
      notEmpty(text, 'text cannot be null or empty');

      const request = RequestBuilder.post(PATH_IDENTIFY)
        .withHeader(HttpHeaders.ACCEPT, HttpMediaType.APPLICATION_JSON)
        .withBodyContent(text, HttpMediaType.TEXT_PLAIN)
        .build();

      return this.createServiceCall(request, ResponseConverters.list('languages', identifiedLanguageSchema));
    }

    getIdentifiableLanguages(): ServiceCall<IdentifiableLanguage[]> {
      const request = RequestBuilder.get(PATH_IDENTIFIABLE_LANGUAGES).build();
      return this.createServiceCall(request, ResponseConverters.list('languages', identifiableLanguageSchema));
    }

    /**
     * Translate text with a model (`translate(text, 'en-es')`), with a
     * language pair (`translate(text, 'en', 'es')`), or from an options
     * object. A model id wins over a language pair; only one is sent.
     */
    translate(
      textOrOptions: string | TranslateOptions,
      modelIdOrSource?: string,
      target?: Language,
    ): ServiceCall<TranslationResult> {
      if (typeof textOrOptions !== 'string') {
        notNull(textOrOptions, 'options cannot be null');
        const { text, modelId, source, target: optionsTarget } = textOrOptions;
        return this.translateRequest(text, modelId, source, optionsTarget);
      }

      notEmpty(textOrOptions, 'text cannot be null or empty');
      if (target === undefined) {
        notEmpty(modelIdOrSource, 'modelId cannot be null or empty');
        return this.translateRequest(textOrOptions, modelIdOrSource);
      }
      return this.translateRequest(textOrOptions, undefined, modelIdOrSource, target);
    }

    private translateRequest(
      text: string,
      modelId?: string,
      source?: string,
      target?: string,
    ): ServiceCall<TranslationResult> {
      notEmpty(text, 'text cannot be null or empty');

      let selector: { model_id: string } | { source: string; target: string };
      if (modelId) {
        selector = { model_id: modelId };
      } else {
        notEmpty(source, 'source cannot be null or empty when no modelId is given');
        notEmpty(target, 'target cannot be null or empty when no modelId is given');
        selector = { source, target };
      }

      const request = RequestBuilder.post(PATH_TRANSLATE)
        .withHeader(HttpHeaders.ACCEPT, HttpMediaType.APPLICATION_JSON)
        .withBodyJson({ text: [text], ...selector })
        .build();

      return this.createServiceCall(request, ResponseConverters.object(translationResultSchema));
    }
  }

  return LanguageTranslationTranslate;
}
