import { LANGUAGE_TRANSLATION_URL } from './constants.js';
import { withModels } from './language-translation-models.js';
import { withTranslate } from './language-translation-translate.js';
import { ServiceBase, type ServiceOptions } from './service-base.js';

export const LANGUAGE_TRANSLATION_SERVICE_NAME = 'language_translation';

export type LanguageTranslationOptions = ServiceOptions;

const LanguageTranslationMixins = withTranslate(withModels(ServiceBase));

/**
 * Client for the Language Translation service (API v2): translate text,
 * identify languages, and manage custom translation models.
 *
 * @example
 * ```ts
 * const service = new LanguageTranslation({ username: 'user', password: 'secret' });
 * const result = await service.translate('hello', 'en', 'es').execute();
 * console.log(firstTranslation(result));
 * ```
 */
export class LanguageTranslation extends LanguageTranslationMixins {
  constructor(options: LanguageTranslationOptions = {}) {
    super(LANGUAGE_TRANSLATION_SERVICE_NAME, LANGUAGE_TRANSLATION_URL, options);
  }
}
