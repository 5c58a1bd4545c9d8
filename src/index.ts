export { HttpMediaType, LANGUAGE_TRANSLATION_URL, TEXT_TO_SPEECH_URL, VERSION } from './lib/constants.js';
export {
  BadRequestError,
  ConflictError,
  createServiceResponseError,
  DeserializationError,
  ForbiddenError,
  InternalServerError,
  NlcloudError,
  NotFoundError,
  RequestTooLargeError,
  ServiceResponseError,
  ServiceUnavailableError,
  TooManyRequestsError,
  UnauthorizedError,
  UnsupportedMediaTypeError,
  ValidationError,
} from './lib/errors.js';
export { LanguageTranslation, type LanguageTranslationOptions } from './lib/language-translation.js';
export type { LanguageTranslationModelMethods } from './lib/language-translation-models.js';
export type { LanguageTranslationTranslateMethods } from './lib/language-translation-translate.js';
export {
  type CreateModelOptions,
  firstTranslation,
  type GetModelsOptions,
  type IdentifiableLanguage,
  type IdentifiedLanguage,
  isLanguage,
  LANGUAGES,
  type Language,
  type ModelFile,
  type TranslateOptions,
  type Translation,
  type TranslationModel,
  type TranslationResult,
} from './lib/language-translation-types.js';
export { RequestBuilder, type ServiceRequest } from './lib/request-builder.js';
export { convertResponse, type ResponseConverter, ResponseConverters } from './lib/response-converter.js';
export { ServiceBase, type ServiceOptions } from './lib/service-base.js';
export { ServiceCall, type ServiceCallback } from './lib/service-call.js';
export { TextToSpeech, type TextToSpeechOptions } from './lib/text-to-speech.js';
export {
  AUDIO_FORMAT_MEDIA_TYPES,
  AUDIO_FORMATS,
  type AudioFormat,
  audioFormatMediaType,
  parseAudioFormat,
  type SynthesizeOptions,
  type Voice,
} from './lib/text-to-speech-types.js';
