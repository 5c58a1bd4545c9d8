/**
 * Language codes the translation service accepts as a source or target.
 */
export const LANGUAGES = ['ar', 'en', 'es', 'fr', 'it', 'pt'] as const;

export type Language = (typeof LANGUAGES)[number];

export function isLanguage(value: string): value is Language {
  const known: readonly string[] = LANGUAGES;
  return known.includes(value);
}

/**
 * A translation pipeline configured on the service, either a stock model or a
 * custom one trained from uploaded files.
 */
export interface TranslationModel {
  readonly modelId: string;
  readonly name?: string;
  readonly source?: string;
  readonly target?: string;
  readonly baseModelId?: string;
  readonly domain?: string;
  readonly customizable?: boolean;
  readonly defaultModel?: boolean;
  readonly owner?: string;
  /** e.g. "available", "training", "error" */
  readonly status?: string;
}

export interface IdentifiableLanguage {
  readonly language: string;
  readonly name: string;
}

export interface IdentifiedLanguage {
  readonly language: string;
  /** 0 to 1 */
  readonly confidence: number;
}

export interface Translation {
  readonly translation: string;
}

export interface TranslationResult {
  readonly wordCount: number;
  readonly characterCount: number;
  readonly translations: readonly Translation[];
}

/**
 * One training file for {@link CreateModelOptions}.
 */
export interface ModelFile {
  filename: string;
  data: Uint8Array | Blob;
}

export interface CreateModelOptions {
  /** Model to customize, e.g. "en-es" */
  baseModelId: string;
  /** Name for the new model */
  name?: string;
  forcedGlossary?: ModelFile;
  monolingualCorpus?: ModelFile;
  parallelCorpus?: ModelFile;
}

export interface TranslateOptions {
  text: string;
  /** Used instead of `source`/`target` when set */
  modelId?: string;
  source?: Language;
  target?: Language;
}

export interface GetModelsOptions {
  /** Only default models (`true`) or only non-default ones (`false`) */
  showDefault?: boolean;
  source?: string;
  target?: string;
}

export function firstTranslation(result: TranslationResult): string | undefined {
  return result.translations[0]?.translation;
}
