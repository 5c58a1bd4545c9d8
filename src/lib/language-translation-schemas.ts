import { z } from 'zod';
import type {
  IdentifiableLanguage,
  IdentifiedLanguage,
  TranslationModel,
  TranslationResult,
} from './language-translation-types.js';
import type { Schema } from './response-converter.js';

// Wire records are snake_case; optional members may also arrive as null.

export const translationModelSchema: Schema<TranslationModel> = z
  .object({
    model_id: z.string(),
    name: z.string().nullish(),
    source: z.string().nullish(),
    target: z.string().nullish(),
    base_model_id: z.string().nullish(),
    domain: z.string().nullish(),
    customizable: z.boolean().nullish(),
    default_model: z.boolean().nullish(),
    owner: z.string().nullish(),
    status: z.string().nullish(),
  })
  .transform(
    (raw): TranslationModel => ({
      modelId: raw.model_id,
      ...(raw.name ? { name: raw.name } : {}),
      ...(raw.source ? { source: raw.source } : {}),
      ...(raw.target ? { target: raw.target } : {}),
      ...(raw.base_model_id ? { baseModelId: raw.base_model_id } : {}),
      ...(raw.domain ? { domain: raw.domain } : {}),
      ...(typeof raw.customizable === 'boolean' ? { customizable: raw.customizable } : {}),
      ...(typeof raw.default_model === 'boolean' ? { defaultModel: raw.default_model } : {}),
      ...(raw.owner ? { owner: raw.owner } : {}),
      ...(raw.status ? { status: raw.status } : {}),
    }),
  );

export const identifiableLanguageSchema: Schema<IdentifiableLanguage> = z.object({
  language: z.string(),
  name: z.string(),
});

export const identifiedLanguageSchema: Schema<IdentifiedLanguage> = z.object({
  language: z.string(),
  confidence: z.number(),
});

export const translationResultSchema: Schema<TranslationResult> = z
  .object({
    word_count: z.number().int().nonnegative(),
    character_count: z.number().int().nonnegative(),
    translations: z.array(z.object({ translation: z.string() })),
  })
  .transform(
    (raw): TranslationResult => ({
      wordCount: raw.word_count,
      characterCount: raw.character_count,
      translations: raw.translations,
    }),
  );
