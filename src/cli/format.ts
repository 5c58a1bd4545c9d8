import type { IdentifiableLanguage, IdentifiedLanguage, TranslationModel } from '../lib/language-translation-types.js';
import type { Voice } from '../lib/text-to-speech-types.js';

export function formatIdentifiedLanguage(language: IdentifiedLanguage): string {
  return `${language.language}\t${language.confidence.toFixed(4)}`;
}

export function formatIdentifiableLanguage(language: IdentifiableLanguage): string {
  return `${language.language}\t${language.name}`;
}

/**
 * One-line summary, e.g. `en-es  en -> es  "News"  [available]  default`.
 */
export function formatModel(model: TranslationModel): string {
  const parts = [model.modelId, `${model.source ?? '?'} -> ${model.target ?? '?'}`];
  if (model.name) {
    parts.push(`"${model.name}"`);
  }
  if (model.status) {
    parts.push(`[${model.status}]`);
  }
  if (model.defaultModel) {
    parts.push('default');
  }
  return parts.join('  ');
}

export function formatVoice(voice: Voice): string {
  return [voice.name, voice.language, voice.gender].join('\t');
}
