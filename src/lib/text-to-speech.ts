import { z } from 'zod';
import { HttpHeaders, TEXT_TO_SPEECH_URL } from './constants.js';
import { RequestBuilder } from './request-builder.js';
import { ResponseConverters, type Schema } from './response-converter.js';
import { ServiceBase, type ServiceOptions } from './service-base.js';
import type { ServiceCall } from './service-call.js';
import { audioFormatMediaType, type SynthesizeOptions, type Voice } from './text-to-speech-types.js';
import { notEmpty } from './validator.js';

export const TEXT_TO_SPEECH_SERVICE_NAME = 'text_to_speech';

const PATH_VOICES = '/v1/voices';
const PATH_SYNTHESIZE = '/v1/synthesize';

export const voiceSchema: Schema<Voice> = z
  .object({
    name: z.string(),
    language: z.string(),
    gender: z.string(),
    url: z.string().nullish(),
    description: z.string().nullish(),
    customizable: z.boolean().nullish(),
  })
  .transform(
    (raw): Voice => ({
      name: raw.name,
      language: raw.language,
      gender: raw.gender,
      ...(raw.url ? { url: raw.url } : {}),
      ...(raw.description ? { description: raw.description } : {}),
      ...(typeof raw.customizable === 'boolean' ? { customizable: raw.customizable } : {}),
    }),
  );

export type TextToSpeechOptions = ServiceOptions;

/**
 * Client for the Text to Speech service (API v1).
 */
export class TextToSpeech extends ServiceBase {
  constructor(options: TextToSpeechOptions = {}) {
    super(TEXT_TO_SPEECH_SERVICE_NAME, TEXT_TO_SPEECH_URL, options);
  }

  getVoices(): ServiceCall<Voice[]> {
    const request = RequestBuilder.get(PATH_VOICES).build();
    return this.createServiceCall(request, ResponseConverters.list('voices', voiceSchema));
  }

  getVoice(name: string): ServiceCall<Voice> {
    notEmpty(name, 'voice name cannot be null or empty');
    const request = RequestBuilder.get(`${PATH_VOICES}/${encodeURIComponent(name)}`).build();
    return this.createServiceCall(request, ResponseConverters.object(voiceSchema));
  }

  /**
   * Synthesize `text` to audio. Resolves with the encoded audio bytes.
   */
  synthesize(text: string, options: SynthesizeOptions = {}): ServiceCall<Uint8Array> {
    notEmpty(text, 'text cannot be null or empty');
    const mediaType = audioFormatMediaType(options.format ?? 'wav');

    const request = RequestBuilder.get(PATH_SYNTHESIZE)
      .withQuery('text', text)
      .withQuery('voice', options.voice || undefined)
      .withQuery('accept', mediaType)
      .withHeader(HttpHeaders.ACCEPT, mediaType)
      .build();

    return this.createServiceCall(request, ResponseConverters.binary());
  }
}
