import { HttpMediaType } from './constants.js';
import { ValidationError } from './errors.js';

export const AUDIO_FORMATS = ['ogg', 'wav', 'flac'] as const;

/** Audio encodings the synthesizer can return. */
export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export const AUDIO_FORMAT_MEDIA_TYPES: Readonly<Record<AudioFormat, string>> = {
  ogg: HttpMediaType.AUDIO_OGG,
  wav: HttpMediaType.AUDIO_WAV,
  flac: HttpMediaType.AUDIO_FLAC,
};

export function audioFormatMediaType(format: AudioFormat): string {
  return AUDIO_FORMAT_MEDIA_TYPES[format];
}

export function parseAudioFormat(value: string): AudioFormat {
  const normalized = value.trim().toLowerCase();
  const match = AUDIO_FORMATS.find((format) => format === normalized);
  if (!match) {
    throw new ValidationError(`Unknown audio format "${value}". Expected one of: ${AUDIO_FORMATS.join(', ')}`);
  }
  return match;
}

export interface Voice {
  /** e.g. "en-US_MichaelVoice" */
  readonly name: string;
  readonly language: string;
  readonly gender: string;
  readonly url?: string;
  readonly description?: string;
  readonly customizable?: boolean;
}

export interface SynthesizeOptions {
  voice?: string;
  /** Defaults to `wav` */
  format?: AudioFormat;
}
