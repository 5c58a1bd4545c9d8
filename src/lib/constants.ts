export const VERSION = '0.1.0';
export const USER_AGENT = `nlcloud/${VERSION}`;

export const DEFAULT_TIMEOUT_MS = 30_000;

export const LANGUAGE_TRANSLATION_URL = 'https://gateway.watsonplatform.net/language-translation/api';
export const TEXT_TO_SPEECH_URL = 'https://stream.watsonplatform.net/text-to-speech/api';

export const HttpMediaType = {
  APPLICATION_JSON: 'application/json',
  BINARY_FILE: 'application/octet-stream',
  TEXT_PLAIN: 'text/plain',
  AUDIO_OGG: 'audio/ogg; codecs=opus',
  AUDIO_WAV: 'audio/wav',
  AUDIO_FLAC: 'audio/flac',
} as const;

export const HttpHeaders = {
  ACCEPT: 'Accept',
  AUTHORIZATION: 'Authorization',
  CONTENT_TYPE: 'Content-Type',
  USER_AGENT: 'User-Agent',
} as const;
