import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { ServiceResponseError } from '../lib/errors.js';
import { LanguageTranslation } from '../lib/language-translation.js';
import type { ModelFile } from '../lib/language-translation-types.js';
import type { ServiceOptions } from '../lib/service-base.js';
import { TextToSpeech } from '../lib/text-to-speech.js';

export type PrefixKind = 'ok' | 'warn' | 'err' | 'info';

/** Options registered on the root program. */
export interface GlobalOptions {
  url?: string;
  username?: string;
  password?: string;
  timeout?: string;
  plain?: boolean;
}

export type ServiceKind = 'language_translation' | 'text_to_speech';

export type ResolvedServiceOptions =
  | { ok: true; options: ServiceOptions; warnings: string[] }
  | { ok: false; error: string };

export interface CliContext {
  p(kind: PrefixKind): string;
  resolveTimeoutFromOptions(opts: GlobalOptions): { ok: true; timeoutMs?: number } | { ok: false; error: string };
  resolveServiceOptions(service: ServiceKind, opts: GlobalOptions): ResolvedServiceOptions;
  /** Builds a client from the global options, printing warnings; exits on bad configuration. */
  languageTranslation(): LanguageTranslation;
  textToSpeech(): TextToSpeech;
  readModelFile(path: string): Promise<ModelFile>;
  printJson(value: unknown): void;
  /** Prints `message` with the error's details and exits with status 1. */
  fail(message: string, error?: unknown): never;
}

const EMOJI_PREFIXES: Record<PrefixKind, string> = {
  ok: '✅ ',
  warn: '⚠️  ',
  err: '❌ ',
  info: 'ℹ️  ',
};

const PLAIN_PREFIXES: Record<PrefixKind, string> = {
  ok: 'ok: ',
  warn: 'warn: ',
  err: 'error: ',
  info: 'info: ',
};

const ENV_PREFIXES: Record<ServiceKind, string> = {
  language_translation: 'LANGUAGE_TRANSLATION',
  text_to_speech: 'TEXT_TO_SPEECH',
};

export function describeError(error: unknown): string {
  if (error instanceof ServiceResponseError) {
    return `HTTP ${error.status}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function createCliContext(params: {
  getOptions: () => GlobalOptions;
  env?: NodeJS.ProcessEnv;
}): CliContext {
  const env = params.env ?? process.env;
  const nonEmpty = (value: string | undefined) => (value?.trim() ? value.trim() : undefined);

  const ctx: CliContext = {
    p(kind) {
      const plain = Boolean(params.getOptions().plain) || env.NO_COLOR !== undefined;
      return (plain ? PLAIN_PREFIXES : EMOJI_PREFIXES)[kind];
    },

    resolveTimeoutFromOptions(opts) {
      const raw = nonEmpty(opts.timeout) ?? nonEmpty(env.NLCLOUD_TIMEOUT_MS);
      if (raw === undefined) {
        return { ok: true };
      }
      const timeoutMs = Number(raw);
      if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
        return { ok: false, error: `Invalid --timeout. Expected a non-negative integer (ms), got "${raw}".` };
      }
      return { ok: true, timeoutMs };
    },

    resolveServiceOptions(service, opts) {
      const timeout = ctx.resolveTimeoutFromOptions(opts);
      if (!timeout.ok) {
        return timeout;
      }

      const prefix = ENV_PREFIXES[service];
      const endpoint = nonEmpty(opts.url) ?? nonEmpty(env[`${prefix}_URL`]);
      const username = nonEmpty(opts.username) ?? nonEmpty(env[`${prefix}_USERNAME`]);
      const password = opts.password ?? env[`${prefix}_PASSWORD`];

      const warnings: string[] = [];
      if (username === undefined || password === undefined) {
        warnings.push(
          `No credentials for ${service}. Pass --username/--password or set ${prefix}_USERNAME and ${prefix}_PASSWORD.`,
        );
      }

      const options: ServiceOptions = {
        ...(endpoint ? { endpoint } : {}),
        ...(username !== undefined && password !== undefined ? { username, password } : {}),
        ...(timeout.timeoutMs !== undefined ? { timeoutMs: timeout.timeoutMs } : {}),
      };
      return { ok: true, options, warnings };
    },

    languageTranslation() {
      return new LanguageTranslation(resolveOrExit('language_translation'));
    },

    textToSpeech() {
      return new TextToSpeech(resolveOrExit('text_to_speech'));
    },

    async readModelFile(path) {
      return { filename: basename(path), data: await readFile(path) };
    },

    printJson(value) {
      console.log(JSON.stringify(value, null, 2));
    },

    fail(message, error) {
      console.error(`${ctx.p('err')}${message}${error === undefined ? '' : `: ${describeError(error)}`}`);
      process.exit(1);
    },
  };

  const resolveOrExit = (service: ServiceKind): ServiceOptions => {
    const resolved = ctx.resolveServiceOptions(service, params.getOptions());
    if (!resolved.ok) {
      return ctx.fail(resolved.error);
    }
    for (const warning of resolved.warnings) {
      console.error(`${ctx.p('warn')}${warning}`);
    }
    return resolved.options;
  };

  return ctx;
}
