import { writeFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { formatVoice } from '../cli/format.js';
import type { CliContext } from '../cli/shared.js';
import { type AudioFormat, parseAudioFormat } from '../lib/text-to-speech-types.js';

export function registerSpeechCommands(program: Command, ctx: CliContext): void {
  program
    .command('voices')
    .description('List text-to-speech voices')
    .option('--json', 'Output as JSON')
    .action(async (cmdOpts: { json?: boolean }) => {
      const service = ctx.textToSpeech();
      try {
        const voices = await service.getVoices().execute();
        if (cmdOpts.json) {
          ctx.printJson(voices);
          return;
        }
        for (const voice of voices) {
          console.log(formatVoice(voice));
        }
      } catch (error) {
        ctx.fail('Failed to list voices', error);
      }
    });

  program
    .command('voice')
    .description('Show one text-to-speech voice')
    .argument('<name>', 'Voice name, e.g. en-US_MichaelVoice')
    .option('--json', 'Output as JSON')
    .action(async (name: string, cmdOpts: { json?: boolean }) => {
      const service = ctx.textToSpeech();
      try {
        const voice = await service.getVoice(name).execute();
        if (cmdOpts.json) {
          ctx.printJson(voice);
        } else {
          console.log(formatVoice(voice));
        }
      } catch (error) {
        ctx.fail(`Failed to fetch voice ${name}`, error);
      }
    });

  program
    .command('speak')
    .description('Synthesize text to an audio file')
    .argument('<text>', 'Text to speak')
    .requiredOption('--out <path>', 'File to write the audio to')
    .option('--voice <name>', 'Voice to use')
    .option('--format <format>', 'Audio format: ogg, wav or flac', 'wav')
    .action(async (text: string, cmdOpts: { out: string; voice?: string; format: string }) => {
      let format: AudioFormat;
      try {
        format = parseAudioFormat(cmdOpts.format);
      } catch (error) {
        return ctx.fail('Invalid --format', error);
      }

      const service = ctx.textToSpeech();
      try {
        const audio = await service.synthesize(text, { voice: cmdOpts.voice, format }).execute();
        await writeFile(cmdOpts.out, audio);
        console.log(`${ctx.p('ok')}Wrote ${audio.byteLength} bytes of ${format} audio to ${cmdOpts.out}`);
      } catch (error) {
        ctx.fail('Failed to synthesize speech', error);
      }
    });
}
