#!/usr/bin/env node
/**
 * md-convert: convert a Markdown file to DOCX, HTML or plain text.
 *
 * Usage: md-convert <file> <docx|html|txt> [options]
 */
import { format as formatPath, parse as parsePath } from 'path';
import { convertMarkdown, isOutputFormat } from '../converter';
import { STYLE_TEMPLATE_NAMES } from '../core/styles';
import { UnsupportedFormatError } from '../errors';
import { OUTPUT_FORMATS } from '../types';
import { parseCliArgs, requirePair } from './args';
import { loadConfigFile, mergeSettings } from './config';
import { consoleIo, readBinaryFile, readTextFile, reportError, writeOutputFile, type CliIo } from './io';

export const CONVERTER_USAGE = [
  `Usage: md-convert <file> <${OUTPUT_FORMATS.join('|')}> [options]`,
  '',
  'Options:',
  '  -o, --output FILE        output path (default: <file> with the format as extension)',
  '  --template DOCX          reuse the styles of this .docx (docx only)',
  `  --theme NAME             HTML style template (${STYLE_TEMPLATE_NAMES.join(', ')})`,
  '  --title TITLE            document title (default: first heading)',
  '  --config FILE            JSON settings file',
  '  -h, --help               show this help',
].join('\n');

const CONVERTER_OPTIONS = {
  output: { type: 'string', short: 'o' },
  template: { type: 'string' },
  theme: { type: 'string' },
  title: { type: 'string' },
  config: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

/** `notes/a.md` + `docx` → `notes/a.docx`. */
export function defaultOutputPath(input: string, format: string): string {
  const { dir, name } = parsePath(input);
  return formatPath({ dir, name, ext: `.${format}` });
}

/**
 * Run the converter CLI.
 *
 * @param argv - Arguments after the script name.
 * @returns Process exit code: 0 on success, 1 on any error.
 */
export async function runConverter(argv: string[], io: CliIo = consoleIo): Promise<number> {
  try {
    const { values, positionals } = parseCliArgs(argv, CONVERTER_OPTIONS);
    if (values.help) {
      io.log(CONVERTER_USAGE);
      return 0;
    }

    const [file, format] = requirePair(positionals, ['file', 'format']);
    if (!isOutputFormat(format)) {
      throw new UnsupportedFormatError(format, OUTPUT_FORMATS);
    }

    const config = values.config ? await loadConfigFile(values.config) : {};
    const settings = mergeSettings(config, {
      template: values.template,
      theme: values.theme,
      title: values.title,
    });

    const markdown = await readTextFile(file);
    const template =
      format === 'docx' && settings.template ? await readBinaryFile(settings.template) : undefined;

    const result = await convertMarkdown(markdown, format, {
      title: settings.title,
      theme: settings.theme,
      template,
      gfm: settings.gfm,
    });

    for (const warning of result.warnings) {
      io.warn(`Warning: ${warning}`);
    }

    const output = values.output ?? defaultOutputPath(file, format);
    await writeOutputFile(output, result.content);
    io.log(`Converted ${file} -> ${output} (${format}, ${result.metadata.wordCount} words)`);
    return 0;
  } catch (error) {
    return reportError(error, io);
  }
}

if (require.main === module) {
  runConverter(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.exitCode = reportError(error, consoleIo);
    },
  );
}
