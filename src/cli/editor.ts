#!/usr/bin/env node
/**
 * md-editor: rewrite the headings of a Markdown file.
 *
 * Usage: md-editor <file> <upgrade|downgrade|remove_numbers|add_numbers> [options]
 */
import { EDIT_ACTIONS } from '../editor/types';
import { editMarkdown, isEditAction } from '../editor/editor';
import { NUMBERING_STYLE_NAMES } from '../editor/styles';
import { InvalidActionError } from '../errors';
import { parseCliArgs, requirePair } from './args';
import { loadConfigFile, mergeSettings } from './config';
import { consoleIo, readTextFile, reportError, writeOutputFile, type CliIo } from './io';

export const EDITOR_USAGE = [
  `Usage: md-editor <file> <${EDIT_ACTIONS.join('|')}> [options]`,
  '',
  'Options:',
  '  -o, --output FILE        write here instead of overwriting <file>',
  `  --style STYLE            numbering style for add_numbers (${NUMBERING_STYLE_NAMES.join(', ')})`,
  '  --ignore-code-blocks     leave # lines inside fenced code blocks alone',
  '  --config FILE            JSON settings file',
  '  -h, --help               show this help',
].join('\n');

const EDITOR_OPTIONS = {
  output: { type: 'string', short: 'o' },
  style: { type: 'string' },
  'ignore-code-blocks': { type: 'boolean' },
  config: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

/**
 * Run the editor CLI.
 *
 * @param argv - Arguments after the script name.
 * @returns Process exit code: 0 on success, 1 on any error.
 */
export async function runEditor(argv: string[], io: CliIo = consoleIo): Promise<number> {
  try {
    const { values, positionals } = parseCliArgs(argv, EDITOR_OPTIONS);
    if (values.help) {
      io.log(EDITOR_USAGE);
      return 0;
    }

    const [file, action] = requirePair(positionals, ['file', 'action']);
    if (!isEditAction(action)) {
      throw new InvalidActionError(action, EDIT_ACTIONS);
    }

    const config = values.config ? await loadConfigFile(values.config) : {};
    const settings = mergeSettings(config, {
      style: values.style,
      ignoreCodeBlocks: values['ignore-code-blocks'],
    });

    const source = await readTextFile(file);
    const result = editMarkdown(source, {
      action,
      style: settings.style,
      ignoreFencedCode: settings.ignoreCodeBlocks,
    });

    const output = values.output ?? file;
    await writeOutputFile(output, result.text);
    io.log(`${action}: ${result.changedCount} of ${result.headingCount} headings changed -> ${output}`);
    return 0;
  } catch (error) {
    return reportError(error, io);
  }
}

if (require.main === module) {
  runEditor(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.exitCode = reportError(error, consoleIo);
    },
  );
}
