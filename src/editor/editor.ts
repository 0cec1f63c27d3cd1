/**
 * Heading editor entry point.
 *
 * Runs one action over a whole document:
 * scan → (level shift | numbering) → reassemble.
 *
 * @module editor/editor
 */

import { InvalidActionError, MissingStyleError } from '../errors';
import { downgradeHeadings, upgradeHeadings } from './levels';
import { addNumbers, removeNumbers } from './numbering';
import { reassemble, renderLine } from './reassembler';
import { scanDocument } from './scanner';
import { getNumberingStyle } from './styles';
import type { EditAction, EditOptions, EditResult, LineRecord } from './types';
import { EDIT_ACTIONS } from './types';

type LineTransform = (lines: readonly LineRecord[]) => LineRecord[];

export function isEditAction(value: string): value is EditAction {
  return EDIT_ACTIONS.some((action) => action === value);
}

function resolveTransform(action: EditAction, styleName: string | undefined): LineTransform {
  switch (action) {
    case 'upgrade':
      return upgradeHeadings;
    case 'downgrade':
      return downgradeHeadings;
    case 'remove_numbers':
      return removeNumbers;
    case 'add_numbers': {
      if (!styleName) {
        throw new MissingStyleError();
      }
      const style = getNumberingStyle(styleName);
      return (lines) => addNumbers(lines, style);
    }
  }
}

/**
 * Apply a heading action to a Markdown document.
 *
 * The action and style are validated before the document is scanned.
 *
 * @throws {InvalidActionError} For an action outside {@link EDIT_ACTIONS}.
 * @throws {MissingStyleError} For `add_numbers` without a style.
 * @throws {UnknownStyleError} For an unknown style name.
 *
 * @example
 * ```ts
 * editMarkdown('# A\n## B\n', { action: 'add_numbers', style: 'technical' }).text;
 * // => '# 1 A\n## 1.1 B\n'
 * ```
 */
export function editMarkdown(text: string, options: EditOptions): EditResult {
  const { action } = options;
  if (!isEditAction(action)) {
    throw new InvalidActionError(action, EDIT_ACTIONS);
  }

  const transform = resolveTransform(action, options.style);
  const doc = scanDocument(text, { ignoreFencedCode: options.ignoreFencedCode });
  const edited = transform(doc.lines);

  let headingCount = 0;
  let changedCount = 0;
  edited.forEach((line, i) => {
    if (line.kind !== 'heading') return;
    headingCount++;
    if (renderLine(line) !== renderLine(doc.lines[i])) {
      changedCount++;
    }
  });

  return {
    text: reassemble(edited, doc.breaks),
    action,
    headingCount,
    changedCount,
  };
}
