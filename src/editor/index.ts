/**
 * Heading editor barrel exports.
 *
 * @module editor
 */

export { editMarkdown, isEditAction } from './editor';
export { scanDocument, parseHeadingLine, detectLineEnding, headingsOf } from './scanner';
export { PREFIX_RECOGNIZERS, detectPrefix, stripPrefix } from './prefixes';
export { clampLevel, shiftLevels, upgradeHeadings, downgradeHeadings } from './levels';
export { NumberingState, addNumbers, removeNumbers } from './numbering';
export { NUMBERING_STYLES, NUMBERING_STYLE_NAMES, getNumberingStyle } from './styles';
export { reassemble, renderHeading, renderLine } from './reassembler';
export { toChineseNumeral } from './numerals';
export { EDIT_ACTIONS } from './types';

export type { PrefixRecognizer, PrefixMatch } from './prefixes';
export type { LevelShift } from './levels';
export type { NumberingStyle, NumberingStyleName, NumberingCounters } from './styles';
export type {
  HeadingLevel,
  HeadingLine,
  ContentLine,
  LineRecord,
  LineEnding,
  ScannedDocument,
  ScanOptions,
  EditAction,
  EditOptions,
  EditResult,
} from './types';
