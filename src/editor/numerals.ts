/**
 * Arabic to Chinese numeral conversion for heading prefixes.
 *
 * @module editor/numerals
 */

const DIGITS = ['零', '一', '二', '三', '四', '五', '六', '七', '八', '九'];
const UNITS = ['', '十', '百', '千'];

/** Characters that may appear in a lowercase Chinese numeral. */
export const CHINESE_NUMERAL_CHARS = '零〇一二三四五六七八九十百千万';

/** Characters that may appear in an uppercase (financial) Chinese numeral. */
export const CHINESE_UPPER_NUMERAL_CHARS = '零壹贰叁肆伍陆柒捌玖拾佰仟万';

/**
 * Render a section group (0-9999) without the leading/trailing zero rules
 * that apply across groups.
 */
function renderGroup(n: number): string {
  const digits = String(n).split('').map(Number);
  let result = '';
  let pendingZero = false;

  digits.forEach((digit, i) => {
    const place = digits.length - i - 1;
    if (digit === 0) {
      pendingZero = result.length > 0;
      return;
    }
    if (pendingZero) {
      result += DIGITS[0];
      pendingZero = false;
    }
    result += DIGITS[digit] + UNITS[place];
  });

  return result;
}

/**
 * Convert a positive integer to lowercase Chinese numerals.
 *
 * 10-19 drop the leading 一 (`十`, `十一`), as is usual in headings.
 *
 * @example
 * ```ts
 * toChineseNumeral(3);   // '三'
 * toChineseNumeral(12);  // '十二'
 * toChineseNumeral(105); // '一百零五'
 * ```
 */
export function toChineseNumeral(n: number): string {
  if (!Number.isInteger(n) || n < 0) {
    return String(n);
  }
  if (n === 0) return DIGITS[0];

  const high = Math.floor(n / 10000);
  const low = n % 10000;

  let result = '';
  if (high > 0) {
    result = `${toChineseNumeral(high)}万`;
    if (low > 0) {
      result += low < 1000 ? DIGITS[0] + renderGroup(low) : renderGroup(low);
    }
  } else {
    result = renderGroup(low);
  }

  if (n >= 10 && n < 20) {
    result = result.slice(1);
  }
  return result;
}
