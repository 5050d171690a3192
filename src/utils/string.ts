/**
 * String manipulation utilities.
 */

/**
 * Upper-case the first character of every alphanumeric run and drop the
 * separators between runs. The rest of each run is kept as written.
 *
 * @example toPascalCase('my-cool app') // 'MyCoolApp'
 */
export function toPascalCase(input: string): string {
  let result = '';
  let capitalizeNext = true;

  for (const char of input) {
    if (/[\p{L}\p{N}]/u.test(char)) {
      result += capitalizeNext ? char.toUpperCase() : char;
      capitalizeNext = false;
    } else {
      capitalizeNext = true;
    }
  }

  return result;
}

/**
 * Replace every `-` with `_`.
 */
export function toSnakeCase(input: string): string {
  return input.replace(/-/g, '_');
}

/**
 * Replace every `_` with `-`.
 */
export function toKebabCase(input: string): string {
  return input.replace(/_/g, '-');
}

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated.
 */
export function truncateString(str: string, maxLen: number): string {
  if (maxLen < 0) {
    return '';
  }

  if (str.length <= maxLen) {
    return str;
  }

  if (maxLen <= 3) {
    return str.slice(0, maxLen);
  }

  return str.slice(0, maxLen - 3) + '...';
}
