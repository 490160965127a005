/**
 * Folds free text into the key used for matching city names and cuisine
 * tags: accents stripped, whitespace collapsed, lower-cased.
 *
 * @example toSearchKey('  San   Sebastián ') === 'san sebastian'
 */
export function toSearchKey(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase();
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
