export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/**
 * Upper-cases the first character and lower-cases the rest.
 */
export const capitalize = (str: string): string =>
  str.length === 0 ? str : str.charAt(0).toUpperCase() + str.slice(1).toLowerCase();

/**
 * Cuts each suffix off the end of `str` once, trying them in order.
 * `stripSuffixes('foo-deb-bin', ['-bin', '-deb'])` gives `foo`.
 */
export const stripSuffixes = (str: string, suffixes: readonly string[]): string =>
  suffixes.reduce(
    (acc, suffix) => (acc.endsWith(suffix) ? acc.slice(0, -suffix.length) : acc),
    str,
  );
