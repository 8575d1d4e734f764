// Characters rejected in file names on at least one supported platform.
const INVALID_FILE_NAME_CHARS = new Set(["<", ">", ":", '"', "/", "\\", "|", "?", "*"]);

/**
 * Remove characters that cannot appear in a file name.
 */
export function getValidFileName(name: string): string {
  let result = "";
  for (const char of name) {
    if (INVALID_FILE_NAME_CHARS.has(char) || char.charCodeAt(0) < 0x20) continue;
    result += char;
  }
  return result;
}

/**
 * "abc123" -> true, "abc123!" -> false. The empty string is alphanumeric.
 */
export function isAlphaNumeric(text: string): boolean {
  return /^[\p{L}\p{Nd}]*$/u.test(text);
}

/**
 * "abc" -> true, "abc123" -> false. The empty string is alphabetical.
 */
export function isAlphabetical(text: string): boolean {
  return /^\p{L}*$/u.test(text);
}
