/**
 * Printable ASCII alphabet for random test inputs: digits, letters,
 * punctuation, then space, tab, LF, CR, VT and FF.
 */

const DIGITS = "0123456789";
const LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const PUNCTUATION = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";
const WHITESPACE = " \t\n\r\x0b\x0c";

export const PRINTABLE = DIGITS + LETTERS + PUNCTUATION + WHITESPACE;
