const utf8 = new TextDecoder("utf-8", { fatal: false });

/**
 * Turn any scalar into something printable.
 * Byte sequences are decoded as UTF-8 with U+FFFD for invalid runs.
 */
export function toDisplayString(value: unknown): string {
  if (value === undefined || value === null) {
    return "";
  }
  if (value instanceof Uint8Array) {
    return utf8.decode(value);
  }
  return String(value);
}
