/**
 * Byte-level line handling
 *
 * The message is kept as bytes throughout; these helpers are the only places
 * where it is treated as lines. LF (0x0A) terminates a line and a preceding
 * CR (0x0D) stays part of that line.
 */

const CR = 0x0d;
const LF = 0x0a;

/**
 * Splits bytes into lines, each keeping its terminator
 *
 * A final line without a terminator is returned as-is. Concatenating the
 * result reproduces the input.
 *
 * @param data - Bytes to split
 * @returns Views onto `data`, one per line
 */
export function splitLines(data: Buffer): Buffer[] {
  const lines: Buffer[] = [];
  let start = 0;

  while (start < data.length) {
    const lf = data.indexOf(LF, start);
    const end = lf === -1 ? data.length : lf + 1;
    lines.push(data.subarray(start, end));
    start = end;
  }

  return lines;
}

/**
 * Whether a line holds nothing but its terminator
 */
export function isBlankLine(line: Buffer): boolean {
  return line.length === 0
    || (line.length === 1 && line[0] === LF)
    || (line.length === 2 && line[0] === CR && line[1] === LF);
}

/**
 * Converts CRLF line endings to LF
 *
 * Every CR in a run that ends at an LF is dropped, so the result holds no
 * CRLF pair. A CR not followed by LF is kept.
 *
 * @param data - Bytes to convert
 * @returns New buffer
 */
export function toLf(data: Buffer): Buffer {
  const out = Buffer.allocUnsafe(data.length);
  let length = 0;

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (byte === CR) {
      let end = i;
      while (data[end] === CR) end++;
      if (data[end] === LF) {
        i = end - 1;
        continue;
      }
    }
    out[length++] = byte;
  }

  return out.subarray(0, length);
}
