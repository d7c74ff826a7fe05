/**
 * Boundary lookup
 *
 * Only the top-level header block is searched; the boundary is then used as a
 * literal byte pattern by the splitter.
 *
 * @packageDocumentation
 */

/**
 * Unfolds folded headers (RFC 2822)
 * Folded headers have CRLF followed by whitespace
 *
 * @param headerBlock - Raw header block with potential folding
 * @returns Unfolded header block
 */
export function unfoldHeaders(headerBlock: string): string {
  // Also handle bare LF for compatibility
  return headerBlock
    .replace(/\r\n[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, ' ');
}

/**
 * Extracts the boundary from a Content-Type header value or header block
 *
 * @param contentType - Text containing a `boundary=` parameter
 * @returns Boundary string or undefined
 */
export function extractBoundary(contentType: string): string | undefined {
  const match = contentType.match(/boundary\s*=\s*(?:"([^"]+)"|([^\s;"]+))/i);
  return match ? (match[1] ?? match[2]) : undefined;
}

/**
 * Returns the message's header block: everything before the first empty line
 *
 * @param raw - Raw message
 */
export function headerBlock(raw: Buffer): Buffer {
  const lf = raw.indexOf('\n\n');
  const crlf = raw.indexOf('\r\n\r\n');
  const ends = [lf, crlf].filter(i => i !== -1);
  if (ends.length === 0) return raw;
  return raw.subarray(0, Math.min(...ends));
}

/**
 * Finds the multipart boundary declared in the message headers
 *
 * @param raw - Raw message
 * @returns Boundary string or undefined if none is declared
 */
export function findBoundary(raw: Buffer): string | undefined {
  // latin1 maps bytes 1:1, so offsets and non-ASCII header bytes survive
  const headers = unfoldHeaders(headerBlock(raw).toString('latin1'));
  return extractBoundary(headers);
}
