/**
 * Content encoding utilities for message handling
 *
 * Base64 with MIME line wrapping and byte-level line-ending conversion.
 *
 * @packageDocumentation
 */

export {
  base64Encode,
  base64EncodeLines,
  base64Decode,
  isBase64,
  BASE64_LINE_WIDTH
} from './base64.js';
export { splitLines, isBlankLine, toLf } from './line-endings.js';
