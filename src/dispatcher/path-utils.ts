/**
 * Path helpers shared by the resolver and the command lookup.
 */

const PERCENT_ESCAPE = /%([0-9A-Fa-f]{2})/g;

/**
 * Percent-decode one path segment.
 *
 * Valid UTF-8 escape sequences decode to their characters; when the
 * segment is not valid UTF-8 each escape decodes to its byte value.
 *
 * @example
 * decodeSegment('caf%C3%A9'); // 'café'
 * decodeSegment('a%2Fb');     // 'a/b'
 */
export function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (!(error instanceof URIError)) {
      throw error;
    }
    return segment.replace(PERCENT_ESCAPE, (_match, hex: string) =>
      String.fromCharCode(Number.parseInt(hex, 16))
    );
  }
}

/**
 * Split a request path into segments, dropping trailing empty segments.
 *
 * @example
 * splitPath('blog/2024/');  // ['blog', '2024']
 * splitPath('');            // []
 */
export function splitPath(path: string): string[] {
  const segments = path.split('/');
  while (segments.length > 0 && segments[segments.length - 1] === '') {
    segments.pop();
  }
  return segments;
}
