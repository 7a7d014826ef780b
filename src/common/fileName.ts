const disallowedCharacters = /[^\p{L}\p{N}_\s.-]/gu;
const whitespaceRun = /\s+/g;
const edgeSeparators = /^[_-]+|[_-]+$/g;
const onlyDots = /^\.+$/;

export const DEFAULT_MAX_NAME_LENGTH = 100;

/**
 * Turns arbitrary page text into a single path segment. Keeps letters,
 * digits, `_`, `.` and `-`; whitespace runs become `_`. May return `''`.
 */
export const sanitizeFileName = (name: string, maxLength = DEFAULT_MAX_NAME_LENGTH): string => {
  const cleaned = name
    .replace(disallowedCharacters, '')
    .trim()
    .replace(whitespaceRun, '_')
    .replace(edgeSeparators, '')
    .slice(0, Math.max(0, maxLength));
  return onlyDots.test(cleaned) ? '' : cleaned;
};

const MAX_EXTENSION_LENGTH = 16;

/**
 * Sanitises an extension taken from a URL or a suggested file name. The
 * result is `''` or a single dot followed by sanitised characters.
 */
export const sanitizeExtension = (extension: string, maxLength = MAX_EXTENSION_LENGTH): string => {
  const cleaned = sanitizeFileName(extension.replace(/^\.+/, ''), maxLength).replace(/\./g, '');
  return cleaned ? `.${cleaned}` : '';
};

const separatorOrStream = /[/\\:\0]/;

/** True when `segment` names an entry directly inside its parent directory. */
export const isSafePathSegment = (segment: string) =>
  segment.length > 0 && segment !== '.' && segment !== '..' && !separatorOrStream.test(segment);

export const splitStemAndExtension = (name: string) => {
  const lastDot = name.lastIndexOf('.');
  if (lastDot <= 0) {
    return { stem: name, extension: '' };
  }
  return { stem: name.slice(0, lastDot), extension: name.slice(lastDot) };
};
