const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\//;

/**
 * Scheme of an absolute URI ("soundcloud" for "soundcloud://track/1"),
 * lower-cased. Plain paths and "scheme:" without the slashes yield null.
 */
export function getUriScheme(uri: string): string | null {
  const match = SCHEME_PATTERN.exec(uri);
  return match?.[1] ? match[1].toLowerCase() : null;
}

/**
 * File-extension-like suffix of a path or URI, lower-cased and without the
 * dot. Query string and fragment are ignored; a dot inside a directory
 * name does not count.
 */
export function getUriSuffix(uri: string): string | null {
  const end = uri.search(/[?#]/);
  const base = end >= 0 ? uri.slice(0, end) : uri;

  const dot = base.lastIndexOf('.');
  if (dot < 0) return null;

  const suffix = base.slice(dot + 1);
  if (suffix === '' || /[/\\]/.test(suffix)) return null;
  return suffix.toLowerCase();
}

/** "audio/x-mpegurl; charset=utf-8" -> "audio/x-mpegurl" */
export function stripMimeParameters(mimeType: string): string {
  const semicolon = mimeType.indexOf(';');
  const bare = semicolon >= 0 ? mimeType.slice(0, semicolon) : mimeType;
  return bare.trim().toLowerCase();
}

export function isRemoteUri(uri: string): boolean {
  const scheme = getUriScheme(uri);
  return scheme === 'http' || scheme === 'https';
}
