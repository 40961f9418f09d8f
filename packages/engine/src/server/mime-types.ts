const MIME_TYPES: Record<string, string> = {
  html: 'text/html',
  css: 'text/css',
  js: 'application/javascript',
  json: 'application/json',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  txt: 'text/plain',
}

export const DEFAULT_MIME_TYPE = 'application/octet-stream'

/** Extension matching is exact and case-sensitive: `.HTML` is not html. */
export function getMimeType(filePath: string): string {
  const dot = filePath.lastIndexOf('.')
  if (dot === -1) return DEFAULT_MIME_TYPE
  const ext = filePath.substring(dot + 1)
  return Object.hasOwn(MIME_TYPES, ext) ? MIME_TYPES[ext] : DEFAULT_MIME_TYPE
}
