import { isFormatId, normalizeFormatName, type FormatId } from './formats'

const IMAGE_EXTENSIONS = /\.(png|bmp)$/i

/**
 * Picks the format a request for an image asks for.
 *
 * Path segments win over query keys: `/78729/bw?rgb_dark` resolves to `bw`.
 * The ZIP segment itself is never a hint. Returns `undefined` when nothing
 * names a known format.
 */
export function parseFormatHint(
  path: string,
  query: URLSearchParams | Record<string, string | undefined>,
  zip?: string,
): FormatId | undefined {
  for (const segment of path.split('/')) {
    if (!segment || segment === zip) continue
    const candidate = normalizeFormatName(segment.replace(IMAGE_EXTENSIONS, ''))
    if (isFormatId(candidate)) return candidate
  }

  const keys = query instanceof URLSearchParams ? Array.from(query.keys()) : Object.keys(query)
  for (const key of keys) {
    const candidate = normalizeFormatName(key)
    if (isFormatId(candidate)) return candidate
  }

  return undefined
}
