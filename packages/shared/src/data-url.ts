export interface StrippedDataUrl {
  base64: string
  mimeType?: string
}

const DATA_URL_HEADER = /^data:([^,]*?);base64,/

/**
 * Removes a leading `data:<mime>[;param=value...];base64,` header and keeps the rest as-is.
 * Values without the header come back untouched.
 */
export function stripDataUrl(value: string): StrippedDataUrl {
  const match = DATA_URL_HEADER.exec(value)
  if (!match) return { base64: value }

  // Parameters such as `;codecs=opus` are dropped from the mime type
  const mimeType = match[1]?.split(';')[0]?.trim() || undefined
  return { base64: value.slice(match[0].length), mimeType }
}
