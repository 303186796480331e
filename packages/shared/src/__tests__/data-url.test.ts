import { describe, it, expect } from 'vitest'
import { stripDataUrl } from '../data-url.js'
import { isRecord } from '../index.js'

describe('stripDataUrl', () => {
  it('removes exactly the header and keeps the mime type', () => {
    expect(stripDataUrl('data:image/png;base64,iVBOR w0K')).toEqual({ base64: 'iVBOR w0K', mimeType: 'image/png' })
  })

  it('accepts mime parameters before the base64 marker', () => {
    expect(stripDataUrl('data:audio/webm;codecs=opus;base64,QUJD')).toEqual({ base64: 'QUJD', mimeType: 'audio/webm' })
  })

  it('allows a header without a mime type', () => {
    expect(stripDataUrl('data:;base64,QUJD')).toEqual({ base64: 'QUJD' })
  })

  it('leaves other strings untouched', () => {
    expect(stripDataUrl('QUJD')).toEqual({ base64: 'QUJD' })
    expect(stripDataUrl('data:image/png,QUJD')).toEqual({ base64: 'data:image/png,QUJD' })
  })

  it('round-trips through base64 decoding', () => {
    const { base64 } = stripDataUrl(`data:audio/webm;base64,${Buffer.from('meow').toString('base64')}`)
    expect(Buffer.from(base64, 'base64').toString()).toBe('meow')
  })
})

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect([{}, { a: 1 }, [], null, 'x'].map(isRecord)).toEqual([true, true, false, false, false])
  })
})
