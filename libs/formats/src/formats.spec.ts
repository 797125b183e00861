import { UnknownFormatError } from '@weatherscape/common'
import { artifactKey, DEFAULT_FORMAT, FORMAT_CONFIGS, FORMAT_IDS, getFormatConfig, isFormatId, normalizeFormatName } from './formats'

describe('formats', () => {
  it('keys every configuration by its own id', () => {
    for (const id of FORMAT_IDS) {
      expect(FORMAT_CONFIGS[id].id).toBe(id)
    }
  })

  it('uses rgb_light as the default format', () => {
    expect(DEFAULT_FORMAT).toBe('rgb_light')
  })

  it('pairs each extension with its mime type', () => {
    for (const id of FORMAT_IDS) {
      const config = FORMAT_CONFIGS[id]
      expect(config.mimeType).toBe(config.extension === '.png' ? 'image/png' : 'image/bmp')
    }
  })

  it('builds canonical artifact keys', () => {
    expect(artifactKey('78729', 'rgb_light')).toBe('78729/rgb_light.png')
    expect(artifactKey('78729', 'bw')).toBe('78729/bw.bmp')
    expect(artifactKey('10001', 'eink')).toBe('10001/eink.bmp')
  })

  it('normalizes kebab-case and upper-case names', () => {
    expect(normalizeFormatName(' RGB-Dark ')).toBe('rgb_dark')
  })

  it('resolves configurations through aliases', () => {
    expect(getFormatConfig('rgb-dark').id).toBe('rgb_dark')
    expect(getFormatConfig('BWI').invert).toBe(true)
  })

  it('rejects unknown formats', () => {
    expect(() => getFormatConfig('sepia')).toThrow(UnknownFormatError)
    expect(isFormatId('sepia')).toBe(false)
    expect(isFormatId(42)).toBe(false)
  })
})
