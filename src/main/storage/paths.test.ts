import { resolve } from 'path'
import { describe, expect, it } from 'vitest'
import { resolveAssetPath } from './paths'

describe('asset paths', () => {
  it('treats a blank setting as no asset', () => {
    expect(resolveAssetPath('')).toBeNull()
    expect(resolveAssetPath('   ')).toBeNull()
  })

  it('resolves relative paths against the working directory', () => {
    expect(resolveAssetPath('/srv/fonts/body.ttf')).toBe('/srv/fonts/body.ttf')
    expect(resolveAssetPath('fonts/body.ttf')).toBe(resolve(process.cwd(), 'fonts/body.ttf'))
  })
})
