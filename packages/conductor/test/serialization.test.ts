import { describe, it, expect } from 'vitest'
import { asJson, serializableHash } from '../src/serialization.js'

describe('serialization', () => {
  const attributes = { name: 'Scott', anInt: 13, email: undefined }

  describe('serializableHash', () => {
    it('should copy every attribute by default', () => {
      const hash = serializableHash(attributes)

      expect(hash).toEqual({ name: 'Scott', anInt: 13, email: undefined })
      expect(hash).not.toBe(attributes)
      expect(Object.keys(hash)).toEqual(['name', 'anInt', 'email'])
    })

    it('should keep only the listed attributes', () => {
      expect(serializableHash(attributes, { only: ['anInt', 'missing'] })).toEqual({ anInt: 13 })
    })

    it('should drop the excepted attributes', () => {
      expect(serializableHash(attributes, { except: ['email'] })).toEqual({
        name: 'Scott',
        anInt: 13
      })
    })

    it('should prefer only over except', () => {
      expect(serializableHash(attributes, { only: ['name'], except: ['name'] })).toEqual({
        name: 'Scott'
      })
    })
  })

  describe('asJson', () => {
    it('should return the hash without a root', () => {
      expect(asJson(attributes, 'signup', { only: ['name'] })).toEqual({ name: 'Scott' })
    })

    it('should nest the hash under the root key', () => {
      expect(asJson(attributes, 'signup', { root: true, except: ['email'] })).toEqual({
        signup: { name: 'Scott', anInt: 13 }
      })
    })
  })
})
