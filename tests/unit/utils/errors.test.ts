import { describe, it, expect } from 'vitest'
import {
  AdapterError,
  ConnectionError,
  QueryError,
} from '../../../src/adapters/adapter-error.js'
import {
  DiseaseNormalizerError,
  InvalidParameterError,
  NotConfiguredError,
  errorMessage,
  requireNonEmptyString,
  requireNonNull,
  requireOneOf,
} from '../../../src/utils/errors.js'

describe('errors', () => {
  describe('error classes', () => {
    it('carries a code and context', () => {
      const error = new InvalidParameterError('query', 42, 'must be a string')

      expect(error).toBeInstanceOf(DiseaseNormalizerError)
      expect(error.name).toBe('InvalidParameterError')
      expect(error.message).toBe("Invalid parameter 'query': must be a string")
      expect(error.code).toBe('INVALID_PARAMETER')
      expect(error.context).toEqual({
        parameterName: 'query',
        value: 42,
        reason: 'must be a string',
      })
    })

    it('describes unconfigured features', () => {
      const error = new NotConfiguredError('storage', 'Call .storage(store).')

      expect(error.message).toBe("Feature 'storage' is not configured. Call .storage(store).")
      expect(error.code).toBe('NOT_CONFIGURED')
      expect(error.feature).toBe('storage')
    })

    it('keeps the storage error hierarchy', () => {
      const error = new ConnectionError('Failed to connect to database', { host: 'localhost' })

      expect(error).toBeInstanceOf(ConnectionError)
      expect(error).toBeInstanceOf(AdapterError)
      expect(error).toBeInstanceOf(DiseaseNormalizerError)
      expect(error).not.toBeInstanceOf(QueryError)
      expect(error.code).toBe('CONNECTION_ERROR')
      expect(error.context).toEqual({ host: 'localhost' })
    })

    it('merges extra context after the parameter details', () => {
      const error = new InvalidParameterError('include', ['DO'], 'conflicts', { exclude: ['OMIM'] })

      expect(error.context).toEqual({
        parameterName: 'include',
        value: ['DO'],
        reason: 'conflicts',
        exclude: ['OMIM'],
      })
    })
  })

  describe('requireNonNull', () => {
    it('returns present values', () => {
      expect(requireNonNull(0, 'count')).toBe(0)
      expect(requireNonNull('', 'label')).toBe('')
    })

    it('throws for null and undefined', () => {
      expect(() => requireNonNull(null, 'store')).toThrow(InvalidParameterError)
      expect(() => requireNonNull(undefined, 'store')).toThrow(
        "Invalid parameter 'store': is required"
      )
    })
  })

  describe('requireNonEmptyString', () => {
    it('returns the string unchanged', () => {
      expect(requireNonEmptyString(' NCIt ', 'source')).toBe(' NCIt ')
    })

    it('rejects non-strings and blank strings', () => {
      expect(() => requireNonEmptyString(42, 'source')).toThrow(
        "Invalid parameter 'source': must be a string"
      )
      expect(() => requireNonEmptyString('   ', 'source')).toThrow(
        "Invalid parameter 'source': must not be empty"
      )
    })
  })

  describe('requireOneOf', () => {
    it('returns the allowed value', () => {
      expect(requireOneOf('warn', ['info', 'warn'], 'logLevel')).toBe('warn')
    })

    it('lists the allowed values', () => {
      expect(() => requireOneOf('trace', ['info', 'warn'], 'logLevel')).toThrow(
        "Invalid parameter 'logLevel': must be one of: info, warn"
      )
    })
  })

  describe('errorMessage', () => {
    it('reads messages from errors and stringifies the rest', () => {
      expect(errorMessage(new Error('connection reset'))).toBe('connection reset')
      expect(errorMessage('timeout')).toBe('timeout')
      expect(errorMessage(503)).toBe('503')
    })
  })
})
