/**
 * Timeout utilities tests
 */

import { describe, it, expect } from 'vitest'
import { withTimeout } from '../src/lib/timeout.js'
import { TimeoutError } from '../src/lib/errors.js'

describe('withTimeout', () => {
  it('should resolve when promise completes before timeout', async () => {
    const fastPromise = new Promise<string>((resolve) => {
      setTimeout(() => resolve('success'), 20)
    })

    const result = await withTimeout(fastPromise, 1000, 'fast operation')
    expect(result).toBe('success')
  })

  it('should reject when promise exceeds timeout', async () => {
    const slowPromise = new Promise<string>((resolve) => {
      setTimeout(() => resolve('too late'), 500)
    })

    await expect(
      withTimeout(slowPromise, 50, 'slow operation')
    ).rejects.toThrow('Operation timed out after 50ms: slow operation')
  })

  it('should reject with original error when promise fails before timeout', async () => {
    const failingPromise = new Promise<string>((_, reject) => {
      setTimeout(() => reject(new Error('original error')), 20)
    })

    await expect(
      withTimeout(failingPromise, 1000, 'failing operation')
    ).rejects.toThrow('original error')
  })

  it('should handle immediate resolution', async () => {
    const result = await withTimeout(Promise.resolve('immediate'), 1000, 'immediate operation')
    expect(result).toBe('immediate')
  })

  it('should not apply a timeout when disabled', async () => {
    const slowPromise = new Promise<string>((resolve) => {
      setTimeout(() => resolve('eventually'), 30)
    })

    await expect(withTimeout(slowPromise, 0, 'untimed')).resolves.toBe('eventually')
  })

  it('should abort the controller with the timeout error', async () => {
    const controller = new AbortController()
    const never = new Promise<string>(() => {})

    const error = await withTimeout(never, 10, 'op-001-b', controller).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TimeoutError)
    expect(controller.signal.aborted).toBe(true)
    expect(controller.signal.reason).toBe(error)
  })

  it('should leave the controller alone when the work finishes in time', async () => {
    const controller = new AbortController()

    await withTimeout(Promise.resolve(1), 50, 'quick', controller)

    expect(controller.signal.aborted).toBe(false)
  })
})
