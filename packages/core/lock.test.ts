import { describe, it, expect } from 'vitest'
import { KeyedMutex } from './lock.js'

function tick(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0))
}

describe('KeyedMutex', () => {
  it('runs holders of one key one at a time, in order', async () => {
    const mutex = new KeyedMutex()
    const log: string[] = []

    const task = (name: string) => mutex.runExclusive('u1', async () => {
      log.push(`${name}:start`)
      await tick()
      log.push(`${name}:end`)
      return name
    })

    const results = await Promise.all([task('a'), task('b'), task('c')])

    expect(results).toEqual(['a', 'b', 'c'])
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end'])
  })

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex()
    const log: string[] = []

    await Promise.all([
      mutex.runExclusive('u1', async () => {
        log.push('u1:start')
        await tick()
        log.push('u1:end')
      }),
      mutex.runExclusive('u2', async () => {
        log.push('u2:start')
        await tick()
        log.push('u2:end')
      })
    ])

    expect(log.indexOf('u2:start')).toBeLessThan(log.indexOf('u1:end'))
  })

  it('releases the key after a failure', async () => {
    const mutex = new KeyedMutex()

    await expect(mutex.runExclusive('u1', async () => {
      throw new Error('boom')
    })).rejects.toThrow('boom')

    expect(await mutex.runExclusive('u1', async () => 'next')).toBe('next')
    expect(mutex.size).toBe(0)
  })
})
