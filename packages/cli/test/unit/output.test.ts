import { describe, it, expect, vi, afterEach } from 'vitest'
import { bold, dim, formatError, stderrSink } from '../../src/output.js'

function setTTY(stream: NodeJS.WriteStream, value: boolean | undefined): void {
  Object.defineProperty(stream, 'isTTY', { value, configurable: true })
}

describe('formatError', () => {
  it('formats Error instances with name and message', () => {
    expect(formatError(new Error('something broke'))).toBe('Error: something broke')
  })

  it('uses the name of custom error classes', () => {
    class CustomError extends Error {
      constructor(message: string) {
        super(message)
        this.name = 'CustomError'
      }
    }
    expect(formatError(new CustomError('bad'))).toBe('CustomError: bad')
  })

  it('stringifies non-Error values', () => {
    expect(formatError('string error')).toBe('string error')
    expect(formatError(42)).toBe('42')
    expect(formatError(null)).toBe('null')
  })
})

describe('bold and dim', () => {
  afterEach(() => {
    setTTY(process.stdout, undefined)
  })

  it('return plain text when stdout is not a TTY', () => {
    setTTY(process.stdout, false)
    expect(bold('hello')).toBe('hello')
    expect(dim('hello')).toBe('hello')
  })

  it('return plain text when stdout.isTTY is undefined', () => {
    setTTY(process.stdout, undefined)
    expect(bold('hello')).toBe('hello')
  })

  it('wrap text in ANSI codes on a TTY', () => {
    setTTY(process.stdout, true)
    expect(bold('hello')).toBe('\x1b[1mhello\x1b[22m')
    expect(dim('hello')).toBe('\x1b[2mhello\x1b[22m')
  })
})

describe('stderrSink', () => {
  let stderrOutput: string

  afterEach(() => {
    setTTY(process.stderr, undefined)
  })

  function capture(): void {
    stderrOutput = ''
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
  }

  it('writes info lines as they are', () => {
    capture()
    stderrSink('info', 'Created ~/Applications/Example.app: id:ABCDE12345')
    expect(stderrOutput).toBe('Created ~/Applications/Example.app: id:ABCDE12345\n')
  })

  it('prefixes warnings and errors', () => {
    capture()
    stderrSink('warn', 'careful')
    stderrSink('error', 'broken')
    expect(stderrOutput).toBe('warning: careful\nerror: broken\n')
  })

  it('dims debug lines only on a terminal', () => {
    capture()
    setTTY(process.stderr, false)
    stderrSink('debug', 'detail')
    setTTY(process.stderr, true)
    stderrSink('debug', 'detail')
    expect(stderrOutput).toBe('detail\n\x1b[2mdetail\x1b[22m\n')
  })
})
