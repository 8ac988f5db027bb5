import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ScriptedAssessor, TempStore } from '@sigtrack/test-helpers'
import { UsageError } from 'sigtrack'
import { checkCommand, parseCheckArgs } from '../../../src/commands/check.js'
import type { CommandDeps } from '../../../src/types.js'

const NOW = new Date('2024-05-01T12:00:00.000Z')
const SIGNER = 'Developer ID Application: Example Corp (ABCDE12345)'
const OTHER_SIGNER = 'Developer ID Application: Other Corp (ZZZZZ99999)'
const KEY = '~/Applications/Example.app'

describe('parseCheckArgs', () => {
  it('defaults to checking every tracked path', () => {
    expect(parseCheckArgs([])).toEqual({
      targets: [],
      add: false,
      freshen: false,
      verbosity: 0,
      store: undefined,
      configDir: undefined,
      noHome: undefined,
    })
  })

  it('treats --update as --add plus --freshen', () => {
    const options = parseCheckArgs(['-u', '/Applications/Example.app'])
    expect(options.add).toBe(true)
    expect(options.freshen).toBe(true)
    expect(options.targets).toEqual(['/Applications/Example.app'])
  })

  it('reads store location options', () => {
    const options = parseCheckArgs(['--store', 'tracked.json', '--config-dir', '/tmp/c', '--no-home'])
    expect(options.store).toBe('tracked.json')
    expect(options.configDir).toBe('/tmp/c')
    expect(options.noHome).toBe(true)
  })

  it('maps -v and -q to verbosity', () => {
    expect(parseCheckArgs(['-v']).verbosity).toBe(1)
    expect(parseCheckArgs(['-q']).verbosity).toBe(-1)
  })

  it('rejects --add without paths', () => {
    expect(() => parseCheckArgs(['--add'])).toThrow(new UsageError('--add requires at least one path'))
  })

  it('rejects --verbose with --quiet', () => {
    expect(() => parseCheckArgs(['-v', '-q'])).toThrow(UsageError)
  })

  it('rejects unknown flags', () => {
    expect(() => parseCheckArgs(['--bogus'])).toThrow(UsageError)
  })
})

describe('checkCommand', () => {
  let temp: TempStore
  let target: string
  let assessor: ScriptedAssessor
  let deps: CommandDeps
  let stderrOutput: string

  beforeEach(async () => {
    temp = await TempStore.create()
    target = await temp.makeTarget('Applications/Example.app')
    assessor = new ScriptedAssessor()
    deps = { assessor, homeDir: temp.dir, now: () => NOW }
    stderrOutput = ''
    Object.defineProperty(process.stderr, 'isTTY', { value: false, configurable: true })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
  })

  afterEach(async () => {
    Object.defineProperty(process.stderr, 'isTTY', { value: undefined, configurable: true })
    await temp.cleanup()
  })

  function run(...args: string[]): Promise<number> {
    return checkCommand(['--config-dir', temp.dir, ...args], deps)
  }

  it('records a new target with --add', async () => {
    assessor.accept(target, SIGNER)

    const code = await run('--add', target)

    expect(code).toBe(0)
    expect(stderrOutput).toBe(`Created ${KEY}: id:ABCDE12345\n`)
    expect(await temp.readRaw()).toEqual({
      [KEY]: { last_updated: '2024-05-01T12:00:00.000Z', originator: 'id:ABCDE12345' },
    })
    expect(assessor.calls).toEqual([{ path: target, mode: 'execute' }])
  })

  it('keys new records by absolute path with --no-home', async () => {
    assessor.accept(target, SIGNER)

    expect(await run('--add', '--no-home', target)).toBe(0)
    expect(await temp.readRaw()).toEqual({
      [target]: { last_updated: '2024-05-01T12:00:00.000Z', originator: 'id:ABCDE12345' },
    })
  })

  it('fails an untracked target without --add and writes nothing', async () => {
    assessor.accept(target, SIGNER)

    const code = await run(target)

    expect(code).toBe(1)
    expect(stderrOutput).toBe(`error: ${KEY}: not tracked, and adding is disabled\n`)
    expect(assessor.calls).toEqual([])
    await expect(temp.readRaw()).rejects.toThrow('ENOENT')
  })

  it('verifies every tracked path when none are given', async () => {
    await temp.writeRaw({ [KEY]: { originator: 'id:ABCDE12345' } })
    assessor.accept(target, SIGNER)

    const code = await run()

    expect(code).toBe(0)
    expect(stderrOutput).toBe(`Verified ${KEY} (originator id:ABCDE12345)\n`)
    expect(await temp.readRaw()).toEqual({ [KEY]: { originator: 'id:ABCDE12345' } })
  })

  it('prints nothing for successful verification with --quiet', async () => {
    await temp.writeRaw({ [KEY]: { originator: 'id:ABCDE12345' } })
    assessor.accept(target, SIGNER)

    expect(await run('-q')).toBe(0)
    expect(stderrOutput).toBe('')
  })

  it('fails when the originator changed', async () => {
    await temp.writeRaw({ [KEY]: { originator: 'id:ABCDE12345' } })
    assessor.accept(target, OTHER_SIGNER)

    const code = await run(target)

    expect(code).toBe(1)
    expect(stderrOutput).toBe(
      `error: ${KEY}: Originator changed from id:ABCDE12345 to ${OTHER_SIGNER}\n`,
    )
    expect(await temp.readRaw()).toEqual({ [KEY]: { originator: 'id:ABCDE12345' } })
  })

  it('overwrites a changed originator with --update and warns', async () => {
    await temp.writeRaw({ [KEY]: { originator: 'id:ABCDE12345' } })
    assessor.accept(target, OTHER_SIGNER)

    const code = await run('--update', target)

    expect(code).toBe(0)
    expect(stderrOutput).toBe(
      `warning: ${KEY}: Originator changing from id:ABCDE12345 to id:ZZZZZ99999\n`,
    )
    expect(await temp.readRaw()).toEqual({
      [KEY]: { last_updated: '2024-05-01T12:00:00.000Z', originator: 'id:ZZZZZ99999' },
    })
  })

  it('reports a rejected assessment with its diagnostic', async () => {
    assessor.reject(target, 'a sealed resource is missing or invalid')

    const code = await run('--add', target)

    expect(code).toBe(1)
    expect(stderrOutput).toBe(
      `error: ${KEY}: Assessment of ${target} failed with status 3\n` +
        `error: ${target}: rejected\na sealed resource is missing or invalid\n`,
    )
  })

  it('fails when an explicit target does not exist', async () => {
    const missing = `${temp.dir}/Applications/Missing.app`

    const code = await run('--add', missing)

    expect(code).toBe(1)
    expect(stderrOutput).toBe(`TargetNotFoundError: No such file or directory: ${missing}\n`)
  })

  it('prints usage for invalid arguments', async () => {
    const code = await run('--add')

    expect(code).toBe(1)
    expect(stderrOutput).toContain('UsageError: --add requires at least one path\n')
    expect(stderrOutput).toContain('Usage: sigtrack check')
  })

  it('reports a malformed expectations file', async () => {
    await temp.writeRaw({ [KEY]: { originator: 42 } })

    const code = await run()

    expect(code).toBe(1)
    expect(stderrOutput).toBe(
      `StoreFormatError: Record for ${KEY}: originator must be a string\n`,
    )
  })
})
