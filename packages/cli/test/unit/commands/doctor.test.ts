import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

const mockRunDoctor = vi.fn()

vi.mock('sigtrack', async (importOriginal) => ({
  ...(await importOriginal<typeof import('sigtrack')>()),
  runDoctor: mockRunDoctor,
}))

const MISSING_CONFIG_DIR = '/nonexistent/sigtrack-config'

describe('doctorCommand', () => {
  let stdoutOutput: string
  let stderrOutput: string

  beforeEach(() => {
    stdoutOutput = ''
    stderrOutput = ''
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk)
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk)
      return true
    })
  })

  afterEach(() => {
    vi.clearAllMocks()
  })

  it('prints each check and returns 0 when ready', async () => {
    mockRunDoctor.mockResolvedValue({
      ready: true,
      checks: [
        { name: 'platform', status: 'ok', version: 'darwin' },
        { name: 'spctl', status: 'ok', version: 'assessments enabled' },
      ],
      warnings: [],
      nextSteps: [],
    })
    const { doctorCommand } = await import('../../../src/commands/doctor.js')

    const code = await doctorCommand(['--config-dir', MISSING_CONFIG_DIR])

    expect(code).toBe(0)
    expect(stdoutOutput).toBe(
      '  ✓ platform (darwin)\n  ✓ spctl (assessments enabled)\n\nSystem ready.\n',
    )
  })

  it('probes the spctl binary from config', async () => {
    mockRunDoctor.mockResolvedValue({ ready: true, checks: [], warnings: [], nextSteps: [] })
    const { doctorCommand } = await import('../../../src/commands/doctor.js')

    await doctorCommand(['--config-dir', MISSING_CONFIG_DIR])

    expect(mockRunDoctor).toHaveBeenCalledWith({ spctlPath: 'spctl' })
  })

  it('prints warnings', async () => {
    mockRunDoctor.mockResolvedValue({
      ready: true,
      checks: [],
      warnings: ['sw_vers did not pass'],
      nextSteps: [],
    })
    const { doctorCommand } = await import('../../../src/commands/doctor.js')

    await doctorCommand(['--config-dir', MISSING_CONFIG_DIR])

    expect(stdoutOutput).toContain('\nWarnings:\n  ⚠ sw_vers did not pass\n')
  })

  it('prints next steps and returns 1 when not ready', async () => {
    mockRunDoctor.mockResolvedValue({
      ready: false,
      checks: [{ name: 'spctl', status: 'disabled', reason: 'Gatekeeper assessments are disabled' }],
      warnings: [],
      nextSteps: ['Re-enable Gatekeeper assessments: sudo spctl --master-enable'],
    })
    const { doctorCommand } = await import('../../../src/commands/doctor.js')

    const code = await doctorCommand(['--config-dir', MISSING_CONFIG_DIR])

    expect(code).toBe(1)
    expect(stdoutOutput).toContain('  ✗ spctl — Gatekeeper assessments are disabled\n')
    expect(stdoutOutput).toContain(
      '\nNext steps:\n  → Re-enable Gatekeeper assessments: sudo spctl --master-enable\n',
    )
  })

  it('reports errors from the checks on stderr', async () => {
    mockRunDoctor.mockRejectedValue(new Error('boom'))
    const { doctorCommand } = await import('../../../src/commands/doctor.js')

    expect(await doctorCommand(['--config-dir', MISSING_CONFIG_DIR])).toBe(1)
    expect(stderrOutput).toBe('Error: boom\n')
  })
})
