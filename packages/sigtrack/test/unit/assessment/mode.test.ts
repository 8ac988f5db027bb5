import { describe, it, expect } from 'vitest'
import { inferAssessmentMode } from '../../../src/assessment/mode.js'

describe('inferAssessmentMode', () => {
  it.each([
    '/Library/PreferencePanes/Example.prefPane',
    '/Library/Internet Plug-Ins/Example.plugin',
    '/Library/Audio/Plug-Ins/Components/Example.bundle',
    '/Library/Updates/Example.pkg',
  ])('uses open mode for %s', (targetPath) => {
    expect(inferAssessmentMode(targetPath)).toBe('open')
  })

  it.each([
    '/Applications/Example.app',
    '/Users/tester/Library/PreferencePanes/Example.prefPane',
    '/System/Library/PreferencePanes/Example.prefPane',
    '/Library/Application Support/Example/helper',
  ])('uses execute mode for %s', (targetPath) => {
    expect(inferAssessmentMode(targetPath)).toBe('execute')
  })
})
