import { describe, it, expect } from 'vitest'
import {
  BUILTIN_HARDWARE_PROFILES,
  buildProfileRegistry,
  resolveHardwareProfile
} from '../../src/lib/hardware-profiles.js'
import { UnknownHardwareProfileError } from '../../src/lib/errors.js'

describe('resolveHardwareProfile', () => {
  it('resolves built-in profiles case-insensitively', () => {
    expect(resolveHardwareProfile('USG3P')).toEqual({ id: 'usg3p', label: 'UniFi Security Gateway 3P', maxSegments: 3 })
    expect(resolveHardwareProfile(' udm-pro ').maxSegments).toBe(31)
  })

  it('throws with the known ids for unknown profiles', () => {
    expect(() => resolveHardwareProfile('edgerouter-x')).toThrow(UnknownHardwareProfileError)
    try {
      resolveHardwareProfile('edgerouter-x')
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownHardwareProfileError)
      if (err instanceof UnknownHardwareProfileError) {
        expect(err.context?.knownProfiles).toEqual(Object.keys(BUILTIN_HARDWARE_PROFILES).sort())
      }
    }
  })

  it('does not resolve properties inherited from Object.prototype', () => {
    expect(() => resolveHardwareProfile('constructor')).toThrow(UnknownHardwareProfileError)
    expect(() => resolveHardwareProfile('__proto__')).toThrow(UnknownHardwareProfileError)
    expect(() => resolveHardwareProfile('toString', buildProfileRegistry({ lab: { max_segments: 2 } }))).toThrow(UnknownHardwareProfileError)
  })
})

describe('buildProfileRegistry', () => {
  it('adds declared profiles', () => {
    const registry = buildProfileRegistry({ 'Lab-Router': { label: 'Lab router', max_segments: 8 } })
    expect(resolveHardwareProfile('lab-router', registry)).toEqual({ id: 'lab-router', label: 'Lab router', maxSegments: 8 })
  })

  it('overrides a built-in ceiling and keeps its label', () => {
    const registry = buildProfileRegistry({ usg3p: { max_segments: 5 } })
    expect(resolveHardwareProfile('usg3p', registry)).toEqual({ id: 'usg3p', label: 'UniFi Security Gateway 3P', maxSegments: 5 })
  })

  it('falls back to the id as label', () => {
    const registry = buildProfileRegistry({ custom: { max_segments: 2 } })
    expect(resolveHardwareProfile('custom', registry).label).toBe('custom')
  })
})
