import { describe, it, expect } from 'vitest'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { validate } from '../src/domain/validator.js'
import { loadConfig, readDesiredStateDocument, resolveSettings } from '../src/lib/config-loader.js'

const EXAMPLE_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'examples', 'home-lab')

describe('home-lab example', () => {
  it('validates against the profile its config names', () => {
    const loaded = loadConfig(EXAMPLE_DIR, {})
    const settings = resolveSettings(loaded, {}, { cwd: EXAMPLE_DIR, env: {} })

    const result = validate(readDesiredStateDocument(settings.desiredStatePath), settings.hardwareProfile)

    expect(settings.hardwareProfile.id).toBe('usg3p')
    expect(result.ok).toBe(true)
  })
})
