import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  CONFIG_DIR,
  DEFAULT_CONFIG,
  deepMerge,
  expandEnvVars,
  expandEnvVarsInObject,
  findConfigDir,
  loadConfig,
  parseConfig,
  readDesiredStateDocument,
  resolveSettings
} from '../../src/lib/config-loader.js'
import {
  CircularExtendsError,
  DesiredStateInvalidError,
  DesiredStateNotFoundError,
  InvalidConfigError,
  UnknownHardwareProfileError
} from '../../src/lib/errors.js'

let tmpDir: string

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'netstate-config-'))
})

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true })
})

function writeConfig(file: string, content: string): string {
  const dir = path.join(tmpDir, CONFIG_DIR)
  fs.mkdirSync(dir, { recursive: true })
  const filePath = path.join(dir, file)
  fs.writeFileSync(filePath, content)
  return filePath
}

describe('expandEnvVars', () => {
  const env = { UNIFI_HOST: 'gw.lab', EMPTY: '' }

  it('expands ${VAR}, $VAR and defaults', () => {
    expect(expandEnvVars('https://${UNIFI_HOST}:8443', env)).toBe('https://gw.lab:8443')
    expect(expandEnvVars('https://$UNIFI_HOST', env)).toBe('https://gw.lab')
    expect(expandEnvVars('${MISSING:-fallback}', env)).toBe('fallback')
    expect(expandEnvVars('${EMPTY:-fallback}', env)).toBe('fallback')
    expect(expandEnvVars('${MISSING}', env)).toBe('')
  })

  it('walks nested structures', () => {
    expect(expandEnvVarsInObject({ a: ['$UNIFI_HOST', 1], b: { c: '${UNIFI_HOST}' } }, env))
      .toEqual({ a: ['gw.lab', 1], b: { c: 'gw.lab' } })
  })
})

describe('deepMerge', () => {
  it('merges mappings and lets source scalars win', () => {
    expect(deepMerge(
      { apply: { concurrency: 1, snapshot: true }, site: 'a' },
      { apply: { concurrency: 4 }, site: 'b' }
    )).toEqual({ apply: { concurrency: 4, snapshot: true }, site: 'b' })
  })
})

describe('findConfigDir', () => {
  it('finds .netstate in a parent directory', () => {
    writeConfig('config.yaml', 'version: "1"\n')
    const nested = path.join(tmpDir, 'a', 'b')
    fs.mkdirSync(nested, { recursive: true })
    expect(findConfigDir(nested)).toBe(path.join(tmpDir, CONFIG_DIR))
  })

  it('ignores a .netstate directory without config.yaml', () => {
    const nested = path.join(tmpDir, 'a', 'b', 'c', 'd')
    fs.mkdirSync(path.join(tmpDir, 'a', CONFIG_DIR), { recursive: true })
    fs.mkdirSync(nested, { recursive: true })
    expect(findConfigDir(nested)).toBeNull()
  })
})

describe('loadConfig', () => {
  it('merges the file over defaults and expands env vars', () => {
    writeConfig('config.yaml', [
      'controller:',
      '  url: https://${UNIFI_HOST:-unifi.local}:8443',
      'apply:',
      '  concurrency: 3'
    ].join('\n'))

    const { config, configDir } = loadConfig(tmpDir, { UNIFI_HOST: 'gw.lab' })

    expect(configDir).toBe(path.join(tmpDir, CONFIG_DIR))
    expect(config.controller?.url).toBe('https://gw.lab:8443')
    expect(config.apply?.concurrency).toBe(3)
    expect(config.apply?.snapshot).toBe(true)
    expect(config.snapshots?.driver).toBe('live-state')
    expect(config.desired_state).toBe('network.yaml')
  })

  it('applies config.local.yaml on top', () => {
    writeConfig('config.yaml', 'controller:\n  url: https://gw.lab\n  username: admin\n')
    writeConfig('config.local.yaml', 'controller:\n  password: test-secret\n')

    const { config } = loadConfig(tmpDir, {})
    expect(config.controller).toMatchObject({ url: 'https://gw.lab', username: 'admin', password: 'test-secret' })
  })

  it('follows extends', () => {
    fs.writeFileSync(path.join(tmpDir, 'base.yaml'), 'hardware_profile: usg3p\napply:\n  concurrency: 2\n')
    writeConfig('config.yaml', 'extends: ../base.yaml\napply:\n  snapshot: false\n')

    const { config } = loadConfig(tmpDir, {})
    expect(config.hardware_profile).toBe('usg3p')
    expect(config.apply).toMatchObject({ concurrency: 2, snapshot: false })
  })

  it('detects circular extends', () => {
    fs.writeFileSync(path.join(tmpDir, 'a.yaml'), 'extends: ./.netstate/config.yaml\n')
    writeConfig('config.yaml', 'extends: ../a.yaml\n')
    expect(() => loadConfig(tmpDir, {})).toThrow(CircularExtendsError)
  })

  it('rejects malformed YAML', () => {
    writeConfig('config.yaml', 'controller: [unclosed\n')
    expect(() => loadConfig(tmpDir, {})).toThrow(InvalidConfigError)
  })

  it('returns defaults when no config exists', () => {
    const isolated = path.join(tmpDir, 'x', 'y', 'z', 'w', 'v')
    fs.mkdirSync(isolated, { recursive: true })
    // search depth stops before leaving tmpDir
    const { config, configDir } = loadConfig(isolated, {})
    expect(configDir).toBeNull()
    expect(config).toEqual(DEFAULT_CONFIG)
  })
})

describe('parseConfig', () => {
  it('rejects out-of-range numbers', () => {
    expect(() => parseConfig({ apply: { concurrency: 0 } }, 'config.yaml'))
      .toThrow('Invalid config in config.yaml: apply.concurrency must be an integer >= 1')
  })

  it('rejects unknown snapshot drivers', () => {
    expect(() => parseConfig({ snapshots: { driver: 's3' } }))
      .toThrow('Invalid config: snapshots.driver must be one of live-state, controller')
  })

  it('requires max_segments on declared profiles', () => {
    expect(() => parseConfig({ hardware_profiles: { lab: { label: 'Lab' } } }))
      .toThrow('hardware_profiles.lab.max_segments is required')
  })

  it('reads declared profiles', () => {
    const config = parseConfig({ hardware_profiles: { lab: { label: 'Lab', max_segments: 6 } } })
    expect(config.hardware_profiles).toEqual({ lab: { label: 'Lab', max_segments: 6 } })
  })
})

describe('resolveSettings', () => {
  it('uses config over environment, and overrides over both', () => {
    writeConfig('config.yaml', 'controller:\n  url: https://from-config\n  site: lab\n')
    const loaded = loadConfig(tmpDir, {})
    const env = {
      UNIFI_CONTROLLER_URL: 'https://from-env',
      UNIFI_USERNAME: 'admin',
      UNIFI_PASSWORD: 'test-secret',
      UNIFI_SITE: 'env-site'
    }

    const fromConfig = resolveSettings(loaded, {}, { env, cwd: tmpDir })
    expect(fromConfig.controller).toEqual({
      url: 'https://from-config',
      username: 'admin',
      password: 'test-secret',
      site: 'lab',
      unifiOs: false,
      timeoutMs: 30000,
      verifySsl: true
    })

    const overridden = resolveSettings(loaded, { controller: 'memory://rehearsal', site: 'cli-site' }, { env, cwd: tmpDir })
    expect(overridden.controller.url).toBe('memory://rehearsal')
    expect(overridden.controller.site).toBe('cli-site')
  })

  it('falls back to environment, then defaults', () => {
    const loaded = { config: DEFAULT_CONFIG, configDir: null }

    const fromEnv = resolveSettings(loaded, {}, {
      env: { UNIFI_CONTROLLER_URL: 'https://from-env', UNIFI_SITE: 'env-site', HARDWARE_PROFILE: 'usg3p' },
      cwd: tmpDir
    })
    expect(fromEnv.controller.url).toBe('https://from-env')
    expect(fromEnv.controller.site).toBe('env-site')
    expect(fromEnv.hardwareProfile.id).toBe('usg3p')

    const defaults = resolveSettings(loaded, {}, { env: {}, cwd: tmpDir })
    expect(defaults.controller.url).toBe('')
    expect(defaults.controller.site).toBe('default')
    expect(defaults.hardwareProfile.id).toBe('udm-pro')
    expect(defaults.apply).toEqual({
      concurrency: 1,
      snapshot: true,
      retry: { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 10000, backoffMultiplier: 2 }
    })
  })

  it('reads certificate verification from config, then UNIFI_VERIFY_SSL', () => {
    const loaded = { config: DEFAULT_CONFIG, configDir: null }
    const verifyWith = (value: string) =>
      resolveSettings(loaded, {}, { env: { UNIFI_VERIFY_SSL: value }, cwd: tmpDir }).controller.verifySsl

    expect(verifyWith('false')).toBe(false)
    expect(verifyWith('0')).toBe(false)
    expect(verifyWith('TRUE')).toBe(true)
    expect(verifyWith('')).toBe(true)

    writeConfig('config.yaml', 'controller:\n  verify_ssl: false\n')
    const fromConfig = resolveSettings(loadConfig(tmpDir, {}), {}, { env: { UNIFI_VERIFY_SSL: 'true' }, cwd: tmpDir })
    expect(fromConfig.controller.verifySsl).toBe(false)
  })

  it('rejects a non-boolean verify_ssl', () => {
    expect(() => parseConfig({ controller: { verify_ssl: 'no' } }))
      .toThrow('controller.verify_ssl must be true or false')
  })

  it('resolves paths against the project root and the working directory', () => {
    writeConfig('config.yaml', 'desired_state: net/site.yaml\n')
    const loaded = loadConfig(tmpDir, {})
    const cwd = path.join(tmpDir, 'sub')

    const settings = resolveSettings(loaded, {}, { env: {}, cwd })
    expect(settings.rootDir).toBe(tmpDir)
    expect(settings.desiredStatePath).toBe(path.join(tmpDir, 'net', 'site.yaml'))
    expect(settings.snapshots.dir).toBe(path.join(tmpDir, CONFIG_DIR, 'snapshots'))

    const withFile = resolveSettings(loaded, { file: 'lab.yaml' }, { env: {}, cwd })
    expect(withFile.desiredStatePath).toBe(path.join(cwd, 'lab.yaml'))
  })

  it('applies apply overrides and retry config', () => {
    writeConfig('config.yaml', 'apply:\n  concurrency: 2\n  retry:\n    max_attempts: 2\n    base_delay_ms: 50\n')
    const loaded = loadConfig(tmpDir, {})

    const settings = resolveSettings(loaded, { concurrency: 6, snapshot: false }, { env: {} })
    expect(settings.apply.concurrency).toBe(6)
    expect(settings.apply.snapshot).toBe(false)
    expect(settings.apply.retry).toEqual({ maxAttempts: 2, baseDelayMs: 50, maxDelayMs: 10000, backoffMultiplier: 2 })
  })

  it('resolves declared hardware profiles', () => {
    writeConfig('config.yaml', 'hardware_profile: lab\nhardware_profiles:\n  lab:\n    max_segments: 2\n')
    const settings = resolveSettings(loadConfig(tmpDir, {}), {}, { env: {} })
    expect(settings.hardwareProfile).toEqual({ id: 'lab', label: 'lab', maxSegments: 2 })
  })

  it('throws for an unknown profile', () => {
    expect(() => resolveSettings({ config: DEFAULT_CONFIG, configDir: null }, { profile: 'nope' }, { env: {}, cwd: tmpDir }))
      .toThrow(UnknownHardwareProfileError)
  })
})

describe('readDesiredStateDocument', () => {
  it('parses YAML', () => {
    const file = path.join(tmpDir, 'network.yaml')
    fs.writeFileSync(file, 'segments:\n  - vlan: 30\n    name: iot\n')
    expect(readDesiredStateDocument(file)).toEqual({ segments: [{ vlan: 30, name: 'iot' }] })
  })

  it('throws when the file is missing', () => {
    expect(() => readDesiredStateDocument(path.join(tmpDir, 'missing.yaml'))).toThrow(DesiredStateNotFoundError)
  })

  it('reports syntax errors as a structural violation', () => {
    const file = path.join(tmpDir, 'network.yaml')
    fs.writeFileSync(file, 'segments: [unclosed\n')
    try {
      readDesiredStateDocument(file)
      expect.unreachable('should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(DesiredStateInvalidError)
      if (err instanceof DesiredStateInvalidError) {
        expect(err.stage).toBe('structural')
        expect(err.violations).toHaveLength(1)
        expect(err.violations[0]).toMatchObject({ field: '(document)', rule: 'document.syntax', value: 'network.yaml' })
      }
    }
  })
})
