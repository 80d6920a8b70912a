/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  findConfigDir,
  loadConfig,
  loadConfigFromPath,
  configExists,
  createDefaultConfig,
  validateConfig,
  deepMerge,
  expandEnvVars,
  getProjectRoot,
  DEFAULT_CONFIG
} from '../../src/lib/config-loader.js'
import { CircularExtendsError, ConfigNotFoundError, InvalidConfigError } from '../../src/lib/errors.js'

describe('config-loader', () => {
  let tempDir: string
  let originalEnv: NodeJS.ProcessEnv

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'regraft-config-test-'))
    originalEnv = { ...process.env }
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    process.env = originalEnv
  })

  function writeConfig(dir: string, content: string, file = 'config.yaml'): string {
    const configDir = path.join(dir, '.regraft')
    fs.mkdirSync(configDir, { recursive: true })
    const configPath = path.join(configDir, file)
    fs.writeFileSync(configPath, content)
    return configPath
  }

  describe('findConfigDir', () => {
    it('should find .regraft directory in current directory', () => {
      writeConfig(tempDir, 'version: "1"')

      expect(findConfigDir(tempDir)).toBe(path.join(tempDir, '.regraft'))
    })

    it('should find .regraft directory in parent directory', () => {
      const childDir = path.join(tempDir, 'subdir')
      fs.mkdirSync(childDir)
      writeConfig(tempDir, 'version: "1"')

      expect(findConfigDir(childDir)).toBe(path.join(tempDir, '.regraft'))
      expect(configExists(childDir)).toBe(true)
    })

    it('should return null when no .regraft directory found', () => {
      expect(findConfigDir(tempDir)).toBeNull()
      expect(configExists(tempDir)).toBe(false)
    })

    it('should not find config beyond max search depth', () => {
      let deepDir = tempDir
      for (let i = 0; i < 10; i++) {
        deepDir = path.join(deepDir, `level${i}`)
        fs.mkdirSync(deepDir)
      }
      writeConfig(tempDir, 'version: "1"')

      expect(findConfigDir(deepDir)).toBeNull()
    })
  })

  describe('loadConfig', () => {
    it('should return defaults when no config exists', () => {
      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG)
    })

    it('should merge a partial config over the defaults', () => {
      writeConfig(tempDir, 'execution:\n  parallelism: 2\n')

      const config = loadConfig(tempDir)

      expect(config.execution).toEqual({ parallelism: 2, fail_fast: false, timeout_ms: 0 })
      expect(config.archive).toEqual({ enabled: true, redirect_dir: 'artifacts/redirects' })
      expect(config.store).toBe('.regraft/store')
    })

    it('should replace lists instead of merging them', () => {
      writeConfig(tempDir, 'knowledge:\n  include:\n    - "**/*.adoc"\n')

      expect(loadConfig(tempDir).knowledge?.include).toEqual(['**/*.adoc'])
    })

    it('should apply config.local.yaml overrides', () => {
      writeConfig(tempDir, 'execution:\n  fail_fast: false\n')
      writeConfig(tempDir, 'execution:\n  fail_fast: true\n', 'config.local.yaml')

      expect(loadConfig(tempDir).execution?.fail_fast).toBe(true)
    })

    it('should expand environment variables', () => {
      delete process.env.REGRAFT_TEST_STORE
      process.env.REGRAFT_TEST_PLAN = 'plans/q3.yaml'
      writeConfig(tempDir, 'store: ${REGRAFT_TEST_STORE:-fallback-store}\nplan: $REGRAFT_TEST_PLAN\n')

      const config = loadConfig(tempDir)

      expect(config.store).toBe('fallback-store')
      expect(config.plan).toBe('plans/q3.yaml')
    })
  })

  describe('extends', () => {
    it('should inherit from a parent config', () => {
      const basePath = path.join(tempDir, 'base.yaml')
      fs.writeFileSync(basePath, 'store: shared-store\nexecution:\n  timeout_ms: 5000\n')
      const configPath = writeConfig(tempDir, 'extends: ../base.yaml\nplan: custom.yaml\nexecution:\n  parallelism: 8\n')

      const config = loadConfigFromPath(configPath)

      expect(config.store).toBe('shared-store')
      expect(config.plan).toBe('custom.yaml')
      expect(config.execution).toEqual({ parallelism: 8, fail_fast: false, timeout_ms: 5000 })
    })

    it('should detect circular inheritance', () => {
      fs.writeFileSync(path.join(tempDir, 'a.yaml'), 'extends: b.yaml\n')
      fs.writeFileSync(path.join(tempDir, 'b.yaml'), 'extends: a.yaml\n')

      expect(() => loadConfigFromPath(path.join(tempDir, 'a.yaml'))).toThrow(CircularExtendsError)
    })

    it('should fail when the parent is missing', () => {
      const configPath = writeConfig(tempDir, 'extends: ../missing.yaml\n')

      expect(() => loadConfigFromPath(configPath)).toThrow(ConfigNotFoundError)
    })
  })

  describe('validateConfig', () => {
    it('should reject invalid numbers and versions', () => {
      expect(() => validateConfig({ version: '2', execution: { parallelism: 0 } }, 'cfg.yaml')).toThrow(
        'Invalid config in cfg.yaml: config: unsupported version "2" (expected "1"); execution: parallelism must be an integer >= 1'
      )
    })

    it('should reject a config that is not a mapping', () => {
      const configPath = writeConfig(tempDir, '- one\n- two\n')

      expect(() => loadConfigFromPath(configPath)).toThrow(InvalidConfigError)
    })

    it('should reject malformed YAML', () => {
      const configPath = writeConfig(tempDir, 'execution: [unclosed\n')

      expect(() => loadConfigFromPath(configPath)).toThrow(InvalidConfigError)
    })

    it('should accept camelCase keys', () => {
      const config = validateConfig({ execution: { failFast: true, timeoutMs: 100 } })

      expect(config.execution).toEqual({ parallelism: undefined, fail_fast: true, timeout_ms: 100 })
    })
  })

  describe('createDefaultConfig', () => {
    it('should write a loadable config and a sample plan', () => {
      const { configPath, planPath } = createDefaultConfig(tempDir, 'platform')

      expect(configPath).toBe(path.join(tempDir, '.regraft', 'config.yaml'))
      expect(fs.readFileSync(planPath, 'utf-8').split('\n')).toContain('target: platform')

      const config = loadConfigFromPath(configPath)
      expect(config.knowledge?.include).toEqual(['**/*.md', '**/*.rst', 'docs/**/*.txt'])
      expect(config.execution?.parallelism).toBe(4)
    })

    it('should keep an existing merge plan', () => {
      const planPath = path.join(tempDir, 'merge-plan.yaml')
      fs.writeFileSync(planPath, 'target: mine\n')

      createDefaultConfig(tempDir, 'platform')

      expect(fs.readFileSync(planPath, 'utf-8')).toBe('target: mine\n')
    })
  })

  describe('helpers', () => {
    it('should expand variable syntaxes', () => {
      process.env.REGRAFT_TEST_A = 'alpha'
      delete process.env.REGRAFT_TEST_MISSING

      expect(expandEnvVars('${REGRAFT_TEST_A}/x')).toBe('alpha/x')
      expect(expandEnvVars('$REGRAFT_TEST_A-y')).toBe('alpha-y')
      expect(expandEnvVars('${REGRAFT_TEST_MISSING:-dflt}')).toBe('dflt')
      expect(expandEnvVars('${REGRAFT_TEST_MISSING}')).toBe('')
    })

    it('should deep merge mappings and replace scalars and lists', () => {
      expect(deepMerge(
        { a: { b: 1, c: [1, 2] }, d: 'x' },
        { a: { c: [3] }, d: 'y', e: true }
      )).toEqual({ a: { b: 1, c: [3] }, d: 'y', e: true })
    })

    it('should resolve the project root from the config directory', () => {
      expect(getProjectRoot('/work/repo/.regraft')).toBe('/work/repo')
      expect(getProjectRoot(null, tempDir)).toBe(path.resolve(tempDir))
    })
  })
})
