import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { loadConfig } from '../src/config.js'

describe('loadConfig', () => {
  let tempDir: string
  let missingPath: string
  let warnSpy: MockInstance<typeof console.warn>

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'daybrief-config-'))
    missingPath = path.join(tempDir, 'missing.yaml')
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  function writeYaml(content: string): string {
    const file = path.join(tempDir, 'daybrief.yaml')
    fs.writeFileSync(file, content, 'utf-8')
    return file
  }

  it('uses defaults when nothing is set', () => {
    const config = loadConfig({ env: {}, configPath: missingPath })

    expect(config).toEqual({
      timeZone: 'Asia/Tokyo',
      locale: 'ja',
      showMemo: true,
      showLinks: true,
      memoMaxLength: 180,
      interMessageDelayMs: 250,
      referenceInstant: undefined,
      calendarPath: 'data/timetree.ics',
    })
    expect(warnSpy).not.toHaveBeenCalled()
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      env: {
        DAYBRIEF_TIMEZONE: 'UTC',
        SHOW_MEMO: 'off',
        SHOW_LINKS: 'YES',
        MEMO_MAX_LENGTH: '50',
        INTER_MESSAGE_DELAY_MS: '0',
        ICS_PATH: '/tmp/cal.ics',
      },
      configPath: missingPath,
    })

    expect(config.timeZone).toBe('UTC')
    expect(config.showMemo).toBe(false)
    expect(config.showLinks).toBe(true)
    expect(config.memoMaxLength).toBe(50)
    expect(config.interMessageDelayMs).toBe(0)
    expect(config.calendarPath).toBe('/tmp/cal.ics')
  })

  it('reads the reference instant in the configured zone', () => {
    const config = loadConfig({ env: { DAYBRIEF_NOW: '2024-06-01T12:00' }, configPath: missingPath })
    expect(config.referenceInstant?.toISO()).toBe('2024-06-01T12:00:00.000+09:00')
  })

  it('falls back to defaults for invalid values and warns', () => {
    const config = loadConfig({
      env: {
        DAYBRIEF_TIMEZONE: 'Mars/Olympus',
        SHOW_LINKS: 'maybe',
        MEMO_MAX_LENGTH: 'abc',
        INTER_MESSAGE_DELAY_MS: '-5',
        DAYBRIEF_NOW: 'yesterday',
      },
      configPath: missingPath,
    })

    expect(config.timeZone).toBe('Asia/Tokyo')
    expect(config.showLinks).toBe(true)
    expect(config.memoMaxLength).toBe(180)
    expect(config.interMessageDelayMs).toBe(250)
    expect(config.referenceInstant).toBeUndefined()
    expect(warnSpy).toHaveBeenCalledTimes(5)
  })

  it('reads the YAML file, with the environment taking precedence', () => {
    const configPath = writeYaml(
      ['timeZone: Europe/London', 'showMemo: false', 'memoMaxLength: 90', 'calendarPath: cal/family.ics'].join('\n'),
    )

    const config = loadConfig({ env: { MEMO_MAX_LENGTH: '40' }, configPath })

    expect(config.timeZone).toBe('Europe/London')
    expect(config.showMemo).toBe(false)
    expect(config.memoMaxLength).toBe(40)
    expect(config.calendarPath).toBe('cal/family.ics')
  })

  it('finds the file through DAYBRIEF_CONFIG', () => {
    const configPath = writeYaml('locale: en\n')
    expect(loadConfig({ env: { DAYBRIEF_CONFIG: configPath } }).locale).toBe('en')
  })

  it('ignores an unparsable file', () => {
    const configPath = writeYaml('timeZone: [unclosed\n')

    const config = loadConfig({ env: {}, configPath })

    expect(config.timeZone).toBe('Asia/Tokyo')
    expect(warnSpy).toHaveBeenCalledTimes(1)
  })
})
