import fs from 'fs'
import path from 'path'
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'

import helper from '../../src/utils/common.js'
import fileSys from '../../src/utils/fileSys.js'
import { ConfigError } from '../../src/utils/errors.js'
import { createTempDir } from '../helpers/setting.js'

describe('fileSys', () => {
  let dir: string

  beforeEach(() => {
    dir = createTempDir()
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  describe('removeFile', () => {
    it('should report whether there was a file to delete', async () => {
      const filePath = path.join(dir, 'recording.mp4')
      fs.writeFileSync(filePath, 'recording')

      expect(await fileSys.removeFile(filePath)).toBe(true)
      expect(await fileSys.removeFile(filePath)).toBe(false)
      expect(fs.existsSync(filePath)).toBe(false)
    })
  })

  describe('getAppSettingSync', () => {
    const writeConfig = (data: unknown) => {
      const filePath = path.join(dir, 'config.json')
      fs.writeFileSync(filePath, typeof data === 'string' ? data : JSON.stringify(data))
      return filePath
    }

    it('should load and validate the config file', () => {
      const filePath = writeConfig({ privacyStatus: 'unlisted', puppeteerSettings: { executablePath: '/usr/bin/chromium' } })

      const setting = fileSys.getAppSettingSync(filePath)

      expect(setting.privacyStatus).toBe('unlisted')
      expect(setting.puppeteerSettings.headless).toBe(false)
    })

    it('should explain how to create a missing config', () => {
      const filePath = path.join(dir, 'config.json')

      expect(() => fileSys.getAppSettingSync(filePath)).toThrow(
        new ConfigError(`Config file ${filePath} not found, copy config.example.json to config.json and fill in your settings`),
      )
    })

    it('should reject a file that is not JSON', () => {
      const filePath = writeConfig('{ privacyStatus: ')

      expect(() => fileSys.getAppSettingSync(filePath)).toThrow(`Config file ${filePath} is not valid JSON`)
    })

    it('should reject a thumbnail that does not exist', () => {
      const thumbnailFile = path.join(dir, 'thumbnail.png')
      const filePath = writeConfig({ thumbnailFile, puppeteerSettings: { executablePath: '/usr/bin/chromium' } })

      expect(() => fileSys.getAppSettingSync(filePath)).toThrow(`Thumbnail file ${thumbnailFile} not found`)
    })
  })

  describe('JSON files', () => {
    it('should fall back to the default value for a missing file', async () => {
      expect(await fileSys.getOrDefaultValue(path.join(dir, 'uploads.json'), { seen: false })).toEqual({ seen: false })
    })

    it('should create parent directories when saving', async () => {
      const filePath = path.join(dir, 'nested', 'uploads.json')

      await fileSys.saveJSONFile(filePath, { title: 'https://youtu.be/XYZ' })

      expect(await fileSys.getJSONFile(filePath)).toEqual({ title: 'https://youtu.be/XYZ' })
    })
  })

  describe('errorHandler', () => {
    it('should write the error details to a file', async () => {
      vi.spyOn(helper, 'msg').mockImplementation(() => {})
      const errorDir = path.join(dir, 'error')

      const errFilePath = await fileSys.errorHandler(new TypeError('page crashed'), 'start', errorDir)

      expect(path.dirname(errFilePath)).toBe(errorDir)
      const log = JSON.parse(fs.readFileSync(errFilePath, 'utf8'))
      expect(log).toMatchObject({ name: 'TypeError', message: 'page crashed', triggerFnName: 'start' })
    })
  })
})
