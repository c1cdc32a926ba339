'use strict'

import fs from 'fs'
import path from 'path'
import fsPromise from 'fs/promises'

import helper from './common.js'
import { ConfigError } from './errors.js'
import { parseAppSetting } from './config.js'

import type { AppSettings } from '../interfaces/index.js'

const fileSysOri = {
  //#region 檔案路徑
  appConfigPath: path.join('./config.json'),

  errorLogPath: path.join('./error'),
  //#endregion

  //#region 設定檔
  getAppSettingSync(this: { appConfigPath: string }, filePath: string = this.appConfigPath): AppSettings {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Config file ${filePath} not found, copy config.example.json to config.json and fill in your settings`)
    }

    let raw: unknown
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'))
    } catch (error) {
      throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error })
    }

    const setting = parseAppSetting(raw)

    if (setting.thumbnailFile && !fs.existsSync(setting.thumbnailFile)) {
      throw new ConfigError(`Thumbnail file ${setting.thumbnailFile} not found`)
    }

    return setting
  },
  //#endregion

  //#region 通用
  async getOrDefaultValue<T>(filePath: string, defaultValue: T) {
    const model = await this.getJSONFile<T>(filePath)
    return model || defaultValue
  },

  async getJSONFile<T>(filePath: string): Promise<T | null> {
    if (!fs.existsSync(filePath)) return null

    try {
      const result = await fsPromise.readFile(filePath, 'utf8')

      return JSON.parse(result)
    } catch (error) {
      console.error(error)
      return null
    }
  },

  makeDirIfNotExist(fileLocation: string, options?: { sync?: boolean }) {
    if (fs.existsSync(fileLocation) || !fileLocation) return

    if (options?.sync) {
      fs.mkdirSync(fileLocation, { recursive: true })
    } else {
      return fsPromise.mkdir(fileLocation, { recursive: true })
    }
  },

  async saveJSONFile(filePath: string, data: unknown) {
    if (filePath.length === 0) throw new Error('no file path provided')

    const { dir } = path.parse(filePath)

    await this.makeDirIfNotExist(dir)

    await fsPromise.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8')
  },

  fileExists(filePath: string) {
    return fs.existsSync(filePath)
  },

  /** Resolves `true` when a file was deleted, `false` when there was nothing to delete. */
  async removeFile(filePath: string) {
    if (!fs.existsSync(filePath)) return false

    await fsPromise.rm(filePath, { force: true })
    return true
  },

  async errorHandler(
    this: {
      errorLogPath: string
      makeDirIfNotExist(fileLocation: string): Promise<string | undefined> | void
      saveJSONFile(filePath: string, data: unknown): Promise<void>
    },
    error: unknown, triggerFnName: string = '', errorLogPath: string = this.errorLogPath) {
    await this.makeDirIfNotExist(errorLogPath)

    const log = {
      date: new Date().toLocaleString(),
      name: error instanceof Error ? error.name : 'UnknownError',
      message: error instanceof Error ? error.message : 'no error message',
      stack: error instanceof Error ? error.stack : undefined,
      triggerFnName,
    }

    const errFilePath = path.join(errorLogPath, `${new Date().getTime()}.json`)

    await this.saveJSONFile(errFilePath, log)

    helper.msg(`error detail saved to ${errFilePath}`, 'warn')

    return errFilePath
  },
  //#endregion
}

type FileSysOri = typeof fileSysOri

interface FileSysOverload extends FileSysOri {
  makeDirIfNotExist(fileLocation: string): Promise<string | undefined>
  makeDirIfNotExist(fileLocation: string, options: { sync: true }): void
}

export default fileSysOri as FileSysOverload
