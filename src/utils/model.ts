'use strict'
import helper from './common.js'
import fileSys from './fileSys.js'
import { ConfigError } from './errors.js'
import { uploadLogSchema } from './config.js'

import type { AppSettings, UploadLog } from '../interfaces/index.js'

interface ModelParams {
  appSetting?: AppSettings
}

export default class Model {
  appSetting: AppSettings

  uploadLog: UploadLog = {}

  constructor({ appSetting }: ModelParams = {}) {
    this.appSetting = appSetting ?? fileSys.getAppSettingSync()
  }

  // #region Timeouts
  get loginTimeoutMs() {
    const { loginSec } = this.appSetting.timeouts
    return loginSec === null ? null : loginSec * 1000
  }

  get elementTimeoutMs() {
    return this.appSetting.timeouts.elementSec * 1000
  }

  get downloadTimeoutMs() {
    return this.appSetting.timeouts.downloadSec * 1000
  }

  get uploadTimeoutMs() {
    return this.appSetting.timeouts.uploadSec * 1000
  }

  /** Pause after a transition the site animates. */
  settle(multiplier = 1) {
    return helper.wait((this.appSetting.timeouts.settleMs * multiplier) / 1000)
  }
  // #endregion

  // #region Upload Log
  async syncModel() {
    const { uploadLogPath } = this.appSetting

    const result = uploadLogSchema.safeParse(await fileSys.getOrDefaultValue<unknown>(uploadLogPath, {}))
    if (!result.success) throw new ConfigError(`Upload log ${uploadLogPath} is not a map of video titles to URLs`)

    this.uploadLog = result.data
  }

  getUploadedUrl(title: string) {
    return Object.hasOwn(this.uploadLog, title) ? this.uploadLog[title] : null
  }

  async setUploadLog(title: string, url: string) {
    this.uploadLog[title] = url
    await fileSys.saveJSONFile(this.appSetting.uploadLogPath, this.uploadLog)
  }
  // #endregion
}
