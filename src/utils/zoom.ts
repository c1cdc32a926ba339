'use strict'
import helper from './common.js'
import Model from './model.js'
import { saveDebugScreenshot } from './debug.js'
import { parseRecordingLinks } from './recording.js'
import { AuthenticationTimeout, DownloadFailed, RecordingListUnavailable, getErrorMessage } from './errors.js'

import type { DateTime } from 'luxon'
import type { BrowserSession, DownloadedFile, RecordingEntry, SourceSite } from '../interfaces/index.js'

interface ZoomParams {
  model: Model
  session: BrowserSession
}

export default class Zoom implements SourceSite {
  model: Model
  session: BrowserSession

  baseUrl = 'https://zoom.us'

  recordingsUrl = 'https://zoom.us/recording'

  // present once the recordings view rendered, with or without rows
  listingSelector = ['[role="table"]', 'table', '.zm-table', '.recording-list', '.empty-recording', '.zm-empty'].join(', ')

  recordingLinkSelector = 'a[href*="/recording/detail"], a[href*="/rec/share"]'

  downloadSelectors = ['button::-p-text(Download)', 'a[href*="dl=1"]', 'a[href*="ssv="]', 'a[href*="rec/download"]', '[aria-label*="ownload"]']

  confirmDialogSelectors = [
    '.zm-modal-footer button::-p-text(Download)',
    '.modal-footer button::-p-text(Download)',
    '[role="dialog"] button::-p-text(Download)',
    '.ReactModal__Content button::-p-text(Download)',
  ]

  constructor({ model, session }: ZoomParams) {
    this.model = model
    this.session = session
  }

  isLoginPage(url: string) {
    return url.includes('/signin') || url.includes('/login')
  }

  getDetailUrl(entry: RecordingEntry) {
    return new URL(entry.url, this.baseUrl).toString()
  }

  //#region Authentication
  async authenticate() {
    await this.session.goto(this.recordingsUrl)

    if (!this.isLoginPage(this.session.url())) {
      helper.msg('Zoom session reused', 'success')
      return
    }

    helper.msg('Please log in to Zoom in the browser window', 'warn')

    const timeoutMs = this.model.loginTimeoutMs
    const isLoggedIn = await this.session.waitForUrl((url) => url.includes('/recording') && !this.isLoginPage(url), timeoutMs)
    if (!isLoggedIn) throw new AuthenticationTimeout('Zoom', timeoutMs ?? 0)

    helper.msg('Zoom login completed', 'success')
  }
  //#endregion

  //#region Recordings
  async listRecordings(date: DateTime) {
    await this.session.goto(this.recordingsUrl)

    const isRendered = await this.session.waitForSelector(this.listingSelector, this.model.elementTimeoutMs)
    if (!isRendered) {
      throw new RecordingListUnavailable(`Zoom recordings view did not render at ${this.session.url()}, the page layout may have changed`)
    }

    await this.model.settle()

    const links = await this.session.collect(this.recordingLinkSelector)
    return parseRecordingLinks(links, date)
  }
  //#endregion

  //#region Download
  async download(entry: RecordingEntry, savePath: string): Promise<DownloadedFile> {
    try {
      await this.session.goto(this.getDetailUrl(entry))
      await this.model.settle(2)

      const trigger = await this.session.findFirst(this.downloadSelectors)
      if (!trigger) throw new DownloadFailed(`Recording download failed: no download control found for "${entry.topic}"`)

      const options = { savePath, timeoutMs: this.model.downloadTimeoutMs }
      const filePath = await this.session.captureDownload(async (progress) => {
        await this.session.click(trigger)
        await this.model.settle()

        if (!progress.hasStarted()) await this.confirmDownload(trigger)
      }, options)

      helper.msg(`Downloaded ${filePath}`, 'success')

      return { path: filePath, entry }
    } catch (error) {
      await saveDebugScreenshot(this.session, this.model.appSetting.debugDirectory, 'zoom_download')

      if (error instanceof DownloadFailed) throw error
      throw new DownloadFailed(`Recording download failed: ${getErrorMessage(error)}`, { cause: error })
    }
  }

  /** The first click may open a confirmation dialog, whose button starts the actual download. */
  private async confirmDownload(trigger: string) {
    const dialogButton = await this.session.findFirst(this.confirmDialogSelectors)
    if (dialogButton) return this.session.click(dialogButton)

    const downloadButton = this.downloadSelectors[0]
    if ((await this.session.count(downloadButton)) > 1) {
      return this.session.click(downloadButton, { index: -1 })
    }

    return this.session.click(trigger)
  }
  //#endregion
}
