'use strict'
import fs from 'fs'
import path from 'path'
import fsPromise from 'fs/promises'
import puppeteer, { BrowserEvent, TimeoutError } from 'puppeteer-core'

import helper from './common.js'
import fileSys from './fileSys.js'
import { BrowserClosed, ElementNotFound, TimeoutWaitingForCompletion, getErrorMessage } from './errors.js'

import type { Browser, CDPSession, ElementHandle, KeyInput, Page } from 'puppeteer-core'
import type {
  BrowserSession,
  ClickOptions,
  CollectedElement,
  DownloadOptions,
  DownloadProgress,
  KeyName,
  PuppeteerSetting,
  TypeOptions,
} from '../interfaces/index.js'

interface PuppeteerParam {
  settings: PuppeteerSetting
  profileDirectory: string
  downloadDirectory: string
  elementTimeoutMs: number
}

type DownloadState = 'inProgress' | 'completed' | 'canceled'

const POLL_INTERVAL_SEC = 0.25

export default class Puppeteer implements BrowserSession {
  isInit = false

  isConnected = false

  settings: PuppeteerSetting

  profileDirectory: string

  downloadDirectory: string

  elementTimeoutMs: number

  page?: Page

  browser?: Browser

  cdp?: CDPSession

  private disconnectHandlers = new Set<() => void>()

  constructor({ settings, profileDirectory, downloadDirectory, elementTimeoutMs }: PuppeteerParam) {
    this.settings = settings
    this.profileDirectory = profileDirectory
    this.downloadDirectory = downloadDirectory
    this.elementTimeoutMs = elementTimeoutMs
  }

  get hasProfile() {
    return fs.existsSync(this.profileDirectory)
  }

  get downloadPath() {
    return path.resolve(this.downloadDirectory)
  }

  async init() {
    helper.msg(this.hasProfile ? `Reusing browser profile ${this.profileDirectory}` : `Creating browser profile ${this.profileDirectory}`)

    await fileSys.makeDirIfNotExist(this.downloadDirectory)

    this.browser = await puppeteer.launch({
      headless: this.settings.headless,
      executablePath: this.settings.executablePath,
      userDataDir: this.profileDirectory,
      defaultViewport: { width: 1280, height: 900 },
      args: ['--disable-blink-features=AutomationControlled'],
      ignoreDefaultArgs: ['--enable-automation'],
    })

    this.isConnected = true
    this.browser.on(BrowserEvent.Disconnected, () => {
      this.isConnected = false
      this.disconnectHandlers.forEach((handler) => handler())
    })

    // both sites share this page
    const [page] = await this.browser.pages()
    this.page = page ?? (await this.browser.newPage())

    this.cdp = await this.browser.target().createCDPSession()
    await this.cdp.send('Browser.setDownloadBehavior', {
      behavior: 'allowAndName',
      downloadPath: this.downloadPath,
      eventsEnabled: true,
    })

    this.isInit = true
  }

  async close() {
    if (!this.browser) return

    if (this.isConnected) await this.browser.close()

    this.browser = undefined
    this.page = undefined
    this.cdp = undefined
    this.isConnected = false
    this.isInit = false
  }

  private checkPageInst(): asserts this is this & { page: Page } {
    if (!this.page) throw Error('no page instance found.')
  }

  private checkConnected() {
    if (!this.isConnected) throw new BrowserClosed()
  }

  private async visibleHandles(selector: string) {
    this.checkPageInst()

    const handles = await this.page.$$(selector)
    const visible: ElementHandle<Element>[] = []

    for (const handle of handles) {
      if (await handle.isVisible()) visible.push(handle)
    }

    return visible
  }

  private async pickHandle(selector: string, options?: ClickOptions) {
    const index = options?.index ?? 0
    const deadline = Date.now() + this.elementTimeoutMs

    for (;;) {
      this.checkConnected()

      const handle = (await this.visibleHandles(selector)).at(index)
      if (handle) return handle

      if (Date.now() >= deadline) throw new ElementNotFound(index === 0 ? selector : `${selector} [${index}]`)

      await helper.wait(POLL_INTERVAL_SEC)
    }
  }

  //#region Navigation
  async goto(url: string) {
    this.checkPageInst()
    await this.page.goto(url, { waitUntil: 'domcontentloaded' })
  }

  url() {
    this.checkPageInst()
    return this.page.url()
  }
  //#endregion

  //#region Query
  async count(selector: string) {
    const handles = await this.visibleHandles(selector)
    return handles.length
  }

  async findFirst(selectors: string[]) {
    for (const selector of selectors) {
      if ((await this.count(selector)) > 0) return selector
    }

    return null
  }

  async collect(selector: string): Promise<CollectedElement[]> {
    this.checkPageInst()

    return this.page.$$eval(selector, (elements) =>
      elements.map((el) => ({
        text: el instanceof HTMLElement ? el.innerText : el.textContent ?? '',
        href: el.getAttribute('href'),
      })),
    )
  }

  async attribute(selector: string, name: string) {
    this.checkPageInst()

    const handle = await this.page.$(selector)
    if (!handle) return null

    return handle.evaluate((el, attr) => el.getAttribute(attr), name)
  }
  //#endregion

  //#region Action
  async click(selector: string, options?: ClickOptions) {
    const handle = await this.pickHandle(selector, options)
    await handle.click()
  }

  async type(selector: string, text: string, options?: TypeOptions) {
    this.checkPageInst()

    const handle = await this.pickHandle(selector)
    await handle.click()

    if (options?.replace) {
      const modifier: KeyInput = process.platform === 'darwin' ? 'Meta' : 'Control'
      await this.page.keyboard.down(modifier)
      await this.page.keyboard.press('KeyA')
      await this.page.keyboard.up(modifier)
    }

    await this.page.keyboard.type(text, { delay: 15 })
  }

  async press(key: KeyName) {
    this.checkPageInst()
    await this.page.keyboard.press(key)
  }

  async uploadFile(selector: string, filePath: string) {
    this.checkPageInst()

    // file inputs are usually hidden, so only presence is awaited
    let handle: ElementHandle<Element> | null
    try {
      handle = await this.page.waitForSelector(selector, { timeout: this.elementTimeoutMs })
    } catch (error) {
      if (error instanceof TimeoutError) throw new ElementNotFound(selector)
      throw error
    }
    if (!handle) throw new ElementNotFound(selector)

    const input = await handle.toElement('input')
    await input.uploadFile(path.resolve(filePath))
  }

  async screenshot(filePath: string) {
    this.checkPageInst()

    await fileSys.makeDirIfNotExist(path.dirname(filePath))
    await this.page.screenshot({ path: filePath })
  }
  //#endregion

  //#region Wait
  async waitForSelector(selector: string, timeoutMs: number) {
    this.checkPageInst()

    try {
      await this.page.waitForSelector(selector, { visible: true, timeout: timeoutMs })
      return true
    } catch (error) {
      if (error instanceof TimeoutError) return false
      throw error
    }
  }

  waitForUrl(predicate: (url: string) => boolean, timeoutMs: number | null) {
    return this.waitUntil(async () => predicate(this.url()), timeoutMs)
  }

  async waitUntil(predicate: () => Promise<boolean>, timeoutMs: number | null) {
    const deadline = timeoutMs === null ? Infinity : Date.now() + timeoutMs

    do {
      this.checkConnected()
      if (await predicate()) return true
      await helper.wait(POLL_INTERVAL_SEC)
    } while (Date.now() < deadline)

    return false
  }
  //#endregion

  //#region Download
  async captureDownload(trigger: (progress: DownloadProgress) => Promise<void>, { savePath, timeoutMs }: DownloadOptions) {
    if (!this.cdp) throw Error('download behavior is not configured, call init() first.')

    const cdp = this.cdp

    // the first download is kept, any later one is discarded
    const guids: string[] = []
    const states = new Map<string, DownloadState>()
    let notify = () => {}

    const onBegin = (event: { guid: string; suggestedFilename: string }) => {
      guids.push(event.guid)
      if (guids.length === 1) helper.msg(`Download started: ${event.suggestedFilename}`)
      notify()
    }

    const onProgress = (event: { guid: string; state: DownloadState }) => {
      states.set(event.guid, event.state)
      notify()
    }

    const onDisconnect = () => notify()

    cdp.on('Browser.downloadWillBegin', onBegin)
    cdp.on('Browser.downloadProgress', onProgress)
    this.disconnectHandlers.add(onDisconnect)

    let timer: NodeJS.Timeout | undefined

    try {
      await trigger({ hasStarted: () => guids.length > 0 })

      const fileGuid = await new Promise<string>((resolve, reject) => {
        notify = () => {
          if (!this.isConnected) return reject(new BrowserClosed())

          const [guid] = guids
          if (guid === undefined) return

          const state = states.get(guid)
          if (state === 'completed') resolve(guid)
          if (state === 'canceled') reject(new Error('Download was canceled by the browser'))
        }

        timer = setTimeout(() => reject(new TimeoutWaitingForCompletion('Download', timeoutMs)), timeoutMs)
        notify()
      })

      await fileSys.makeDirIfNotExist(path.dirname(savePath))
      await fsPromise.rename(path.join(this.downloadPath, fileGuid), savePath)

      await this.discardDownloads(guids.slice(1), states)

      return savePath
    } catch (error) {
      await this.discardDownloads(guids, states)
      throw error
    } finally {
      clearTimeout(timer)
      notify = () => {}
      cdp.off('Browser.downloadWillBegin', onBegin)
      cdp.off('Browser.downloadProgress', onProgress)
      this.disconnectHandlers.delete(onDisconnect)
    }
  }

  /** Stops unfinished downloads and deletes their files. */
  private async discardDownloads(guids: string[], states: Map<string, DownloadState>) {
    for (const guid of guids) {
      const state = states.get(guid)

      if (this.isConnected && this.cdp && state !== 'completed' && state !== 'canceled') {
        await this.cdp
          .send('Browser.cancelDownload', { guid })
          .catch((error: unknown) => helper.msg(`Could not cancel download ${guid}: ${getErrorMessage(error)}`, 'warn'))
      }

      await fsPromise.rm(path.join(this.downloadPath, guid), { force: true })
    }
  }
  //#endregion
}
