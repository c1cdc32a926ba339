import fs from 'fs'
import path from 'path'
import { TimeoutError } from 'puppeteer-core'

type Listener = (event: unknown) => void

class Emitter {
  listeners = new Map<string, Set<Listener>>()

  on(event: string, listener: Listener) {
    const listeners = this.listeners.get(event) ?? new Set<Listener>()
    listeners.add(listener)
    this.listeners.set(event, listeners)
    return this
  }

  off(event: string, listener: Listener) {
    this.listeners.get(event)?.delete(listener)
    return this
  }

  emit(event: string, payload?: unknown) {
    this.listeners.get(event)?.forEach((listener) => listener(payload))
  }
}

export class FakeElement {
  visible: boolean

  clicks = 0

  uploaded: string[] = []

  attributes: Record<string, string> = {}

  onClick: (() => void) | null = null

  constructor(visible = true) {
    this.visible = visible
  }

  async isVisible() {
    return this.visible
  }

  async click() {
    this.clicks++
    this.onClick?.()
  }

  async evaluate<T>(fn: (el: { getAttribute(name: string): string | null }, arg: string) => T, arg: string) {
    return fn({ getAttribute: (name) => this.attributes[name] ?? null }, arg)
  }

  async toElement() {
    return this
  }

  async uploadFile(...filePaths: string[]) {
    this.uploaded.push(...filePaths)
  }
}

export class FakePage {
  currentUrl = 'about:blank'

  elements = new Map<string, FakeElement[]>()

  add(selector: string, ...elements: FakeElement[]) {
    this.elements.set(selector, [...(this.elements.get(selector) ?? []), ...elements])
    return this
  }

  async $$(selector: string) {
    return this.elements.get(selector) ?? []
  }

  async $(selector: string) {
    return this.elements.get(selector)?.[0] ?? null
  }

  async goto(url: string) {
    this.currentUrl = url
  }

  url() {
    return this.currentUrl
  }

  async waitForSelector(selector: string) {
    const element = await this.$(selector)
    if (!element) throw new TimeoutError(`Waiting for selector \`${selector}\` failed`)
    return element
  }
}

export class FakeCDPSession extends Emitter {
  sent: { method: string; params: unknown }[] = []

  async send(method: string, params: unknown) {
    this.sent.push({ method, params })
  }

  get cancelled() {
    return this.sent.filter((call) => call.method === 'Browser.cancelDownload').map((call) => call.params)
  }
}

/** Browser whose downloads write `<downloadPath>/<guid>` and report through the CDP session. */
export class FakeBrowser extends Emitter {
  page = new FakePage()

  cdp = new FakeCDPSession()

  downloadPath = ''

  closed = false

  private guidCount = 0

  async pages() {
    return [this.page]
  }

  target() {
    return { createCDPSession: async () => this.cdp }
  }

  async close() {
    this.closed = true
  }

  disconnect() {
    this.emit('disconnected')
  }

  /** Starts a download; `completed` false leaves it in progress. */
  startDownload(completed: boolean) {
    const guid = `guid${++this.guidCount}`

    fs.writeFileSync(path.join(this.downloadPath, guid), completed ? 'recording' : 'partial')
    this.cdp.emit('Browser.downloadWillBegin', { guid, suggestedFilename: 'recording.mp4' })
    if (completed) this.cdp.emit('Browser.downloadProgress', { guid, state: 'completed' })

    return guid
  }

  cancelDownload(guid: string) {
    this.cdp.emit('Browser.downloadProgress', { guid, state: 'canceled' })
  }
}
