'use strict'

export type KeyName = 'Escape' | 'Enter' | 'Tab'

export interface CollectedElement {
  text: string
  href: string | null
}

export interface ClickOptions {
  // position among visible matches, negative counts from the end
  index?: number
}

export interface TypeOptions {
  // select the existing content first so typing overwrites it
  replace?: boolean
}

export interface DownloadOptions {
  savePath: string
  timeoutMs: number
}

export interface DownloadProgress {
  // a download began since the capture started
  hasStarted(): boolean
}

/**
 * Selector based view of one browser page.
 *
 * Waits resolve `false` when their bound elapses; a `null` timeout waits forever.
 * Actions wait up to the element timeout for a visible match, then throw `ElementNotFound`.
 * Once the browser is gone, pending waits reject with `BrowserClosed`.
 */
export interface BrowserSession {
  goto(url: string): Promise<void>
  url(): string
  count(selector: string): Promise<number>
  findFirst(selectors: string[]): Promise<string | null>
  click(selector: string, options?: ClickOptions): Promise<void>
  type(selector: string, text: string, options?: TypeOptions): Promise<void>
  press(key: KeyName): Promise<void>
  collect(selector: string): Promise<CollectedElement[]>
  attribute(selector: string, name: string): Promise<string | null>
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>
  waitForUrl(predicate: (url: string) => boolean, timeoutMs: number | null): Promise<boolean>
  waitUntil(predicate: () => Promise<boolean>, timeoutMs: number | null): Promise<boolean>
  uploadFile(selector: string, filePath: string): Promise<void>
  /**
   * Runs `trigger` with download tracking on and resolves with `savePath` once the first
   * download it started is written there. Later downloads and failed ones are removed.
   */
  captureDownload(trigger: (progress: DownloadProgress) => Promise<void>, options: DownloadOptions): Promise<string>
  screenshot(filePath: string): Promise<void>
  close(): Promise<void>
}
