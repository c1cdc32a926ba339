'use strict'
import helper from './common.js'
import Model from './model.js'
import { saveDebugScreenshot } from './debug.js'
import { AuthenticationTimeout, TimeoutWaitingForCompletion, UploadFailed, getErrorMessage } from './errors.js'

import type { BrowserSession, DestinationSite, DownloadedFile, UploadMetadata, UploadResult } from '../interfaces/index.js'

interface YouTubeParams {
  model: Model
  session: BrowserSession
}

const VIDEO_ID_PATTERNS = [/youtu\.be\/([\w-]+)/, /youtube\.com\/video\/([\w-]+)/, /youtube\.com\/watch\?(?:.*&)?v=([\w-]+)/]

export function extractVideoId(href: string) {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = pattern.exec(href)
    if (match?.[1]) return match[1]
  }

  return null
}

export default class YouTube implements DestinationSite {
  model: Model
  session: BrowserSession

  studioUrl = 'https://studio.youtube.com'

  uploadUrl = 'https://studio.youtube.com/channel/UC/videos/upload?d=ud'

  createSelectors = ['#create-icon', '[aria-label="Create"]', 'button::-p-text(Create)', '#upload-icon']

  videoLinkSelector = 'a[href*="youtu.be"], a[href*="youtube.com/video"]'

  constructor({ model, session }: YouTubeParams) {
    this.model = model
    this.session = session
  }

  isLoginPage(url: string) {
    return url.includes('accounts.google.com')
  }

  //#region Authentication
  async authenticate() {
    await this.session.goto(this.studioUrl)

    if (!this.isLoginPage(this.session.url())) {
      helper.msg('YouTube Studio session reused', 'success')
      return
    }

    helper.msg('Please log in to your Google account in the browser window', 'warn')

    const timeoutMs = this.model.loginTimeoutMs
    const isLoggedIn = await this.session.waitForUrl((url) => url.includes('studio.youtube.com') && !this.isLoginPage(url), timeoutMs)
    if (!isLoggedIn) throw new AuthenticationTimeout('YouTube Studio', timeoutMs ?? 0)

    helper.msg('YouTube Studio login completed', 'success')
  }
  //#endregion

  //#region Upload
  async upload(file: DownloadedFile, metadata: UploadMetadata): Promise<UploadResult> {
    try {
      await this.openUploadDialog()

      await this.session.uploadFile('input[type="file"]', file.path)
      helper.msg(`Uploading ${file.path}`)

      await this.fillDetails(metadata)
      await this.fillVisibility(metadata)

      const result = await this.publish()

      helper.msg(`Published "${metadata.title}"`, 'success')

      return result
    } catch (error) {
      await saveDebugScreenshot(this.session, this.model.appSetting.debugDirectory, 'youtube_upload')

      if (error instanceof UploadFailed) throw error
      throw new UploadFailed(`Upload failed: ${getErrorMessage(error)}`, { cause: error })
    }
  }

  private async openUploadDialog() {
    await this.session.goto(this.studioUrl)
    await this.model.settle(2)

    const createButton = await this.session.findFirst(this.createSelectors)

    if (createButton) {
      await this.session.click(createButton)
      await this.session.click('::-p-text(Upload videos)')
    } else {
      await this.session.goto(this.uploadUrl)
    }

    await this.model.settle()
  }

  private async fillDetails(metadata: UploadMetadata) {
    const isReady = await this.session.waitForSelector('#title-textarea', this.model.elementTimeoutMs)
    if (!isReady) throw new UploadFailed('Upload failed: the details form did not appear')

    await this.model.settle()

    await this.session.type('#title-textarea #textbox', metadata.title, { replace: true })
    await this.session.type('#description-textarea #textbox', metadata.description)

    if (metadata.thumbnailPath) await this.setThumbnail(metadata.thumbnailPath)
    if (metadata.playlist) await this.setPlaylist(metadata.playlist)

    const audience = metadata.madeForKids ? 'MADE_FOR_KIDS' : 'NOT_MADE_FOR_KIDS'
    await this.session.click(`[name="${audience}"]`)
    await this.model.settle()
  }

  private async setThumbnail(thumbnailPath: string) {
    const input = await this.session.findFirst(['#still-picker input[type="file"]', 'input[type="file"][accept*="image"]'])
    if (!input) throw new UploadFailed('Upload failed: no thumbnail upload control found')

    await this.session.uploadFile(input, thumbnailPath)
    await this.model.settle()
  }

  private async setPlaylist(playlist: string) {
    await this.session.click('ytcp-video-metadata-playlists')
    await this.model.settle()

    const optionSelector = 'ytcp-playlist-dialog label'
    const options = await this.session.collect(optionSelector)
    const index = options.findIndex((option) => option.text.trim() === playlist)

    if (index === -1) {
      await this.session.press('Escape')
      throw new UploadFailed(`Upload failed: playlist "${playlist}" not found`)
    }

    await this.session.click(optionSelector, { index })

    const doneButton = await this.session.findFirst(['ytcp-playlist-dialog ::-p-text(Done)'])
    if (doneButton) {
      await this.session.click(doneButton)
    } else {
      await this.session.press('Escape')
    }

    await this.model.settle()
  }

  private async fillVisibility(metadata: UploadMetadata) {
    // Details -> Video elements -> Checks -> Visibility
    for (let step = 0; step < 3; step++) {
      await this.session.click('#next-button')
      await this.model.settle()
    }

    await this.session.click(`[name="${metadata.privacyStatus.toUpperCase()}"]`)
    await this.model.settle()
  }

  private async publish(): Promise<UploadResult> {
    const timeoutMs = this.model.uploadTimeoutMs

    const isEnabled = await this.session.waitUntil(async () => {
      if ((await this.session.count('#done-button')) === 0) return false
      return (await this.session.attribute('#done-button', 'aria-disabled')) !== 'true'
    }, timeoutMs)
    if (!isEnabled) throw new TimeoutWaitingForCompletion('Video processing', timeoutMs)

    await this.session.click('#done-button')

    const readVideoId = async () => {
      const href = await this.session.attribute(this.videoLinkSelector, 'href')
      const fromLink = href ? extractVideoId(href) : null
      return fromLink ?? extractVideoId(this.session.url())
    }

    const isPublished = await this.session.waitUntil(async () => (await readVideoId()) !== null, this.model.elementTimeoutMs)
    const videoId = isPublished ? await readVideoId() : null

    if (!videoId) throw new UploadFailed('Upload failed: the published video URL could not be read back')

    return { videoId, url: `https://youtu.be/${videoId}` }
  }
  //#endregion
}
