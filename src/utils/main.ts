'use strict'
// 外部方法
import path from 'path'
import { DateTime } from 'luxon'

// 內部方法
import helper from './common.js'
import fileSys from './fileSys.js'
import { parseDateInput } from './date.js'
import { AppError, InputValidationError, getErrorMessage } from './errors.js'

// Class
import Model from './model.js'

// 型別
import type { DestinationSite, DownloadedFile, Prompter, RecordingEntry, SourceSite, UploadMetadata } from '../interfaces/index.js'

interface MainParams {
  model: Model
  source: SourceSite
  destination: DestinationSite
  prompter: Prompter
  today?: () => DateTime
}

export function parseSelection(answer: string, count: number) {
  const index = Number(answer.trim())

  if (!/^\d+$/.test(answer.trim()) || index < 1 || index > count) {
    throw new InputValidationError(`Invalid selection '${answer.trim()}', enter a number between 1 and ${count}`)
  }

  return index - 1
}

export default class Main {
  model: Model
  source: SourceSite
  destination: DestinationSite
  prompter: Prompter
  today: () => DateTime

  // downloaded file owned by the current run, removed by cleanup()
  pendingFile: string | null = null

  constructor({ model, source, destination, prompter, today = () => DateTime.local() }: MainParams) {
    this.model = model
    this.source = source
    this.destination = destination
    this.prompter = prompter
    this.today = today
  }

  //#region Prompt
  async promptDate() {
    for (;;) {
      const answer = await this.prompter.ask('Meeting date', 'today')

      try {
        return parseDateInput(answer, this.today())
      } catch (error) {
        if (!(error instanceof InputValidationError)) throw error
        helper.msg(error.message, 'warn')
      }
    }
  }

  displayRecordings(entries: RecordingEntry[]) {
    helper.msg('Zoom Recordings', 'title')

    entries.forEach((entry, i) => {
      const details = [entry.date, entry.duration].filter(Boolean).join(', ')
      helper.msg(`${i + 1}. ${entry.topic}${details ? ` (${details})` : ''}`)
    })
  }

  async selectRecording(entries: RecordingEntry[]) {
    if (entries.length === 1 && this.model.appSetting.autoSelectSingle) {
      helper.msg(`Auto-selected: ${entries[0].topic} (${entries[0].date})`)
      return entries[0]
    }

    this.displayRecordings(entries)

    for (;;) {
      const answer = await this.prompter.ask('Select recording number', '1')

      try {
        return entries[parseSelection(answer, entries.length)]
      } catch (error) {
        if (!(error instanceof InputValidationError)) throw error
        helper.msg(error.message, 'warn')
      }
    }
  }
  //#endregion

  //#region Metadata
  /** Fills `{topic}`, `{date}`, `{compactDate}`, `{year}`, `{month}` and `{day}`; other braces stay as typed. */
  renderTemplate(template: string, entry: RecordingEntry, date: DateTime) {
    const values: Record<string, string> = {
      topic: entry.topic,
      date: date.toFormat('yyyy-MM-dd'),
      compactDate: date.toFormat('yyyyMMdd'),
      year: date.toFormat('yyyy'),
      month: date.toFormat('MM'),
      day: date.toFormat('dd'),
    }

    // one pass, so placeholders inside the topic are not expanded
    return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => (Object.hasOwn(values, key) ? values[key] : placeholder))
  }

  buildMetadata(entry: RecordingEntry, date: DateTime): UploadMetadata {
    const { titleTemplate, descriptionTemplate, defaultPlaylist, thumbnailFile, privacyStatus, madeForKids } = this.model.appSetting

    return {
      title: this.renderTemplate(titleTemplate, entry, date),
      description: this.renderTemplate(descriptionTemplate, entry, date),
      playlist: defaultPlaylist,
      thumbnailPath: thumbnailFile,
      privacyStatus,
      madeForKids,
    }
  }

  getSavePath(title: string) {
    return path.join(this.model.appSetting.downloadDirectory, `${helper.toFilename(title)}.mp4`)
  }
  //#endregion

  //#region Cleanup
  /** Deletes the pending download, safe to call any number of times. */
  async cleanup() {
    const filePath = this.pendingFile
    if (!filePath) return

    this.pendingFile = null

    try {
      if (await fileSys.removeFile(filePath)) helper.msg(`Cleaned up ${filePath}`)
    } catch (error) {
      helper.msg(`Could not delete ${filePath}: ${getErrorMessage(error)}`, 'warn')
    }
  }
  //#endregion

  //#region Flow
  async run() {
    await this.model.syncModel()

    const date = await this.promptDate()
    helper.msg(`Looking up recordings for ${date.toISODate()}`, 'title')

    await this.source.authenticate()

    const entries = await this.source.listRecordings(date)
    if (entries.length === 0) {
      helper.msg('No recordings found for this date', 'warn')
      return 0
    }

    const entry = await this.selectRecording(entries)
    const metadata = this.buildMetadata(entry, date)

    const uploadedUrl = this.model.getUploadedUrl(metadata.title)
    if (uploadedUrl) {
      helper.msg(`Already uploaded: ${uploadedUrl}`, 'warn')

      if (!(await this.prompter.confirm('Upload again?'))) {
        helper.msg('Aborted')
        return 0
      }
    }

    const savePath = this.getSavePath(metadata.title)
    this.pendingFile = savePath

    try {
      const file = await this.download(entry, savePath)

      await this.destination.authenticate()

      const result = await this.destination.upload(file, metadata)

      helper.msg('Done! Video URL:', 'success')
      console.log(result.url)

      await this.model.setUploadLog(metadata.title, result.url)
    } finally {
      await this.cleanup()
    }

    return 0
  }

  async download(entry: RecordingEntry, savePath: string): Promise<DownloadedFile> {
    if (fileSys.fileExists(savePath)) {
      helper.msg(`File already exists: ${savePath}, skipping download`, 'warn')
      return { path: savePath, entry }
    }

    return this.source.download(entry, savePath)
  }
  //#endregion

  //#region Entry
  /** Runs the whole flow and resolves with the process exit code. */
  async start() {
    try {
      return await this.run()
    } catch (error) {
      if (error instanceof AppError) {
        helper.msg(error.message, 'fail')
      } else {
        helper.msg(`Unexpected error: ${getErrorMessage(error)}`, 'error')
        await fileSys.errorHandler(error, 'start')
      }

      return 1
    }
  }
  //#endregion
}
