import fs from 'fs'
import fsPromise from 'fs/promises'

import { InputClosed } from '../../src/utils/errors.js'

import type { DateTime } from 'luxon'
import type { DestinationSite, DownloadedFile, Prompter, RecordingEntry, SourceSite, UploadMetadata, UploadResult } from '../../src/interfaces/index.js'

export function createEntry(overrides: Partial<RecordingEntry> = {}): RecordingEntry {
  return {
    id: 'abc123',
    topic: 'SIG Windows',
    date: 'Mar 5, 2024 10:00 AM',
    duration: '01:02:03',
    fileSize: '',
    url: '/recording/detail?meeting_id=abc123',
    ...overrides,
  }
}

export class FakeSource implements SourceSite {
  entries: RecordingEntry[]

  downloadError: Error | null = null

  authenticateCalls = 0

  listedDates: string[] = []

  downloads: { entry: RecordingEntry; savePath: string }[] = []

  constructor(entries: RecordingEntry[]) {
    this.entries = entries
  }

  async authenticate() {
    this.authenticateCalls++
  }

  async listRecordings(date: DateTime) {
    this.listedDates.push(date.toFormat('yyyy-MM-dd'))
    return this.entries
  }

  async download(entry: RecordingEntry, savePath: string): Promise<DownloadedFile> {
    this.downloads.push({ entry, savePath })
    if (this.downloadError) throw this.downloadError

    await fsPromise.writeFile(savePath, 'recording')
    return { path: savePath, entry }
  }
}

export class FakeDestination implements DestinationSite {
  result: UploadResult

  uploadError: Error | null = null

  authenticateCalls = 0

  uploads: { file: DownloadedFile; metadata: UploadMetadata; fileExisted: boolean }[] = []

  constructor(result: UploadResult) {
    this.result = result
  }

  async authenticate() {
    this.authenticateCalls++
  }

  async upload(file: DownloadedFile, metadata: UploadMetadata) {
    this.uploads.push({ file, metadata, fileExisted: fs.existsSync(file.path) })
    if (this.uploadError) throw this.uploadError

    return this.result
  }
}

export class FakePrompter implements Prompter {
  answers: string[]

  confirmAnswers: boolean[] = []

  questions: string[] = []

  closed = false

  constructor(answers: string[]) {
    this.answers = answers
  }

  async ask(question: string, defaultValue?: string) {
    this.questions.push(question)

    const answer = this.answers.shift()
    if (answer === undefined) throw new InputClosed()

    return answer || defaultValue || ''
  }

  async confirm(question: string, defaultValue = false) {
    this.questions.push(question)
    return this.confirmAnswers.shift() ?? defaultValue
  }

  close() {
    this.closed = true
  }
}
