'use strict'
import type { DateTime } from 'luxon'

import type { DownloadedFile, RecordingEntry, UploadMetadata, UploadResult } from './recording.js'

export interface SourceSite {
  authenticate(): Promise<void>
  /** Entries in site display order; `[]` when the date has none. */
  listRecordings(date: DateTime): Promise<RecordingEntry[]>
  download(entry: RecordingEntry, savePath: string): Promise<DownloadedFile>
}

export interface DestinationSite {
  authenticate(): Promise<void>
  upload(file: DownloadedFile, metadata: UploadMetadata): Promise<UploadResult>
}
