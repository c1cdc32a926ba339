'use strict'
import type { PrivacyStatus } from './setting.js'

export interface RecordingEntry {
  // meeting_id of the detail link, or its last path segment
  id: string
  topic: string
  // date as displayed by the site, e.g. "Mar 5, 2024"
  date: string
  duration: string
  fileSize: string
  // detail page link, may be relative to the site
  url: string
}

export interface DownloadedFile {
  path: string
  entry: RecordingEntry
}

export interface UploadMetadata {
  title: string
  description: string
  playlist: string | null
  thumbnailPath: string | null
  privacyStatus: PrivacyStatus
  madeForKids: boolean
}

export interface UploadResult {
  videoId: string
  url: string
}
