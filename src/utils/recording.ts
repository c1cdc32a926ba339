'use strict'
import { escapeRegExp, uniqBy } from 'lodash-es'

import { getDisplayPatterns } from './date.js'

import type { DateTime } from 'luxon'
import type { CollectedElement, RecordingEntry } from '../interfaces/index.js'

const DATE_LINE_REGEX = /(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+\d{1,2},\s+\d{4}|\d{1,2}\/\d{1,2}\/\d{4}/
const DURATION_REGEX = /^\d{2}:\d{2}:\d{2}$/
const SITE_ORIGIN = 'https://zoom.us'

export function getRecordingId(href: string) {
  const url = new URL(href, SITE_ORIGIN)

  const meetingId = url.searchParams.get('meeting_id')
  if (meetingId) return meetingId

  const segments = url.pathname.split('/').filter(Boolean)
  return segments[segments.length - 1] ?? ''
}

/** Reads one listing row; `null` for the short duplicate rows the listing renders. */
export function parseRecordingLink(link: CollectedElement): RecordingEntry | null {
  const rawLines = link.text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)

  if (rawLines.length <= 2) return null

  const lines = rawLines.filter((line) => !line.startsWith('Press Shift'))

  let date = ''
  let duration = ''
  let topic = ''

  for (const line of lines) {
    if (!date && DATE_LINE_REGEX.test(line)) {
      date = line
    } else if (!duration && DURATION_REGEX.test(line)) {
      duration = line
    } else if (!topic && !/^\d+$/.test(line) && line.length > 3) {
      topic = line
    }
  }

  const url = link.href ?? ''

  return {
    id: url ? getRecordingId(url) : '',
    topic: topic || 'Unknown',
    date,
    duration,
    fileSize: '',
    url,
  }
}

/** Entries recorded on `date`, in listing order, without repeated rows. */
export function parseRecordingLinks(links: CollectedElement[], date: DateTime) {
  // a leading digit would turn 2/3/2026 into a match for 12/3/2026
  const patterns = getDisplayPatterns(date).map((pattern) => new RegExp(`(^|\\D)${escapeRegExp(pattern)}`))

  const entries = links
    .map(parseRecordingLink)
    .filter((entry): entry is RecordingEntry => entry !== null)
    .filter((entry) => patterns.some((pattern) => pattern.test(entry.date)))

  return uniqBy(entries, (entry) => `${entry.topic}|${entry.date}`)
}
