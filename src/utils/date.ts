'use strict'
import { DateTime } from 'luxon'

import { InputValidationError } from './errors.js'

const INPUT_HINT = "Use YYYY-MM-DD, YYYYMMDD, MM-DD, 'today', or 'yesterday'."

/**
 * Parses a meeting date typed at the prompt.
 *
 * Accepts `YYYY-MM-DD`, `YYYYMMDD`, `MM-DD` (in the year of `today`), `today` and `yesterday`.
 */
export function parseDateInput(input: string, today: DateTime = DateTime.local()) {
  const text = input.trim().toLowerCase()

  if (text === 'today') return today.startOf('day')
  if (text === 'yesterday') return today.minus({ days: 1 }).startOf('day')

  let date: DateTime | null = null

  if (/^\d{4}-\d{1,2}-\d{1,2}$/.test(text)) {
    date = DateTime.fromFormat(text, 'yyyy-M-d')
  } else if (/^\d{8}$/.test(text)) {
    date = DateTime.fromFormat(text, 'yyyyMMdd')
  } else if (/^\d{1,2}-\d{1,2}$/.test(text)) {
    date = DateTime.fromFormat(`${today.year}-${text}`, 'yyyy-M-d')
  }

  if (!date) throw new InputValidationError(`Cannot parse date '${input.trim()}'. ${INPUT_HINT}`)
  if (!date.isValid) throw new InputValidationError(`'${input.trim()}' is not a calendar date. ${INPUT_HINT}`)

  return date.startOf('day')
}

/** Every way the recordings listing may print `date`. */
export function getDisplayPatterns(date: DateTime) {
  const en = date.setLocale('en-US')
  return [en.toFormat('LLL d, yyyy'), en.toFormat('LLL dd, yyyy'), en.toFormat('L/d/yyyy'), en.toFormat('LL/dd/yyyy'), en.toFormat('yyyy-MM-dd')]
}
