'use strict'
import os from 'os'
import { z } from 'zod'

import { ConfigError } from './errors.js'

export const timeoutSettingSchema = z.object({
  // null waits for the manual login without a bound
  loginSec: z.number().positive().nullable().default(300),
  elementSec: z.number().positive().default(60),
  downloadSec: z.number().positive().default(600),
  uploadSec: z.number().positive().default(600),
  // pause after page transitions the sites animate
  settleMs: z.number().int().nonnegative().default(1500),
})

export const puppeteerSettingSchema = z.object({
  headless: z.boolean().default(false),
  executablePath: z.string().min(1),
})

export const appSettingSchema = z.object({
  titleTemplate: z.string().min(1).default('{topic} — {date}'),
  descriptionTemplate: z.string().default('{topic} meeting recording from {date}.'),
  defaultPlaylist: z.string().min(1).nullable().default(null),
  thumbnailFile: z.string().min(1).nullable().default(null),
  privacyStatus: z.enum(['public', 'unlisted', 'private']).default('public'),
  madeForKids: z.boolean().default(false),
  autoSelectSingle: z.boolean().default(true),
  downloadDirectory: z
    .string()
    .min(1)
    .nullable()
    .default(null)
    .transform((dir) => dir ?? os.tmpdir()),
  profileDirectory: z.string().min(1).default('./browser_data'),
  uploadLogPath: z.string().min(1).default('./uploads.json'),
  debugDirectory: z.string().min(1).default('./debug'),
  timeouts: timeoutSettingSchema.default({}),
  puppeteerSettings: puppeteerSettingSchema,
})

// uploads.json: video title -> published URL
export const uploadLogSchema = z.record(z.string(), z.string())

export function parseAppSetting(raw: unknown) {
  const result = appSettingSchema.safeParse(raw)
  if (result.success) return result.data

  const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  throw new ConfigError(`Invalid config: ${issues.join('; ')}`)
}
