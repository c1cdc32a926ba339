'use strict'
import type { z } from 'zod'

import type { appSettingSchema, puppeteerSettingSchema, timeoutSettingSchema } from '../utils/config.js'

export type AppSettings = z.infer<typeof appSettingSchema>

export type PuppeteerSetting = z.infer<typeof puppeteerSettingSchema>

export type TimeoutSetting = z.infer<typeof timeoutSettingSchema>

export type PrivacyStatus = AppSettings['privacyStatus']
