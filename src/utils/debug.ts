'use strict'
import path from 'path'

import helper from './common.js'
import { getErrorMessage } from './errors.js'

import type { BrowserSession } from '../interfaces/index.js'

/** Captures the page after a failed site step; failing to do so only warns. */
export async function saveDebugScreenshot(session: BrowserSession, directory: string, name: string) {
  const filePath = path.join(directory, `${name}_${Date.now()}.png`)

  try {
    await session.screenshot(filePath)
    helper.msg(`Screenshot saved to ${filePath}`, 'warn')
    return filePath
  } catch (error) {
    helper.msg(`Could not save screenshot: ${getErrorMessage(error)}`, 'warn')
    return null
  }
}
