#!/usr/bin/env node
import helper from './utils/common.js'
import Main from './utils/main.js'
import Zoom from './utils/zoom.js'
import Model from './utils/model.js'
import Prompt from './utils/prompt.js'
import YouTube from './utils/youtube.js'
import Puppeteer from './utils/puppeteer.js'
import { getErrorMessage } from './utils/errors.js'

const start = async () => {
  helper.msg('Zoom Recording → YouTube Uploader', 'title')

  const model = new Model()
  const { puppeteerSettings, profileDirectory, downloadDirectory } = model.appSetting

  const prompter = new Prompt()
  const session = new Puppeteer({ settings: puppeteerSettings, profileDirectory, downloadDirectory, elementTimeoutMs: model.elementTimeoutMs })
  const zoom = new Zoom({ model, session })
  const youtube = new YouTube({ model, session })
  const main = new Main({ model, source: zoom, destination: youtube, prompter })

  const onInterrupt = async () => {
    helper.msg('Interrupted, cleaning up', 'warn')
    await main.cleanup()
    await session.close().catch((error: unknown) => helper.msg(`Could not close browser: ${getErrorMessage(error)}`, 'warn'))
    process.exit(130)
  }

  // SIGHUP: the terminal was closed
  for (const signal of ['SIGINT', 'SIGTERM', 'SIGHUP'] as const) {
    process.once(signal, () => void onInterrupt())
  }

  try {
    await session.init()
    return await main.start()
  } finally {
    prompter.close()
    await session.close()
  }
}

start()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    helper.msg(getErrorMessage(error), 'fail')
    process.exitCode = 1
  })
