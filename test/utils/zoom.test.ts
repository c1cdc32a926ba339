import fs from 'fs'
import path from 'path'
import { DateTime } from 'luxon'
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'

import helper from '../../src/utils/common.js'
import Zoom from '../../src/utils/zoom.js'
import Model from '../../src/utils/model.js'
import FakeSession from '../helpers/fakeSession.js'
import { createEntry } from '../helpers/fakeSites.js'
import { createAppSetting, createTempDir } from '../helpers/setting.js'
import { AuthenticationTimeout, DownloadFailed, RecordingListUnavailable } from '../../src/utils/errors.js'

describe('Zoom', () => {
  let dir: string
  let session: FakeSession
  let zoom: Zoom

  beforeEach(() => {
    vi.spyOn(helper, 'msg').mockImplementation(() => {})

    dir = createTempDir()
    session = new FakeSession()
    zoom = new Zoom({ model: new Model({ appSetting: createAppSetting(dir) }), session })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(dir, { recursive: true, force: true })
  })

  describe('authenticate', () => {
    it('should reuse a saved session without waiting for a login', async () => {
      await zoom.authenticate()

      expect(session.actions).toEqual(['goto https://zoom.us/recording'])
    })

    it('should wait for a manual login when redirected to sign in', async () => {
      session.redirects.set(zoom.recordingsUrl, 'https://zoom.us/signin#/login')
      session.urlAfterLogin = 'https://zoom.us/recording'

      await zoom.authenticate()

      expect(session.actions).toEqual(['goto https://zoom.us/recording', 'waitForUrl'])
    })

    it('should fail when the login is not completed in time', async () => {
      session.redirects.set(zoom.recordingsUrl, 'https://zoom.us/signin')

      await expect(zoom.authenticate()).rejects.toThrow(AuthenticationTimeout)
      await expect(zoom.authenticate()).rejects.toThrow('Login to Zoom was not completed within 300s')
    })
  })

  describe('listRecordings', () => {
    const date = DateTime.fromISO('2024-03-05')

    it('should return an empty list for a day without recordings', async () => {
      session.show(zoom.listingSelector)

      expect(await zoom.listRecordings(date)).toEqual([])
    })

    it('should tell a listing that never rendered apart from an empty one', async () => {
      await expect(zoom.listRecordings(date)).rejects.toThrow(RecordingListUnavailable)
    })

    it('should parse the listed recordings of the date', async () => {
      session.show(zoom.listingSelector)
      session.collections.set(zoom.recordingLinkSelector, [
        { text: 'SIG Windows\nMar 5, 2024 10:00 AM\n01:02:03', href: '/recording/detail?meeting_id=abc123' },
        { text: 'SIG Windows\nMar 4, 2024 10:00 AM\n01:00:00', href: '/recording/detail?meeting_id=old' },
      ])

      const entries = await zoom.listRecordings(date)

      expect(entries).toEqual([createEntry({ date: 'Mar 5, 2024 10:00 AM' })])
    })
  })

  describe('download', () => {
    const entry = createEntry()
    const detailUrl = 'https://zoom.us/recording/detail?meeting_id=abc123'

    it('should keep the download started by the first click', async () => {
      session.show('button::-p-text(Download)')
      session.startsDownload.add('button::-p-text(Download)')
      const savePath = path.join(dir, 'SIG_Windows.mp4')

      const file = await zoom.download(entry, savePath)

      expect(file).toEqual({ path: savePath, entry })
      expect(fs.existsSync(savePath)).toBe(true)
      expect(session.actions).toEqual([`goto ${detailUrl}`, 'click button::-p-text(Download)', `save ${savePath}`])
    })

    it('should confirm the download dialog when it opens', async () => {
      session.show('a[href*="rec/download"]', '[role="dialog"] button::-p-text(Download)')
      session.startsDownload.add('[role="dialog"] button::-p-text(Download)')

      await zoom.download(entry, path.join(dir, 'SIG_Windows.mp4'))

      expect(session.actions.slice(1, 3)).toEqual(['click a[href*="rec/download"]', 'click [role="dialog"] button::-p-text(Download)'])
    })

    it('should use the last download button when the dialog has no known container', async () => {
      session.visible.set('button::-p-text(Download)', 2)
      session.startsDownload.add('button::-p-text(Download) [-1]')

      await zoom.download(entry, path.join(dir, 'SIG_Windows.mp4'))

      expect(session.actions.slice(1, 3)).toEqual(['click button::-p-text(Download)', 'click button::-p-text(Download) [-1]'])
    })

    it('should fail when no download control is on the page', async () => {
      await expect(zoom.download(entry, path.join(dir, 'SIG_Windows.mp4'))).rejects.toThrow(
        new DownloadFailed('Recording download failed: no download control found for "SIG Windows"'),
      )
      expect(session.actions).toContain('screenshot')
    })

    it('should click the control again and fail when no download starts', async () => {
      session.show('button::-p-text(Download)')

      const result = zoom.download(entry, path.join(dir, 'SIG_Windows.mp4'))

      await expect(result).rejects.toThrow(DownloadFailed)
      await expect(result).rejects.toThrow('Recording download failed: Download did not finish within 600s')
      expect(session.actions).toEqual([`goto ${detailUrl}`, 'click button::-p-text(Download)', 'click button::-p-text(Download)', 'screenshot'])
    })
  })
})
