export type LogMsgType = 'warn' | 'info' | 'success' | 'fail' | 'error' | 'title'

export type VideoTitle = string

export type VideoUrl = string

export type UploadLog = Record<VideoTitle, VideoUrl>
