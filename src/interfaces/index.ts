export type * from './common.js'
export type * from './prompt.js'
export type * from './recording.js'
export type * from './session.js'
export type * from './setting.js'
export type * from './site.js'
