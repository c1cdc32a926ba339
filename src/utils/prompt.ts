'use strict'
import readline from 'readline'

import { InputClosed } from './errors.js'

import type { Prompter } from '../interfaces/index.js'

export default class Prompt implements Prompter {
  rl: readline.Interface

  isClosed = false

  // rejects the open question when input ends before an answer
  private rejectPending: ((error: Error) => void) | null = null

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output })

    // readline swallows Ctrl+C while a question is open
    this.rl.on('SIGINT', () => process.kill(process.pid, 'SIGINT'))

    this.rl.on('close', () => {
      this.isClosed = true
      this.rejectPending?.(new InputClosed())
      this.rejectPending = null
    })
  }

  ask(question: string, defaultValue?: string) {
    const hint = defaultValue ? ` (${defaultValue})` : ''

    return new Promise<string>((resolve, reject) => {
      if (this.isClosed) return reject(new InputClosed())

      this.rejectPending = reject
      this.rl.question(`${question}${hint}: `, (answer) => {
        this.rejectPending = null
        resolve(answer.trim() || defaultValue || '')
      })
    })
  }

  async confirm(question: string, defaultValue = false) {
    const answer = (await this.ask(`${question} ${defaultValue ? '[Y/n]' : '[y/N]'}`)).toLowerCase()
    if (!answer) return defaultValue

    return answer === 'y' || answer === 'yes'
  }

  close() {
    if (!this.isClosed) this.rl.close()
  }
}
