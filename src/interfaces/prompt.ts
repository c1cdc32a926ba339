export interface Prompter {
  ask(question: string, defaultValue?: string): Promise<string>
  confirm(question: string, defaultValue?: boolean): Promise<boolean>
  close(): void
}
