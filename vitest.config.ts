import path from 'path'
import ts from 'typescript'
import { defineConfig } from 'vitest/config'

/**
 * puppeteer-core declares its event names as ambient const enums, which esbuild cannot inline.
 * Compile the TypeScript sources with the compiler itself, the same way `tsc` builds the app.
 */
function createTscEmitter() {
  const configPath = path.resolve('tsconfig.json')
  const { config } = ts.readConfigFile(configPath, ts.sys.readFile)
  const parsed = ts.parseJsonConfigFileContent(config, ts.sys, path.dirname(configPath))
  const options: ts.CompilerOptions = { ...parsed.options, noEmit: false, sourceMap: true, inlineSources: true }

  const host: ts.LanguageServiceHost = {
    getScriptFileNames: () => parsed.fileNames,
    getScriptVersion: () => '0',
    getScriptSnapshot: (fileName) => {
      const text = ts.sys.readFile(fileName)
      return text === undefined ? undefined : ts.ScriptSnapshot.fromString(text)
    },
    getCurrentDirectory: () => process.cwd(),
    getCompilationSettings: () => options,
    getDefaultLibFileName: (opts) => ts.getDefaultLibFilePath(opts),
    fileExists: ts.sys.fileExists,
    readFile: ts.sys.readFile,
    readDirectory: ts.sys.readDirectory,
    directoryExists: ts.sys.directoryExists,
    getDirectories: ts.sys.getDirectories,
  }
  const service = ts.createLanguageService(host, ts.createDocumentRegistry())

  return (fileName: string) => {
    const output = service.getEmitOutput(fileName)
    const js = output.outputFiles.find((file) => file.name.endsWith('.js'))
    const map = output.outputFiles.find((file) => file.name.endsWith('.js.map'))
    if (!js) return null

    return { code: js.text.replace(/\n\/\/# sourceMappingURL=.*$/, ''), map: map?.text }
  }
}

let emit: ReturnType<typeof createTscEmitter> | undefined

export default defineConfig({
  esbuild: false,
  plugins: [
    {
      name: 'tsc-transform',
      enforce: 'pre',
      transform(_code, id) {
        const fileName = id.split('?')[0]
        if (!fileName.endsWith('.ts') || fileName.endsWith('.d.ts') || fileName.includes('/node_modules/')) return null

        emit ??= createTscEmitter()
        return emit(fileName)
      },
    },
  ],
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
})
