import {mkdir, writeFile} from 'node:fs/promises'
import {basename, join} from 'node:path'
import test from 'ava'
import {ConfigError, ValidationError} from '../../errors.js'
import {configFileName, loadConfig, normalizeExtensions, parseProjectFile, resolveConfig} from '../config-loader.js'
import {createTmpDir} from '../../__tests__/helpers.js'

// -- defaults ----------------------------------------------------------------

test('resolveConfig fills every default', t => {
  const config = resolveConfig({}, '/src/Media Tool')

  t.is(config.name, 'media-tool')
  t.is(config.executable, 'media-tool')
  t.is(config.baseImage, 'python:3.12-slim')
  t.is(config.workdir, '/app')
  t.is(config.mountPath, '/video')
  t.is(config.inputFlag, '-i')
  t.is(config.tag, 'media-tool:latest')
  t.deepEqual(config.builder, {
    plugins: ['poetry-dynamic-versioning'],
    systemPackages: ['git'],
    lockFiles: ['pyproject.toml', 'poetry.lock'],
    timeoutSec: undefined,
    retries: 0,
    retryDelayMs: 5000
  })
  t.is(config.scanner.inputDirectory, '/video')
  t.is(config.scanner.runTime, '02:00')
  t.false(config.scanner.deleteEmptyFolders)
  t.deepEqual(config.telegram, {enabled: false, token: undefined, chatId: undefined, level: 'all'})
})

test('executable defaults to the name, scanner input to the mount path', t => {
  const config = resolveConfig({name: 'sorter', mountPath: '/media'}, '/src/x')
  t.is(config.executable, 'sorter')
  t.is(config.scanner.inputDirectory, '/media')
})

test('environment overrides the Telegram token and chat id', t => {
  const config = resolveConfig(
    {notify: {telegram: {enabled: true, token: 'file-token', chatId: '1'}}},
    '/src/tool',
    {TELEGRAM_BOT_TOKEN: 'test-secret', TELEGRAM_CHAT_ID: '42'}
  )

  t.is(config.telegram.token, 'test-secret')
  t.is(config.telegram.chatId, '42')
})

// -- validation --------------------------------------------------------------

test('baseImage must carry an explicit tag', t => {
  const error = t.throws(() => resolveConfig({baseImage: 'python'}, '/src/tool'), {instanceOf: ValidationError})
  t.true(error.message.startsWith('baseImage:'))
})

test('baseImage must not float on latest', t => {
  t.throws(() => resolveConfig({baseImage: 'python:latest'}, '/src/tool'), {instanceOf: ValidationError})
})

test('baseImage may be pinned by digest', t => {
  const config = resolveConfig({baseImage: `python@sha256:${'a'.repeat(64)}`}, '/src/tool')
  t.is(config.baseImage, `python@sha256:${'a'.repeat(64)}`)
})

test('registry ports are not mistaken for tags', t => {
  t.throws(() => resolveConfig({baseImage: 'registry.local:5000/python'}, '/src/tool'), {instanceOf: ValidationError})
  t.is(resolveConfig({baseImage: 'registry.local:5000/python:3.12'}, '/src/tool').baseImage, 'registry.local:5000/python:3.12')
})

test('workdir must be absolute and not the root', t => {
  t.throws(() => resolveConfig({workdir: 'app'}, '/src/tool'), {instanceOf: ValidationError})
  t.throws(() => resolveConfig({workdir: '/'}, '/src/tool'), {instanceOf: ValidationError})
  t.throws(() => resolveConfig({workdir: '/app/'}, '/src/tool'), {instanceOf: ValidationError})
})

test('mountPath must not overlap the workdir', t => {
  const error = t.throws(() => resolveConfig({mountPath: '/app/video'}, '/src/tool'), {instanceOf: ValidationError})
  t.true(error.message.startsWith('mountPath:'))
})

test('inputFlag must look like a flag', t => {
  t.throws(() => resolveConfig({inputFlag: 'i'}, '/src/tool'), {instanceOf: ValidationError})
  t.is(resolveConfig({inputFlag: '--input'}, '/src/tool').inputFlag, '--input')
})

test('executable must be a plain file name', t => {
  t.throws(() => resolveConfig({executable: '../bin/sh'}, '/src/tool'), {instanceOf: ValidationError})
})

test('lock files must stay inside the project', t => {
  t.throws(() => resolveConfig({builder: {lockFiles: ['../poetry.lock']}}, '/src/tool'), {instanceOf: ValidationError})
  t.throws(() => resolveConfig({builder: {lockFiles: []}}, '/src/tool'), {instanceOf: ValidationError})
})

test('plugin and package names are checked', t => {
  t.throws(() => resolveConfig({builder: {plugins: ['x; rm -rf /']}}, '/src/tool'), {instanceOf: ValidationError})
  t.throws(() => resolveConfig({builder: {systemPackages: ['Git']}}, '/src/tool'), {instanceOf: ValidationError})
  t.deepEqual(resolveConfig({builder: {plugins: ['poetry-dynamic-versioning[plugin]']}}, '/src/tool').builder.plugins, ['poetry-dynamic-versioning[plugin]'])
})

test('retries must be a non-negative integer', t => {
  t.throws(() => resolveConfig({builder: {retries: 1.5}}, '/src/tool'), {instanceOf: ValidationError})
  t.throws(() => resolveConfig({builder: {retries: -1}}, '/src/tool'), {instanceOf: ValidationError})
})

test('runTime must be HH:MM', t => {
  t.throws(() => resolveConfig({scanner: {runTime: '24:00'}}, '/src/tool'), {instanceOf: ValidationError})
  t.throws(() => resolveConfig({scanner: {runTime: '2:00'}}, '/src/tool'), {instanceOf: ValidationError})
  t.is(resolveConfig({scanner: {runTime: '23:59'}}, '/src/tool').scanner.runTime, '23:59')
})

// -- parseProjectFile --------------------------------------------------------

test('parseProjectFile reads nested sections', t => {
  const definition = parseProjectFile([
    'name: sorter',
    'builder:',
    '  retries: 2',
    'scanner:',
    '  ignoredFolderPatterns: ["^@eaDir", ".trash"]',
    'notify:',
    '  telegram:',
    '    enabled: true',
    '    chatId: 123456',
    '    level: error'
  ].join('\n'))

  t.is(definition.name, 'sorter')
  t.is(definition.builder?.retries, 2)
  t.deepEqual(definition.scanner?.ignoredFolderPatterns, ['^@eaDir', '.trash'])
  t.is(definition.notify?.telegram?.chatId, '123456')
  t.is(definition.notify?.telegram?.level, 'error')
})

test('parseProjectFile treats an empty document as no settings', t => {
  t.deepEqual(parseProjectFile(''), {})
})

test('parseProjectFile rejects a top-level list', t => {
  t.throws(() => parseProjectFile('- a\n- b\n'), {instanceOf: ValidationError})
})

test('parseProjectFile rejects wrongly typed fields', t => {
  const error = t.throws(() => parseProjectFile('builder:\n  plugins: poetry\n'), {instanceOf: ValidationError})
  t.true(error.message.startsWith('builder.plugins:'))
})

test('parseProjectFile rejects an unknown notification level', t => {
  t.throws(() => parseProjectFile('notify:\n  telegram:\n    level: loud\n'), {instanceOf: ValidationError})
})

test('parseProjectFile rejects invalid YAML', t => {
  t.throws(() => parseProjectFile('name: [unclosed'), {instanceOf: ValidationError})
})

// -- loadConfig --------------------------------------------------------------

test('loadConfig without a project file uses the directory name', async t => {
  const dir = await createTmpDir()
  const config = await loadConfig(dir, {})
  t.is(config.name, basename(dir).toLowerCase())
})

test('loadConfig reads .scanpack.yml', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, configFileName), 'name: sorter\nexecutable: sort-media\ninputFlag: --input\n')
  const config = await loadConfig(dir, {})
  t.is(config.name, 'sorter')
  t.is(config.executable, 'sort-media')
  t.is(config.tag, 'sorter:latest')
})

test('loadConfig fails with ConfigError when the file is unreadable', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, configFileName))
  const error = await t.throwsAsync(async () => loadConfig(dir, {}), {instanceOf: ConfigError})
  t.is(error.code, 'CONFIG_READ_FAILED')
})

// -- normalizeExtensions -----------------------------------------------------

test('normalizeExtensions lower-cases and adds the dot', t => {
  t.deepEqual(normalizeExtensions(['MKV', '.Srt', ' mp4 ']), ['.mkv', '.srt', '.mp4'])
})
