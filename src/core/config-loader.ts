import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {basename, join, posix, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigError, ValidationError} from '../errors.js'
import type {
  BuilderConfig,
  NotificationLevel,
  PackagingConfig,
  ProjectDefinition,
  ScannerConfig,
  TelegramConfig
} from '../types.js'
import {slugify} from './utils.js'

export const configFileName = '.scanpack.yml'

export const defaults = {
  baseImage: 'python:3.12-slim',
  workdir: '/app',
  mountPath: '/video',
  inputFlag: '-i',
  plugins: ['poetry-dynamic-versioning'],
  systemPackages: ['git'],
  lockFiles: ['pyproject.toml', 'poetry.lock'],
  retryDelayMs: 5000,
  videoExtensions: ['.mp4', '.mkv', '.avi', '.wmv', '.mov', '.flv', '.ts', '.m2ts', '.rmvb', '.iso'],
  subtitleExtensions: ['.srt', '.ass', '.ssa', '.sub', '.vtt'],
  runTime: '02:00'
} as const

const notificationLevels: readonly NotificationLevel[] = ['all', 'success', 'error']

/**
 * Loads `.scanpack.yml` from a project directory and resolves it.
 * A missing file yields the defaults.
 */
export async function loadConfig(projectDir: string, env: NodeJS.ProcessEnv = process.env): Promise<PackagingConfig> {
  const root = resolve(projectDir)
  let content: string | undefined
  try {
    content = await readFile(join(root, configFileName), 'utf8')
  } catch (error: unknown) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw new ConfigError('CONFIG_READ_FAILED', `Cannot read ${configFileName} in ${root}`, {cause: error})
    }
  }

  const definition = content === undefined ? {} : parseProjectFile(content)
  return resolveConfig(definition, root, env)
}

/**
 * Parses the YAML project file. An empty document is an empty definition.
 */
export function parseProjectFile(content: string): ProjectDefinition {
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ValidationError(`${configFileName} is not valid YAML`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (!isRecord(parsed)) {
    throw new ValidationError(`${configFileName} must contain a mapping`)
  }

  return readDefinition(parsed)
}

/**
 * Applies defaults and environment overrides to a project definition.
 */
export function resolveConfig(definition: ProjectDefinition, projectDir: string, env: NodeJS.ProcessEnv = {}): PackagingConfig {
  const name = definition.name ?? slugify(basename(projectDir))
  if (!name) {
    throw new ValidationError('name: cannot derive a project name, set "name" explicitly')
  }

  validateIdentifier(name, 'name')

  const executable = definition.executable ?? name
  if (!/^[\w.-]+$/.test(executable)) {
    throw new ValidationError(`executable: '${executable}' must be a plain file name`)
  }

  const baseImage = definition.baseImage ?? defaults.baseImage
  validatePinnedImage(baseImage)

  const workdir = definition.workdir ?? defaults.workdir
  validateAbsolutePath(workdir, 'workdir')
  if (workdir === '/') {
    throw new ValidationError('workdir: must not be the filesystem root')
  }

  const mountPath = definition.mountPath ?? defaults.mountPath
  validateAbsolutePath(mountPath, 'mountPath')
  if (mountPath === workdir || mountPath.startsWith(`${workdir}/`) || mountPath === '/') {
    throw new ValidationError(`mountPath: '${mountPath}' must not be the root or overlap workdir '${workdir}'`)
  }

  const inputFlag = definition.inputFlag ?? defaults.inputFlag
  if (!/^-{1,2}[\w-]+$/.test(inputFlag)) {
    throw new ValidationError(`inputFlag: '${inputFlag}' must be a command-line flag such as -i`)
  }

  const tag = definition.tag ?? `${name}:latest`
  if (!/^[\w][\w./:-]*$/.test(tag)) {
    throw new ValidationError(`tag: '${tag}' is not a valid image reference`)
  }

  return {
    name,
    executable,
    baseImage,
    workdir,
    mountPath,
    inputFlag,
    tag,
    builder: resolveBuilder(definition),
    scanner: resolveScanner(definition, mountPath),
    telegram: resolveTelegram(definition, env)
  }
}

function resolveBuilder({builder = {}}: ProjectDefinition): BuilderConfig {
  const plugins = builder.plugins ?? [...defaults.plugins]
  for (const plugin of plugins) {
    if (!/^[\w.[\],=<>!~-]+$/.test(plugin)) {
      throw new ValidationError(`builder.plugins: '${plugin}' is not a valid package specifier`)
    }
  }

  const systemPackages = builder.systemPackages ?? [...defaults.systemPackages]
  for (const pkg of systemPackages) {
    if (!/^[a-z\d][a-z\d+.-]*$/.test(pkg)) {
      throw new ValidationError(`builder.systemPackages: '${pkg}' is not a valid package name`)
    }
  }

  const lockFiles = builder.lockFiles ?? [...defaults.lockFiles]
  if (lockFiles.length === 0) {
    throw new ValidationError('builder.lockFiles: at least one lock file is required')
  }

  for (const file of lockFiles) {
    if (file.startsWith('/') || file.split(/[/\\]/).includes('..')) {
      throw new ValidationError(`builder.lockFiles: '${file}' must be a relative path inside the project`)
    }
  }

  if (builder.timeoutSec !== undefined && !(builder.timeoutSec > 0)) {
    throw new ValidationError('builder.timeoutSec: must be a positive number')
  }

  const retries = builder.retries ?? 0
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ValidationError('builder.retries: must be a non-negative integer')
  }

  const retryDelayMs = builder.retryDelayMs ?? defaults.retryDelayMs
  if (!(retryDelayMs >= 0)) {
    throw new ValidationError('builder.retryDelayMs: must be a non-negative number')
  }

  return {plugins, systemPackages, lockFiles, timeoutSec: builder.timeoutSec, retries, retryDelayMs}
}

function resolveScanner({scanner = {}}: ProjectDefinition, mountPath: string): ScannerConfig {
  const runTime = scanner.runTime ?? defaults.runTime
  if (!/^([01]\d|2[0-3]):[0-5]\d$/.test(runTime)) {
    throw new ValidationError(`scanner.runTime: '${runTime}' must be a HH:MM time`)
  }

  return {
    inputDirectory: scanner.inputDirectory ?? mountPath,
    videoExtensions: normalizeExtensions(scanner.videoExtensions ?? [...defaults.videoExtensions]),
    subtitleExtensions: normalizeExtensions(scanner.subtitleExtensions ?? [...defaults.subtitleExtensions]),
    ignoredFolderPatterns: scanner.ignoredFolderPatterns ?? [],
    runTime,
    deleteEmptyFolders: scanner.deleteEmptyFolders ?? false
  }
}

function resolveTelegram({notify}: ProjectDefinition, env: NodeJS.ProcessEnv): TelegramConfig {
  const telegram = notify?.telegram ?? {}
  const level = telegram.level ?? 'all'
  if (!notificationLevels.includes(level)) {
    throw new ValidationError(`notify.telegram.level: '${String(level)}' must be one of ${notificationLevels.join(', ')}`)
  }

  return {
    enabled: telegram.enabled ?? false,
    token: env.TELEGRAM_BOT_TOKEN ?? telegram.token,
    chatId: env.TELEGRAM_CHAT_ID ?? telegram.chatId,
    level
  }
}

/** Lower-cases extensions and adds the leading dot when missing. */
export function normalizeExtensions(extensions: string[]): string[] {
  return extensions.map(ext => {
    const lower = ext.trim().toLowerCase()
    return lower.startsWith('.') ? lower : `.${lower}`
  })
}

function validatePinnedImage(image: string): void {
  if (image.includes('@sha256:')) {
    return
  }

  const lastSegment = image.slice(image.lastIndexOf('/') + 1)
  const colon = lastSegment.indexOf(':')
  if (colon === -1) {
    throw new ValidationError(`baseImage: '${image}' must be pinned to an explicit tag (e.g. python:3.12-slim)`)
  }

  const tag = lastSegment.slice(colon + 1)
  if (tag === 'latest' || !/^[\w][\w.-]*$/.test(tag)) {
    throw new ValidationError(`baseImage: '${image}' must be pinned to a release tag, not '${tag}'`)
  }
}

function validateAbsolutePath(path: string, field: string): void {
  if (!path.startsWith('/')) {
    throw new ValidationError(`${field}: '${path}' must be an absolute path`)
  }

  if (path.split('/').includes('..')) {
    throw new ValidationError(`${field}: '${path}' must not contain '..'`)
  }

  if (posix.normalize(path) !== path || (path.length > 1 && path.endsWith('/'))) {
    throw new ValidationError(`${field}: '${path}' must be a normalized path without trailing slash`)
  }
}

function validateIdentifier(id: string, field: string): void {
  if (!/^[\w-]+$/.test(id)) {
    throw new ValidationError(`${field}: '${id}' must contain only alphanumeric characters, underscore, and hyphen`)
  }
}

// -- Structural reading of the parsed YAML ----------------------------------

function readDefinition(raw: Record<string, unknown>): ProjectDefinition {
  const builder = optionalRecord(raw.builder, 'builder')
  const scanner = optionalRecord(raw.scanner, 'scanner')
  const notify = optionalRecord(raw.notify, 'notify')
  const telegram = notify ? optionalRecord(notify.telegram, 'notify.telegram') : undefined

  return {
    name: optionalString(raw.name, 'name'),
    executable: optionalString(raw.executable, 'executable'),
    baseImage: optionalString(raw.baseImage, 'baseImage'),
    workdir: optionalString(raw.workdir, 'workdir'),
    mountPath: optionalString(raw.mountPath, 'mountPath'),
    inputFlag: optionalString(raw.inputFlag, 'inputFlag'),
    tag: optionalString(raw.tag, 'tag'),
    builder: builder && {
      plugins: optionalStringArray(builder.plugins, 'builder.plugins'),
      systemPackages: optionalStringArray(builder.systemPackages, 'builder.systemPackages'),
      lockFiles: optionalStringArray(builder.lockFiles, 'builder.lockFiles'),
      timeoutSec: optionalNumber(builder.timeoutSec, 'builder.timeoutSec'),
      retries: optionalNumber(builder.retries, 'builder.retries'),
      retryDelayMs: optionalNumber(builder.retryDelayMs, 'builder.retryDelayMs')
    },
    scanner: scanner && {
      inputDirectory: optionalString(scanner.inputDirectory, 'scanner.inputDirectory'),
      videoExtensions: optionalStringArray(scanner.videoExtensions, 'scanner.videoExtensions'),
      subtitleExtensions: optionalStringArray(scanner.subtitleExtensions, 'scanner.subtitleExtensions'),
      ignoredFolderPatterns: optionalStringArray(scanner.ignoredFolderPatterns, 'scanner.ignoredFolderPatterns'),
      runTime: optionalString(scanner.runTime, 'scanner.runTime'),
      deleteEmptyFolders: optionalBoolean(scanner.deleteEmptyFolders, 'scanner.deleteEmptyFolders')
    },
    notify: notify && {
      telegram: telegram && {
        enabled: optionalBoolean(telegram.enabled, 'notify.telegram.enabled'),
        token: optionalString(telegram.token, 'notify.telegram.token'),
        chatId: optionalScalarString(telegram.chatId, 'notify.telegram.chatId'),
        level: optionalLevel(telegram.level)
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

function optionalRecord(value: unknown, field: string): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ValidationError(`${field}: must be a mapping`)
  }

  return value
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${field}: must be a non-empty string`)
  }

  return value
}

/** Chat ids are often written as bare numbers in YAML. */
function optionalScalarString(value: unknown, field: string): string | undefined {
  if (typeof value === 'number') {
    return String(value)
  }

  return optionalString(value, field)
}

function optionalStringArray(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`${field}: must be a list of strings`)
  }

  return value
}

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`${field}: must be a number`)
  }

  return value
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field}: must be true or false`)
  }

  return value
}

function optionalLevel(value: unknown): NotificationLevel | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  const level = notificationLevels.find(l => l === value)
  if (!level) {
    throw new ValidationError(`notify.telegram.level: '${String(value)}' must be one of ${notificationLevels.join(', ')}`)
  }

  return level
}
