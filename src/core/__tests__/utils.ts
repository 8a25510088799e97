import {createWriteStream} from 'node:fs'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {closeStream, dirSize, formatDuration, formatSize, pathExists, slugify} from '../utils.js'
import {createTmpDir, writeFiles} from '../../__tests__/helpers.js'

test('formatSize picks the unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(3 * 1024 * 1024 * 1024), '3.0 GB')
})

test('formatDuration picks the unit', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(12_340), '12.3s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('slugify turns a directory name into an identifier', t => {
  t.is(slugify('Média Tool'), 'media-tool')
  t.is(slugify('--my  project--'), 'my-project')
})

test('dirSize sums files recursively', async t => {
  const dir = await createTmpDir()
  await writeFiles(dir, {'a.txt': 'abc', 'sub/b.txt': 'hello'})
  t.is(await dirSize(dir), 8)
  t.is(await dirSize(join(dir, 'missing')), 0)
})

test('pathExists', async t => {
  const dir = await createTmpDir()
  t.true(await pathExists(dir))
  t.false(await pathExists(join(dir, 'nope')))
})

test('closeStream flushes pending writes', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'out.log')
  const stream = createWriteStream(path)
  stream.write('line\n')
  await closeStream(stream)
  t.is(await readFile(path, 'utf8'), 'line\n')
})
