import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {execa} from 'execa'
import {deriveVersion, FALLBACK_VERSION, parseDescribe, versionTag} from '../version.js'
import {createTmpDir, isGitAvailable, writeFiles} from '../../__tests__/helpers.js'

const gitTest = isGitAvailable() ? test : test.skip

async function taggedRepository(tag: string): Promise<string> {
  const dir = await createTmpDir()
  await writeFiles(dir, {'pyproject.toml': '[tool.poetry]\nname = "media-tool"\n'})
  const git = async (...args: string[]) => execa('git', ['-c', 'user.name=Test', '-c', 'user.email=test@example.com', '-c', 'commit.gpgsign=false', ...args], {cwd: dir})
  await git('init', '--quiet')
  await git('add', '.')
  await git('commit', '--quiet', '-m', 'initial')
  await git('tag', tag)
  return dir
}

test('parseDescribe: exact release tag', t => {
  t.is(parseDescribe('v1.2.3-0-gabc1234'), '1.2.3')
  t.is(parseDescribe('1.2.3-0-gabc1234\n'), '1.2.3')
})

test('parseDescribe: commits after the tag', t => {
  t.is(parseDescribe('v1.2.3-4-gabc1234'), '1.2.3.post4.dev0+abc1234')
})

test('parseDescribe: dirty checkout', t => {
  t.is(parseDescribe('v1.2.3-0-gabc1234-dirty'), '1.2.3+dirty')
  t.is(parseDescribe('v1.2.3-2-gabc1234-dirty'), '1.2.3.post2.dev0+abc1234.dirty')
})

test('parseDescribe: pre-release tag', t => {
  t.is(parseDescribe('v2.0.0rc1-0-gdeadbee'), '2.0.0rc1')
})

test('parseDescribe: not a release description', t => {
  t.is(parseDescribe('abc1234'), undefined)
  t.is(parseDescribe('vnext-1-gabc1234'), undefined)
})

test('versionTag replaces the local separator', t => {
  t.is(versionTag('1.2.3.post4.dev0+abc1234'), '1.2.3.post4.dev0-abc1234')
  t.is(versionTag('1.2.3'), '1.2.3')
})

test('deriveVersion falls back outside a repository', async t => {
  const dir = await createTmpDir()
  t.is(await deriveVersion(dir), FALLBACK_VERSION)
})

gitTest('deriveVersion reads the release tag', async t => {
  const dir = await taggedRepository('v1.4.0')
  t.is(await deriveVersion(dir), '1.4.0')
})

gitTest('deriveVersion marks uncommitted changes', async t => {
  const dir = await taggedRepository('v1.4.0')
  await writeFile(join(dir, 'pyproject.toml'), '[tool.poetry]\nname = "media-tool"\nversion = "0"\n')
  t.is(await deriveVersion(dir), '1.4.0+dirty')
})
