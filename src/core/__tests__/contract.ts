import test from 'ava'
import {ValidationError} from '../../errors.js'
import {resolveConfig} from '../config-loader.js'
import {
  contractFromConfig,
  contractFromLabels,
  contractLabels,
  contractToLabels,
  resolveInvocation,
  runtimeArgs
} from '../contract.js'

const contract = contractFromConfig(resolveConfig({}, '/src/media-tool'))

test('contractFromConfig derives entrypoint, defaults and mount path', t => {
  t.deepEqual(contract, {
    entrypoint: '/app/.venv/bin/media-tool',
    defaultArgs: ['-i', '/video'],
    mountPath: '/video'
  })
})

test('contract labels read back to the same contract', t => {
  const labels = contractToLabels(contract)
  t.is(labels[contractLabels.defaultArgs], '["-i","/video"]')
  t.deepEqual(contractFromLabels(labels), contract)
})

test('contractFromLabels returns undefined for foreign images', t => {
  t.is(contractFromLabels({'org.opencontainers.image.title': 'other'}), undefined)
})

test('contractFromLabels rejects malformed default arguments', t => {
  const labels = {...contractToLabels(contract), [contractLabels.defaultArgs]: '-i /video'}
  t.throws(() => contractFromLabels(labels), {instanceOf: ValidationError})

  labels[contractLabels.defaultArgs] = '[1, 2]'
  t.throws(() => contractFromLabels(labels), {instanceOf: ValidationError})
})

// -- resolveInvocation -------------------------------------------------------

test('no arguments: the defaults apply', t => {
  const record = resolveInvocation(contract)
  t.deepEqual(record, {
    entrypoint: '/app/.venv/bin/media-tool',
    args: ['-i', '/video'],
    usesDefaultArgs: true,
    entrypointOverridden: false
  })
  t.deepEqual(runtimeArgs(record), [])
})

test('caller arguments replace the defaults', t => {
  const record = resolveInvocation(contract, {args: ['-i', '/video/new', '--dry-run']})
  t.deepEqual(record.args, ['-i', '/video/new', '--dry-run'])
  t.false(record.usesDefaultArgs)
  t.deepEqual(runtimeArgs(record), ['-i', '/video/new', '--dry-run'])
})

test('append puts caller arguments after the defaults', t => {
  const record = resolveInvocation(contract, {args: ['--verbose'], append: true})
  t.deepEqual(record.args, ['-i', '/video', '--verbose'])
  t.deepEqual(runtimeArgs(record), ['-i', '/video', '--verbose'])
})

test('a replaced entrypoint drops the defaults', t => {
  const record = resolveInvocation(contract, {entrypoint: 'sh', append: true, args: ['-c', 'ls']})
  t.true(record.entrypointOverridden)
  t.is(record.entrypoint, 'sh')
  t.deepEqual(record.args, ['-c', 'ls'])

  const bare = resolveInvocation(contract, {entrypoint: 'sh'})
  t.false(bare.usesDefaultArgs)
  t.deepEqual(runtimeArgs(bare), [])
})

test('naming the contract entrypoint is not an override', t => {
  const record = resolveInvocation(contract, {entrypoint: '/app/.venv/bin/media-tool'})
  t.false(record.entrypointOverridden)
  t.true(record.usesDefaultArgs)
})

test('a relative mount directory resolves against cwd', t => {
  const record = resolveInvocation(contract, {mountDir: 'media'}, '/srv')
  t.deepEqual(record.mount, {hostPath: '/srv/media', containerPath: '/video'})

  const absolute = resolveInvocation(contract, {mountDir: '/mnt/videos'}, '/srv')
  t.is(absolute.mount?.hostPath, '/mnt/videos')
})
