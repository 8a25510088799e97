import test from 'ava'
import {ValidationError} from '../../errors.js'
import {parseForce} from '../utils.js'
import {imageContract} from '../commands/run.js'

// ---------------------------------------------------------------------------
// parseForce
// ---------------------------------------------------------------------------

test('parseForce: bare flag forces every stage', t => {
  t.is(parseForce(true), true)
})

test('parseForce: absent flag forces nothing', t => {
  t.is(parseForce(undefined), undefined)
  t.is(parseForce(false), undefined)
})

test('parseForce: comma-separated stages', t => {
  t.deepEqual(parseForce('builder, runner'), ['builder', 'runner'])
  t.deepEqual(parseForce('runner'), ['runner'])
})

test('parseForce: unknown stage is rejected', t => {
  const error = t.throws(() => parseForce('builder,deploy'), {instanceOf: ValidationError})
  t.is(error.message, 'Unknown stage "deploy" (expected builder or runner)')
})

// ---------------------------------------------------------------------------
// imageContract
// ---------------------------------------------------------------------------

test('imageContract prefers the contract labels', t => {
  const contract = imageContract({
    id: 'sha256:1',
    labels: {
      'io.scanpack.entrypoint': '/app/.venv/bin/media-tool',
      'io.scanpack.default-args': '["--input","/media"]',
      'io.scanpack.mount-path': '/media'
    },
    entrypoint: ['/app/.venv/bin/media-tool'],
    cmd: ['--input', '/media'],
    workingDir: '/app'
  })

  t.deepEqual(contract, {entrypoint: '/app/.venv/bin/media-tool', defaultArgs: ['--input', '/media'], mountPath: '/media'})
})

test('imageContract falls back to the image configuration', t => {
  const contract = imageContract({id: 'sha256:1', labels: {}, entrypoint: ['/opt/tool/bin/scan'], cmd: ['-i', '/video'], workingDir: '/opt/tool'})
  t.deepEqual(contract, {entrypoint: '/opt/tool/bin/scan', defaultArgs: ['-i', '/video'], mountPath: '/video'})
})
