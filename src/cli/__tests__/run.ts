import {join} from 'node:path'
import test from 'ava'
import {ImageNotFoundError, InputDirectoryNotFoundError} from '../../errors.js'
import {runUnderContract} from '../commands/run.js'
import {createTmpDir, FakeExecutor, type FakeExecutorOptions} from '../../__tests__/helpers.js'

const ignoreLogs = () => {/* noop */}

function withImage(options: FakeExecutorOptions = {}): FakeExecutor {
  const executor = new FakeExecutor(options)
  executor.images.set('media-tool:latest', {
    id: 'sha256:1',
    labels: {
      'io.scanpack.entrypoint': '/app/.venv/bin/media-tool',
      'io.scanpack.default-args': '["-i","/video"]',
      'io.scanpack.mount-path': '/video'
    },
    entrypoint: ['/app/.venv/bin/media-tool'],
    cmd: ['-i', '/video'],
    workingDir: '/app'
  })
  return executor
}

test('the application exit code comes back untranslated', async t => {
  const executor = withImage({runExitCode: 3})
  const media = await createTmpDir()

  t.is(await runUnderContract(executor, 'media-tool:latest', [], {mount: media}, ignoreLogs), 3)

  const [request] = executor.runImageRequests
  t.deepEqual(request.args, [])
  t.is(request.entrypoint, undefined)
  t.deepEqual(request.mounts, [{hostPath: media, containerPath: '/video', readOnly: false}])
})

test('a clean exit returns zero', async t => {
  const executor = withImage()
  t.is(await runUnderContract(executor, 'media-tool:latest', ['--help'], {}, ignoreLogs), 0)
  t.deepEqual(executor.runImageRequests[0].args, ['--help'])
  t.is(executor.runImageRequests[0].mounts, undefined)
})

test('a replaced entrypoint is passed to docker', async t => {
  const executor = withImage()
  await runUnderContract(executor, 'media-tool:latest', ['-c', 'ls /app'], {entrypoint: 'sh'}, ignoreLogs)
  t.is(executor.runImageRequests[0].entrypoint, 'sh')
  t.deepEqual(executor.runImageRequests[0].args, ['-c', 'ls /app'])
})

test('an unknown image is reported before anything starts', async t => {
  const executor = new FakeExecutor()
  await t.throwsAsync(async () => runUnderContract(executor, 'media-tool:latest', [], {}, ignoreLogs), {instanceOf: ImageNotFoundError})
  t.is(executor.runImageRequests.length, 0)
})

test('a missing mount directory is reported before anything starts', async t => {
  const executor = withImage()
  const missing = join(await createTmpDir(), 'absent')
  await t.throwsAsync(async () => runUnderContract(executor, 'media-tool:latest', [], {mount: missing}, ignoreLogs), {instanceOf: InputDirectoryNotFoundError})
  t.is(executor.runImageRequests.length, 0)
})
