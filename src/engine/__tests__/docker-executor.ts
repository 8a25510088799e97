import {join} from 'node:path'
import test from 'ava'
import {Workspace} from '../workspace.js'
import {buildImageArgs, createContainerArgs, DockerCliExecutor, parseImageInspect, runImageArgs} from '../docker-executor.js'
import type {RunContainerRequest} from '../types.js'
import {createTmpDir, isDockerAvailable} from '../../__tests__/helpers.js'

const hasDocker = isDockerAvailable()
const dockerTest = hasDocker ? test : test.skip

function builderRequest(overrides: Partial<RunContainerRequest> = {}): RunContainerRequest {
  return {
    name: 'scanpack-media-builder-1',
    image: 'python:3.12-slim',
    cmd: ['sh', '-c', 'poetry install'],
    setup: {cmd: ['sh', '-c', 'pip install poetry']},
    output: {stagingRunId: 'run-1', containerPath: '/output'},
    ...overrides
  }
}

// -- createContainerArgs -----------------------------------------------------

test('createContainerArgs labels the container with its workspace', async t => {
  const ws = await Workspace.create(await createTmpDir(), 'media')
  const args = createContainerArgs(ws, builderRequest())

  t.deepEqual(args, [
    'create', '--name', 'scanpack-media-builder-1', '--network', 'bridge',
    '--label', 'scanpack=true', '--label', 'scanpack.workspace=media',
    '-v', `${ws.runStagingArtifactsPath('run-1')}:/output:rw`
  ])
})

test('createContainerArgs passes env and mounts caches read-write', async t => {
  const ws = await Workspace.create(await createTmpDir(), 'media')
  const args = createContainerArgs(ws, builderRequest({
    env: {PIP_DISABLE_PIP_VERSION_CHECK: '1'},
    caches: [{name: 'poetry-cache', containerPath: '/root/.cache/pypoetry'}]
  }))

  t.true(args.includes('PIP_DISABLE_PIP_VERSION_CHECK=1'))
  t.true(args.includes(`${join(ws.root, 'caches', 'poetry-cache')}:/root/.cache/pypoetry:rw`))
})

test('createContainerArgs adds setup caches once', async t => {
  const ws = await Workspace.create(await createTmpDir(), 'media')
  const args = createContainerArgs(ws, builderRequest({
    setup: {
      cmd: ['sh', '-c', 'pip install poetry'],
      caches: [
        {name: 'pip-cache', containerPath: '/root/.cache/pip'},
        {name: 'poetry-cache', containerPath: '/root/.cache/pypoetry'}
      ]
    },
    caches: [{name: 'poetry-cache', containerPath: '/root/.cache/pypoetry'}]
  }))

  const volumes = args.filter((_, i) => args[i - 1] === '-v')
  t.is(volumes.length, 3)
  t.true(volumes.includes(`${join(ws.root, 'caches', 'pip-cache')}:/root/.cache/pip:rw`))
})

test('createContainerArgs leaves sources to docker cp', async t => {
  const ws = await Workspace.create(await createTmpDir(), 'media')
  const args = createContainerArgs(ws, builderRequest({
    sources: [{hostPath: '/tmp/scanpack-context-1', containerPath: '/app'}]
  }))

  t.false(args.some(arg => arg.startsWith('/tmp/scanpack-context-1')))
})

// -- buildImageArgs ----------------------------------------------------------

test('buildImageArgs sorts labels and ends with the context path', t => {
  const args = buildImageArgs({
    dockerfilePath: '/ws/staging/r2/Dockerfile',
    contextPath: '/ws/runs/r1/artifacts',
    tags: ['media-tool:latest', 'media-tool:1.2.3'],
    labels: {'io.scanpack.mount-path': '/video', 'io.scanpack.entrypoint': '/app/.venv/bin/media-tool'}
  }, '/tmp/iid')

  t.deepEqual(args, [
    'build',
    '--file', '/ws/staging/r2/Dockerfile',
    '--iidfile', '/tmp/iid',
    '--label', 'io.scanpack.entrypoint=/app/.venv/bin/media-tool',
    '--label', 'io.scanpack.mount-path=/video',
    '--tag', 'media-tool:latest',
    '--tag', 'media-tool:1.2.3',
    '/ws/runs/r1/artifacts'
  ])
})

test('buildImageArgs adds --pull when asked', t => {
  const args = buildImageArgs({dockerfilePath: 'D', contextPath: 'C', tags: ['t'], pull: true}, 'I')
  t.deepEqual(args, ['build', '--file', 'D', '--iidfile', 'I', '--pull', '--tag', 't', 'C'])
})

// -- runImageArgs ------------------------------------------------------------

test('runImageArgs without arguments leaves the image CMD in charge', t => {
  const args = runImageArgs({name: 'run-1', image: 'media-tool:latest', args: []})
  t.deepEqual(args, ['run', '--rm', '--name', 'run-1', '--label', 'scanpack=true', 'media-tool:latest'])
})

test('runImageArgs binds the mount and passes arguments after the image', t => {
  const args = runImageArgs({
    name: 'run-1',
    image: 'media-tool:latest',
    args: ['-i', '/video/new'],
    mounts: [{hostPath: '/srv/media', containerPath: '/video', readOnly: false}]
  })

  t.deepEqual(args, [
    'run', '--rm', '--name', 'run-1', '--label', 'scanpack=true',
    '-v', '/srv/media:/video:rw',
    'media-tool:latest', '-i', '/video/new'
  ])
})

test('runImageArgs places --entrypoint before the image', t => {
  const args = runImageArgs({name: 'run-1', image: 'media-tool:latest', args: ['-c', 'ls'], entrypoint: 'sh'})
  t.deepEqual(args.slice(-5), ['--entrypoint', 'sh', 'media-tool:latest', '-c', 'ls'])
})

// -- parseImageInspect -------------------------------------------------------

test('parseImageInspect narrows the image configuration', t => {
  const info = parseImageInspect(JSON.stringify({
    Id: 'sha256:abc',
    Config: {
      Labels: {'io.scanpack.mount-path': '/video', ignored: 3},
      Entrypoint: ['/app/.venv/bin/media-tool'],
      Cmd: ['-i', '/video'],
      WorkingDir: '/app'
    }
  }))

  t.deepEqual(info, {
    id: 'sha256:abc',
    labels: {'io.scanpack.mount-path': '/video'},
    entrypoint: ['/app/.venv/bin/media-tool'],
    cmd: ['-i', '/video'],
    workingDir: '/app'
  })
})

test('parseImageInspect tolerates null labels and command', t => {
  const info = parseImageInspect(JSON.stringify({Id: 'sha256:abc', Config: {Labels: null, Cmd: null}}))
  t.deepEqual(info.labels, {})
  t.deepEqual(info.cmd, [])
  t.is(info.workingDir, '')
})

test('parseImageInspect rejects output without an Id', t => {
  t.throws(() => parseImageInspect('{"Config":{}}'), {instanceOf: TypeError})
})

// -- docker ------------------------------------------------------------------

dockerTest('inspectImage returns undefined for an unknown image', async t => {
  const executor = new DockerCliExecutor()
  t.is(await executor.inspectImage('scanpack-test-missing-image:never'), undefined)
})
