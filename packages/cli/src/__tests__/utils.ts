import {mkdtemp, mkdir, writeFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import test from 'ava'
import {resolveConnectorDir} from '../utils.js'

test('resolveConnectorDir: returns the directory name and absolute path', async t => {
  const root = await mkdtemp(join(tmpdir(), 'hoist-test-'))
  try {
    const dir = join(root, 'source-example')
    await mkdir(dir)
    await writeFile(join(dir, 'metadata.yaml'), 'data: {}\n')
    const result = await resolveConnectorDir(dir)
    t.deepEqual(result, {name: 'source-example', dir})
  } finally {
    await rm(root, {recursive: true})
  }
})

test('resolveConnectorDir: throws when metadata.yaml is missing', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'hoist-test-'))
  try {
    await t.throwsAsync(async () => resolveConnectorDir(dir), {message: `No metadata.yaml found in ${dir}`})
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolveConnectorDir: throws for a missing path', async t => {
  const dir = join(tmpdir(), 'hoist-test-does-not-exist')
  await t.throwsAsync(async () => resolveConnectorDir(dir), {message: `Path does not exist: ${dir}`})
})

test('resolveConnectorDir: throws for a file', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'hoist-test-'))
  try {
    const file = join(dir, 'metadata.yaml')
    await writeFile(file, 'data: {}\n')
    await t.throwsAsync(async () => resolveConnectorDir(file), {message: `Not a directory: ${file}`})
  } finally {
    await rm(dir, {recursive: true})
  }
})
