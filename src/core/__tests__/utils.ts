import {join} from 'node:path'
import test from 'ava'
import {dirSize, formatDuration, formatSize, parseSize} from '../utils.js'
import {createTmpDir, writeTree} from '../../__tests__/helpers.js'

test('parseSize: units are binary and case-insensitive', t => {
  t.is(parseSize('512MB'), 536_870_912)
  t.is(parseSize('10kb'), 10_240)
  t.is(parseSize('1.5 GB'), 1_610_612_736)
  t.is(parseSize('2048'), 2048)
  t.is(parseSize(' 3B '), 3)
})

test('parseSize: rejects anything else', t => {
  t.is(parseSize('lots'), undefined)
  t.is(parseSize('5PB'), undefined)
  t.is(parseSize('-1MB'), undefined)
  t.is(parseSize(''), undefined)
})

test('formatSize', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(3 * 1024 * 1024 * 1024), '3.0 GB')
})

test('formatDuration', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('dirSize: sums regular files recursively', async t => {
  const root = await createTmpDir()
  await writeTree(root, {'a.txt': 'abc', 'sub/b.txt': 'hello'})
  t.is(await dirSize(root), 8)
})

test('dirSize: missing directory is empty', async t => {
  const root = await createTmpDir()
  t.is(await dirSize(join(root, 'missing')), 0)
})
