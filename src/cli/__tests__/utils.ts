import test from 'ava'
import {Command} from 'commander'
import {ConfigError} from '../../errors.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {buildReporter, cliOverrides, formatTable, getGlobalOptions, shortDigest} from '../utils.js'

test('formatTable pads columns to the widest cell', t => {
  t.deepEqual(formatTable(['ID', 'SIZE'], [['abc', '10 B'], ['abcdef', '1.0 KB']]), [
    'ID      SIZE',
    'abc     10 B',
    'abcdef  1.0 KB'
  ])
})

test('formatTable without rows prints the header', t => {
  t.deepEqual(formatTable(['KEY', 'STEP'], []), ['KEY  STEP'])
})

test('cliOverrides keeps only the flags that were given', t => {
  t.deepEqual(cliOverrides({}), {})
  t.deepEqual(cliOverrides({workdir: 'build', maxCacheSize: '1MB', json: true}), {workdir: 'build', maxCacheSize: 1_048_576})
  t.deepEqual(cliOverrides({cacheDir: '/var/cache/strata'}), {cacheDir: '/var/cache/strata'})
})

test('cliOverrides rejects an unreadable cache size', t => {
  const error = t.throws(() => cliOverrides({maxCacheSize: 'big'}), {instanceOf: ConfigError})
  t.is(error?.message, 'Invalid --max-cache-size: big')
})

test('getGlobalOptions merges options of parent commands', t => {
  const program = new Command()
    .option('--workdir <dir>')
    .option('--json')
  const images = program.command('images').action(() => undefined)

  program.parse(['--workdir', 'build', '--json', 'images'], {from: 'user'})
  t.deepEqual(getGlobalOptions(images), {workdir: 'build', json: true})
})

test('shortDigest keeps twelve characters', t => {
  t.is(shortDigest('0123456789abcdef'), '0123456789ab')
})

test('buildReporter leaves JSON output to the builder', t => {
  t.is(buildReporter({json: true, verbose: true}), undefined)
  t.true(buildReporter({verbose: true}) instanceof InteractiveReporter)
})
