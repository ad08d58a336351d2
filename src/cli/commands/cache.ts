import chalk from 'chalk'
import type {Command} from 'commander'
import {formatSize, parseSize} from '../../core/utils.js'
import {ConfigError} from '../../errors.js'
import {createBuilder, formatTable, getGlobalOptions, shortDigest} from '../utils.js'

export function registerCacheCommand(program: Command): void {
  const cache = program
    .command('cache')
    .description('Inspect and maintain the layer cache')

  cache
    .command('ls')
    .description('List cached layers, most recently used first')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const builder = await createBuilder(cmd)
      const layers = await builder.listLayers()

      if (json) {
        console.log(JSON.stringify(layers.map(({archivePath: _archivePath, ...layer}) => layer), null, 2))
        return
      }

      if (layers.length === 0) {
        console.log(chalk.gray('Cache is empty.'))
        return
      }

      const rows = layers.map(layer => [
        shortDigest(layer.key),
        layer.stepId,
        layer.parent ? shortDigest(layer.parent) : '-',
        formatSize(layer.size),
        layer.lastUsedAt.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '')
      ])
      const [header, ...lines] = formatTable(['KEY', 'STEP', 'PARENT', 'SIZE', 'LAST USED'], rows)
      console.log(chalk.bold(header))
      for (const line of lines) {
        console.log(line)
      }

      const total = layers.reduce((sum, layer) => sum + layer.size, 0)
      console.log(chalk.gray(`\n${layers.length} layer${layers.length > 1 ? 's' : ''}, ${formatSize(total)}`))
    })

  cache
    .command('prune')
    .description('Evict least recently used layers down to a size')
    .option('--max-size <size>', 'Size to prune to, e.g. 512MB (default: the configured maximum)')
    .action(async (options: {maxSize?: string}, cmd: Command) => {
      let maxSize: number | undefined
      if (options.maxSize !== undefined) {
        maxSize = parseSize(options.maxSize)
        if (maxSize === undefined) {
          throw new ConfigError(`Invalid --max-size: ${options.maxSize}`)
        }
      }

      const builder = await createBuilder(cmd)
      if (maxSize === undefined && builder.settings.maxCacheSize === undefined) {
        console.log(chalk.gray('No cache size limit configured; pass --max-size.'))
        return
      }

      const evicted = await builder.pruneCache(maxSize)
      if (evicted.length === 0) {
        console.log(chalk.gray('Nothing to evict.'))
      } else {
        console.log(chalk.green(`Evicted ${evicted.length} layer${evicted.length > 1 ? 's' : ''}.`))
      }
    })

  cache
    .command('reset')
    .description('Remove every cached layer and the build history')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const builder = await createBuilder(cmd)
      await builder.resetCache()
      console.log(chalk.green('Cache cleared.'))
    })
}
