import chalk from 'chalk'
import type {Command} from 'commander'
import {dirSize, formatSize} from '../../core/utils.js'
import {createBuilder, formatTable, getGlobalOptions, shortDigest} from '../utils.js'

export function registerImagesCommand(program: Command): void {
  program
    .command('images')
    .description('List committed images')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const builder = await createBuilder(cmd)
      const images = await builder.listImages()

      if (json) {
        console.log(JSON.stringify(images, null, 2))
        return
      }

      if (images.length === 0) {
        console.log(chalk.gray('No images found.'))
        return
      }

      const rows: string[][] = []
      for (const image of images) {
        const cached = image.layers.filter(layer => layer.cached).length
        rows.push([
          shortDigest(image.id),
          image.manifestName,
          `${image.layers.length} (${cached} cached)`,
          formatSize(await dirSize(image.rootfs)),
          image.createdAt.replace('T', ' ').replace(/\.\d+Z$/, '')
        ])
      }

      const [header, ...lines] = formatTable(['IMAGE', 'MANIFEST', 'LAYERS', 'SIZE', 'CREATED'], rows)
      console.log(chalk.bold(header))
      for (const line of lines) {
        console.log(line)
      }
    })
}
