import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {createBuilder, shortDigest} from '../utils.js'

export function registerRmImageCommand(program: Command): void {
  program
    .command('rm-image')
    .description('Remove one or more committed images')
    .argument('<image...>', 'Image ids (or unique prefixes)')
    .action(async (ids: string[], _options: Record<string, unknown>, cmd: Command) => {
      const builder = await createBuilder(cmd)
      const images = await builder.listImages()

      const targets: string[] = []
      for (const id of ids) {
        const matches = images.filter(image => image.id.startsWith(id))
        if (matches.length !== 1) {
          const reason = matches.length === 0 ? 'Image not found' : 'Ambiguous image id'
          console.error(chalk.red(`${reason}: ${id}`))
          process.exitCode = 1
          return
        }

        targets.push(matches[0].id)
      }

      for (const id of targets) {
        await builder.removeImage(id)
        console.log(chalk.green(`Removed ${shortDigest(id)}`))
      }
    })
}
