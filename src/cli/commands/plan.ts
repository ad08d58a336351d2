import chalk from 'chalk'
import type {Command} from 'commander'
import {createBuilder, formatTable, getGlobalOptions, shortDigest} from '../utils.js'

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show the planned step order, cache keys and dependencies')
    .argument('[manifest]', 'Manifest file or directory (default: current directory)')
    .option('-C, --context <path>', 'Build context directory (overrides the manifest)')
    .action(async (manifest: string | undefined, options: {context?: string}, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const builder = await createBuilder(cmd)
      const {plan, graph, steps} = await builder.plan(manifest, {context: options.context})

      if (json) {
        console.log(JSON.stringify({
          manifestName: plan.manifestName,
          baseDigest: plan.baseDigest,
          steps: steps.map(({planned, cached}) => ({
            position: planned.position,
            stepId: planned.step.id,
            fingerprint: planned.fingerprint,
            missRate: planned.missRate,
            inputFiles: planned.inputFiles,
            cached
          })),
          edges: graph.edges
        }, null, 2))
        return
      }

      console.log(chalk.bold(`\nPlan: ${chalk.cyan(plan.manifestName)}\n`))
      const rows = steps.map(({planned, cached}) => [
        String(planned.position),
        planned.step.id,
        shortDigest(planned.fingerprint),
        planned.missRate === undefined ? '-' : planned.missRate.toFixed(2),
        cached ? 'yes' : 'no'
      ])
      const [header, ...lines] = formatTable(['#', 'STEP', 'FINGERPRINT', 'MISS RATE', 'CACHED'], rows)
      console.log(chalk.bold(header))
      for (const line of lines) {
        console.log(line)
      }

      if (graph.edges.length > 0) {
        console.log(chalk.bold('\nDependencies:'))
        for (const edge of graph.edges) {
          console.log(`  ${edge.producer} → ${edge.consumer} ${chalk.gray(`(${edge.reason}: ${edge.via})`)}`)
        }
      }

      console.log()
    })
}
