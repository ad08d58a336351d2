import process from 'node:process'
import {access, readFile, stat} from 'node:fs/promises'
import {basename, dirname, extname, join, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {normalizeRelativePath} from '../engine/paths.js'
import type {BuildManifest, InputPattern, ManifestDefinition, Step} from '../types.js'

export const MANIFEST_FILENAMES = ['strata.yml', 'strata.yaml', 'strata.json'] as const

/**
 * Loads build manifests from YAML or JSON files.
 *
 * The document is validated field by field; step ids default to a slug of
 * the step name, the manifest env is merged under each step's env, and every
 * step receives the position it was declared at as its `orderHint`.
 */
export class ManifestLoader {
  async load(filePath: string): Promise<BuildManifest> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, resolve(filePath))
  }

  parse(content: string, filePath: string): BuildManifest {
    return this.resolveManifest(parseManifestFile(content, filePath), filePath)
  }

  /**
   * Resolves a manifest built in code rather than read from a file.
   * @param baseDir - Directory `context` is resolved against
   */
  fromDefinition(definition: ManifestDefinition, baseDir: string): BuildManifest {
    return this.resolveManifest(definition, join(resolve(baseDir), MANIFEST_FILENAMES[0]))
  }

  private resolveManifest(input: unknown, filePath: string): BuildManifest {
    if (!isRecord(input)) {
      throw new ValidationError('Invalid manifest: expected a mapping at the top level')
    }

    const name = optionalString(input.name, 'manifest name') ?? slugify(basename(dirname(filePath)))
    const base = optionalString(input.base, 'manifest base')
    const context = optionalString(input.context, 'manifest context') ?? '.'
    const env = stringRecord(input.env, 'manifest env')

    if (!Array.isArray(input.steps) || input.steps.length === 0) {
      throw new ValidationError('Invalid manifest: steps must be a non-empty array')
    }

    const steps = input.steps.map((step: unknown, index: number) => this.resolveStep(step, index, env))
    this.validateUniqueStepIds(steps)

    return {
      name,
      base,
      contextRoot: resolve(dirname(filePath), context),
      steps
    }
  }

  private resolveStep(input: unknown, orderHint: number, manifestEnv: Record<string, string>): Step {
    if (!isRecord(input)) {
      throw new ValidationError(`Invalid step #${orderHint + 1}: expected a mapping`)
    }

    const name = optionalString(input.name, `name of step #${orderHint + 1}`)
    const explicitId = optionalString(input.id, `id of step #${orderHint + 1}`)
    if (!explicitId && !name) {
      throw new ValidationError(`Invalid step #${orderHint + 1}: at least one of "id" or "name" must be defined`)
    }

    const id = explicitId ?? slugify(name ?? '')
    this.validateIdentifier(id, 'step id')

    if (typeof input.run !== 'string' || input.run.trim() === '') {
      throw new ValidationError(`Invalid step ${id}: run must be a non-empty string`)
    }

    const after = stringArray(input.after, `after of step ${id}`)
    for (const ref of after) {
      this.validateIdentifier(ref, `after reference in step ${id}`)
    }

    return {
      id,
      name,
      command: input.run,
      env: {...manifestEnv, ...stringRecord(input.env, `env of step ${id}`)},
      inputs: this.resolveInputs(id, input.inputs),
      outputs: input.outputs === undefined
        ? undefined
        : stringArray(input.outputs, `outputs of step ${id}`).map(output => normalizeRelativePath(output, `output of step ${id}`)),
      after,
      orderHint
    }
  }

  private resolveInputs(stepId: string, inputs: unknown): InputPattern[] {
    if (inputs === undefined) {
      return []
    }

    if (!Array.isArray(inputs)) {
      throw new ValidationError(`Invalid step ${stepId}: inputs must be an array`)
    }

    return inputs.map((input: unknown) => {
      if (typeof input === 'string') {
        return {pattern: validatePattern(stepId, input), optional: false}
      }

      if (isRecord(input) && typeof input.pattern === 'string') {
        if (input.optional !== undefined && typeof input.optional !== 'boolean') {
          throw new ValidationError(`Invalid step ${stepId}: input '${input.pattern}' optional must be a boolean`)
        }

        return {pattern: validatePattern(stepId, input.pattern), optional: input.optional === true}
      }

      throw new ValidationError(`Invalid step ${stepId}: each input must be a pattern or {pattern, optional}`)
    })
  }

  private validateIdentifier(id: string, context: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new ValidationError(`Invalid ${context}: '${id}' must contain only alphanumeric characters, underscore, and hyphen`)
    }
  }

  private validateUniqueStepIds(steps: Step[]): void {
    const seen = new Set<string>()
    for (const step of steps) {
      if (seen.has(step.id)) {
        throw new ValidationError(`Duplicate step id: '${step.id}'`)
      }

      seen.add(step.id)
    }
  }
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function parseManifestFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  try {
    if (ext === '.yaml' || ext === '.yml') {
      return parseYaml(content)
    }

    return JSON.parse(content)
  } catch (error) {
    throw new ValidationError(`Invalid manifest ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
  }
}

/**
 * Resolve a manifest path. A directory is searched for `strata.yml`,
 * `strata.yaml` then `strata.json`.
 */
export async function resolveManifestFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  let isFile: boolean
  try {
    isFile = (await stat(target)).isFile()
  } catch (error) {
    throw new ValidationError(`Path does not exist: ${target}`, {cause: error})
  }

  if (isFile) {
    return target
  }

  for (const filename of MANIFEST_FILENAMES) {
    const candidate = join(target, filename)
    if (await exists(candidate)) {
      return candidate
    }
  }

  throw new ValidationError(`No manifest found in ${target}. Expected one of: ${MANIFEST_FILENAMES.join(', ')}`)
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/** Patterns may be negated; the pattern body must stay inside the context. */
function validatePattern(stepId: string, pattern: string): string {
  const body = pattern.startsWith('!') ? pattern.slice(1) : pattern
  if (body.trim() === '') {
    throw new ValidationError(`Invalid step ${stepId}: input pattern must not be empty`)
  }

  normalizeRelativePath(body, `input pattern of step ${stepId}`)
  return pattern
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown, context: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid ${context}: expected a string`)
  }

  return value
}

function stringArray(value: unknown, context: string): string[] {
  if (value === undefined) {
    return []
  }

  if (!Array.isArray(value) || !value.every((item: unknown) => typeof item === 'string')) {
    throw new ValidationError(`Invalid ${context}: expected an array of strings`)
  }

  return value.map(String)
}

/** Scalar values (YAML `PORT: 8080`) are kept as their string form. */
function stringRecord(value: unknown, context: string): Record<string, string> {
  if (value === undefined || value === null) {
    return {}
  }

  if (!isRecord(value)) {
    throw new ValidationError(`Invalid ${context}: expected a mapping`)
  }

  const result: Record<string, string> = {}
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') {
      throw new ValidationError(`Invalid ${context}: value of ${key} must be a scalar`)
    }

    result[key] = String(item)
  }

  return result
}
