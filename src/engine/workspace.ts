import process from 'node:process'
import {mkdir, readFile, readdir, rename, rm, writeFile} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {ImageNotFoundError, StagingError, WorkspaceError} from '../errors.js'
import type {Image, ImageLayer} from '../types.js'
import {isAlreadyExistsError, isMissingFileError, isProcessAlive} from './system.js'

/**
 * Directory where builds assemble and commit their images.
 *
 * - **staging/{buildId}/rootfs/**: image root while a build runs
 * - **images/{imageId}/rootfs/**: committed image root (never partial)
 * - **images/{imageId}/image.json**: ordered layer fingerprints for packagers
 *
 * ## Build Lifecycle
 *
 * 1. `prepareBuild()` creates an empty `staging/{buildId}/rootfs/`
 * 2. The executor applies every layer of the plan to that root
 * 3. Success: `commitImage()` writes `image.json` and renames the build
 *    directory to `images/{imageId}/`; when that image is already
 *    committed the staged copy is discarded
 *    OR Failure: `discardBuild()` deletes `staging/{buildId}/`
 *
 * @example
 * ```typescript
 * const ws = await BuildWorkspace.create('/tmp/strata-work')
 * const buildId = ws.generateBuildId()
 * const rootfs = await ws.prepareBuild(buildId)
 * // ... apply layers to rootfs ...
 * const image = await ws.commitImage(buildId, {id, manifestName, createdAt, layers})
 * ```
 */
export class BuildWorkspace {
  /**
   * Creates the workspace directories if needed.
   * @param root - Workspace root directory
   */
  static async create(root: string): Promise<BuildWorkspace> {
    await mkdir(join(root, 'staging'), {recursive: true})
    await mkdir(join(root, 'images'), {recursive: true})
    return new BuildWorkspace(root)
  }

  private constructor(readonly root: string) {}

  /**
   * Generates a unique build identifier.
   * The owning pid comes first so stale staging directories can be recognised.
   * @returns Build ID in format: `{pid}-{timestamp}-{uuid-prefix}`
   */
  generateBuildId(): string {
    return `${process.pid}-${Date.now()}-${randomUUID().slice(0, 8)}`
  }

  buildPath(buildId: string): string {
    this.validateId(buildId, 'build ID')
    return join(this.root, 'staging', buildId)
  }

  rootfsPath(buildId: string): string {
    return join(this.buildPath(buildId), 'rootfs')
  }

  imagePath(imageId: string): string {
    this.validateId(imageId, 'image ID')
    return join(this.root, 'images', imageId)
  }

  /**
   * Prepares an empty image root for a new build.
   * @returns Absolute path to the staging root filesystem
   */
  async prepareBuild(buildId: string): Promise<string> {
    try {
      const rootfs = this.rootfsPath(buildId)
      await mkdir(rootfs, {recursive: true})
      return rootfs
    } catch (error) {
      throw new StagingError(`Failed to prepare build ${buildId}`, {cause: error})
    }
  }

  /**
   * Commits a staged build as an image.
   * When the image id is already committed, by a concurrent build for
   * instance, that commit stays and the staged build is discarded.
   */
  async commitImage(buildId: string, image: Omit<Image, 'rootfs'>): Promise<Image> {
    const target = this.imagePath(image.id)
    const committed = {...image, rootfs: join(target, 'rootfs')}
    try {
      await writeFile(join(this.buildPath(buildId), 'image.json'), JSON.stringify(image, null, 2), 'utf8')
      await rename(this.buildPath(buildId), target)
    } catch (error: unknown) {
      if (!isAlreadyExistsError(error)) {
        throw new StagingError(`Failed to commit build ${buildId} as image ${image.id}`, {cause: error})
      }

      // Same id, same layers: the image committed first is kept
      await this.discardBuild(buildId)
    }

    return committed
  }

  /**
   * Discards a staged build (on failure or cancellation).
   */
  async discardBuild(buildId: string): Promise<void> {
    try {
      await rm(this.buildPath(buildId), {recursive: true, force: true})
    } catch (error) {
      throw new StagingError(`Failed to discard build ${buildId}`, {cause: error})
    }
  }

  /**
   * Removes staging directories left by processes that no longer run.
   * @returns Number of directories removed
   */
  async cleanupStaging(): Promise<number> {
    const entries = await readdir(join(this.root, 'staging'), {withFileTypes: true})
    let removed = 0
    for (const entry of entries) {
      const pid = Number.parseInt(entry.name.split('-')[0] ?? '', 10)
      if (entry.isDirectory() && (Number.isNaN(pid) || !isProcessAlive(pid))) {
        await rm(join(this.root, 'staging', entry.name), {recursive: true, force: true})
        removed++
      }
    }

    return removed
  }

  /**
   * Reads a committed image.
   * @throws ImageNotFoundError if no image with this id was committed
   */
  async openImage(imageId: string): Promise<Image> {
    const dir = this.imagePath(imageId)
    let content: string
    try {
      content = await readFile(join(dir, 'image.json'), 'utf8')
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ImageNotFoundError(imageId, {cause: error})
      }

      throw error
    }

    return {...parseImage(imageId, content), rootfs: join(dir, 'rootfs')}
  }

  /**
   * Lists committed images, newest first.
   */
  async listImages(): Promise<Image[]> {
    const entries = await readdir(join(this.root, 'images'), {withFileTypes: true})
    const images: Image[] = []
    for (const entry of entries) {
      if (entry.isDirectory()) {
        images.push(await this.openImage(entry.name))
      }
    }

    return images.sort((a, b) => b.createdAt.localeCompare(a.createdAt))
  }

  /**
   * Removes a committed image.
   * @throws ImageNotFoundError if the image does not exist
   */
  async removeImage(imageId: string): Promise<void> {
    await this.openImage(imageId)
    await rm(this.imagePath(imageId), {recursive: true, force: true})
  }

  /**
   * Validates an identifier to prevent path traversal.
   * @internal
   */
  private validateId(id: string, label: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new WorkspaceError('INVALID_ID', `Invalid ${label}: ${id}. Must contain only alphanumeric characters, dashes, and underscores.`)
    }
  }
}

function parseImage(imageId: string, content: string): Omit<Image, 'rootfs'> {
  let value: unknown
  try {
    value = JSON.parse(content)
  } catch (error) {
    throw new WorkspaceError('INVALID_IMAGE', `Image ${imageId}: image.json is not valid JSON`, {cause: error})
  }

  if (
    typeof value !== 'object' || value === null
    || !('id' in value) || typeof value.id !== 'string'
    || !('manifestName' in value) || typeof value.manifestName !== 'string'
    || !('createdAt' in value) || typeof value.createdAt !== 'string'
    || !('layers' in value) || !Array.isArray(value.layers)
  ) {
    throw new WorkspaceError('INVALID_IMAGE', `Image ${imageId}: image.json is malformed`)
  }

  const layers: ImageLayer[] = []
  for (const layer of value.layers) {
    if (!isImageLayer(layer)) {
      throw new WorkspaceError('INVALID_IMAGE', `Image ${imageId}: image.json has a malformed layer`)
    }

    layers.push(layer)
  }

  return {id: value.id, manifestName: value.manifestName, createdAt: value.createdAt, layers}
}

function isImageLayer(value: unknown): value is ImageLayer {
  return typeof value === 'object' && value !== null
    && 'stepId' in value && typeof value.stepId === 'string'
    && 'fingerprint' in value && typeof value.fingerprint === 'string'
    && 'cached' in value && typeof value.cached === 'boolean'
}
