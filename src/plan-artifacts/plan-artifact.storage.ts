import { createHash } from 'crypto'
import { createReadStream, type ReadStream } from 'fs'
import { stat } from 'fs/promises'
import path from 'path'
import { Inject, Injectable } from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from '../config/app-config'

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

export type StoredArtifact = {
  fileName: string
  absolutePath: string
  sizeBytes: number
}

/**
 * `jane doe` -> `jane_doe_<first 8 hex of sha256("jane doe")>_plan.xlsx`.
 * The hash keeps keys that share a slug apart.
 */
export function artifactFileNameForKey(jobKey: string): string {
  const slug = jobKey.replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'athlete'
  const hash = createHash('sha256').update(jobKey, 'utf8').digest('hex').slice(0, 8)
  return `${slug}_${hash}_plan.xlsx`
}

@Injectable()
export class PlanArtifactStorage {
  readonly directory: string

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.directory = path.resolve(config.planJobs.artifactDir)
  }

  fileNameFor(jobKey: string): string {
    return artifactFileNameForKey(jobKey)
  }

  pathFor(jobKey: string): string {
    return path.join(this.directory, this.fileNameFor(jobKey))
  }

  /**
   * Looks up a stored artifact by reference. Only plain file names inside the
   * artifact directory resolve; anything else is reported as missing.
   */
  async find(artifactRef: string): Promise<StoredArtifact | null> {
    if (artifactRef.length === 0 || path.basename(artifactRef) !== artifactRef || artifactRef === '..') {
      return null
    }
    const absolutePath = path.join(this.directory, artifactRef)
    try {
      const info = await stat(absolutePath)
      if (!info.isFile()) return null
      return { fileName: artifactRef, absolutePath, sizeBytes: info.size }
    } catch (err) {
      if (isMissingFileError(err)) return null
      throw err
    }
  }

  open(artifact: StoredArtifact): ReadStream {
    return createReadStream(artifact.absolutePath)
  }
}

// fs errors may come from another realm under test runners; match on shape.
function isMissingFileError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false
  return err.code === 'ENOENT' || err.code === 'ENOTDIR'
}
