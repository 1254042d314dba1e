import fsPromises, { mkdtemp, mkdir, rm, writeFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import { loadAppConfig } from '../config/app-config'
import { PlanArtifactStorage, artifactFileNameForKey } from './plan-artifact.storage'

describe('artifactFileNameForKey', () => {
  it('builds slug + hash file names', () => {
    expect(artifactFileNameForKey('jane doe')).toBe('jane_doe_ed37d99b_plan.xlsx')
    expect(artifactFileNameForKey('zo\u00eb')).toBe('zo_2752b886_plan.xlsx')
    expect(artifactFileNameForKey('日本')).toBe('athlete_cf2abf0c_plan.xlsx')
  })

  it('keeps keys with the same slug apart', () => {
    expect(artifactFileNameForKey('jane-doe')).toBe('jane_doe_2751e2c0_plan.xlsx')
    expect(artifactFileNameForKey('jane-doe')).not.toBe(artifactFileNameForKey('jane doe'))
  })
})

describe('PlanArtifactStorage', () => {
  let dir: string
  let storage: PlanArtifactStorage

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'plan-artifacts-'))
    storage = new PlanArtifactStorage(loadAppConfig({ PLAN_ARTIFACT_DIR: dir }))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('derives the artifact path from the job key alone', () => {
    expect(storage.pathFor('jane doe')).toBe(path.join(dir, 'jane_doe_ed37d99b_plan.xlsx'))
  })

  it('finds an existing artifact with its size', async () => {
    await writeFile(path.join(dir, 'jane_doe_plan.xlsx'), Buffer.from('abc'))

    expect(await storage.find('jane_doe_plan.xlsx')).toEqual({
      fileName: 'jane_doe_plan.xlsx',
      absolutePath: path.join(dir, 'jane_doe_plan.xlsx'),
      sizeBytes: 3,
    })
  })

  it('returns null for missing files and directories', async () => {
    await mkdir(path.join(dir, 'folder.xlsx'))

    expect(await storage.find('missing.xlsx')).toBeNull()
    expect(await storage.find('folder.xlsx')).toBeNull()
  })

  it('classifies fs failures by error code', async () => {
    const statSpy = jest.spyOn(fsPromises, 'stat')
    try {
      statSpy.mockRejectedValueOnce({ code: 'ENOENT' })
      expect(await storage.find('gone.xlsx')).toBeNull()

      statSpy.mockRejectedValueOnce({ code: 'EACCES' })
      await expect(storage.find('locked.xlsx')).rejects.toEqual({ code: 'EACCES' })
    } finally {
      statSpy.mockRestore()
    }
  })

  it('refuses references that leave the artifact directory', async () => {
    expect(await storage.find('../secret.xlsx')).toBeNull()
    expect(await storage.find('..')).toBeNull()
    expect(await storage.find('')).toBeNull()
  })

  it('streams the stored bytes', async () => {
    await writeFile(path.join(dir, 'a.xlsx'), Buffer.from('plan-bytes'))
    const found = await storage.find('a.xlsx')
    if (!found) throw new Error('artifact not found')

    const chunks: Buffer[] = []
    for await (const chunk of storage.open(found)) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
    }
    expect(Buffer.concat(chunks).toString()).toBe('plan-bytes')
  })
})
