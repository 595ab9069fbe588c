/**
 * Unit tests for manifest loading, src/manifest-loader.ts
 */
import * as fs from 'fs'
import * as path from 'path'
import { jest } from '@jest/globals'
import { ErrorCodes, InvalidPathError, ManifestReadError } from '../src/errors.js'
import { ManifestLoader, validatePath } from '../src/manifest-loader.js'

jest.mock('@actions/core')

const MANIFESTS = path.join(__dirname, '..', '__fixtures__', 'manifests')

function fixture(name: string): string {
  return fs.readFileSync(path.join(MANIFESTS, name), 'utf8')
}

describe('manifest-loader.ts', () => {
  const loader = new ManifestLoader(MANIFESTS)

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should return the content of a single file unchanged', async () => {
    await expect(loader.load(['configmap.yaml'])).resolves.toBe(
      fixture('configmap.yaml')
    )
  })

  it('should join files in order and skip empty ones', async () => {
    const manifest = await loader.load([
      'deployment.yaml',
      'empty.yaml',
      'configmap.yaml'
    ])

    expect(manifest).toBe(
      `${fixture('deployment.yaml')}\n---\n${fixture('configmap.yaml')}`
    )
  })

  it('should return an empty string when no file has content', async () => {
    await expect(loader.load(['empty.yaml'])).resolves.toBe('')
    await expect(loader.load([])).resolves.toBe('')
  })

  it('should resolve segments that stay inside the directory', async () => {
    await expect(loader.load(['nested/../configmap.yaml'])).resolves.toBe(
      fixture('configmap.yaml')
    )
  })

  it('should reject parent traversal before reading anything', async () => {
    const readFile = jest.spyOn(fs.promises, 'readFile')

    await expect(
      loader.load(['configmap.yaml', '../secrets.yaml'])
    ).rejects.toThrow(
      new InvalidPathError('../secrets.yaml', "contains '..'")
    )
    expect(readFile).not.toHaveBeenCalled()
  })

  it('should reject absolute paths', async () => {
    const error = await loader.load(['/etc/passwd']).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(InvalidPathError)
    expect(error).toMatchObject({
      code: ErrorCodes.INVALID_PATH,
      message: 'invalid filename: /etc/passwd (absolute paths not allowed)'
    })
  })

  it('should report missing files as not found', async () => {
    const error = await loader.load(['missing.yaml']).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ManifestReadError)
    expect(error).toMatchObject({
      code: ErrorCodes.NOT_FOUND,
      path: 'missing.yaml'
    })
    expect(String(error)).toContain('failed to read file missing.yaml: ')
  })

  it('should recognise not-found errors that are not Error instances', async () => {
    jest.spyOn(fs.promises, 'readFile').mockRejectedValueOnce({
      code: 'ENOENT',
      message: 'no such file or directory'
    })

    await expect(loader.load(['configmap.yaml'])).rejects.toMatchObject({
      code: ErrorCodes.NOT_FOUND,
      message: 'failed to read file configmap.yaml: no such file or directory'
    })
  })

  it('should report other read failures as IO errors', async () => {
    jest
      .spyOn(fs.promises, 'readFile')
      .mockRejectedValueOnce(
        Object.assign(new Error('permission denied'), { code: 'EACCES' })
      )

    await expect(loader.load(['configmap.yaml'])).rejects.toMatchObject({
      code: ErrorCodes.IO_ERROR,
      message: 'failed to read file configmap.yaml: permission denied'
    })
  })

  describe('validatePath', () => {
    it('should return the normalized path', () => {
      expect(validatePath('./dir//app.yaml')).toBe(path.join('dir', 'app.yaml'))
    })

    it('should reject paths that still walk up after normalization', () => {
      expect(() => validatePath('a/../../b.yaml')).toThrow(InvalidPathError)
      expect(() => validatePath('..')).toThrow(InvalidPathError)
    })
  })
})
