import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { startImagesEmulator, TokenStore, type ImagesEmulator } from '../../src/emulator/index.js'
import { ImagesClient } from '../../src/images/index.js'
import { createLogger } from '../../src/utils/logger.js'

const quiet = createLogger({ level: 'error' })

describe('ImagesClient', () => {
  const tokens = new TokenStore()
  let emulator: ImagesEmulator
  let client: ImagesClient

  beforeAll(async () => {
    emulator = await startImagesEmulator({ tokens })
  })

  afterAll(async () => {
    await emulator.close()
  })

  beforeEach(() => {
    emulator.reset()
    client = new ImagesClient(emulator.url, tokens.issue('tenant-a').id, { logger: quiet })
  })

  async function createImage(properties: Record<string, string> = {}): Promise<string> {
    const response = await client.createImage({ name: 'probe', containerFormat: 'bare', diskFormat: 'raw', properties })
    if (!response.entity) {
      throw new Error(`create returned ${response.statusCode}`)
    }
    return response.entity.id
  }

  it('should not duplicate the /v2 suffix', () => {
    const withVersion = new ImagesClient(`${emulator.url}/v2/`, 'test-token', { logger: quiet })

    expect(withVersion.baseUrl).toBe(`${emulator.url}/v2`)
  })

  describe('createImage', () => {
    it('should create a queued image owned by the tenant', async () => {
      const response = await client.createImage({ name: 'probe', containerFormat: 'bare', diskFormat: 'raw' })

      expect(response.statusCode).toBe(201)
      expect(response.entity).toMatchObject({
        name: 'probe',
        status: 'queued',
        visibility: 'shared',
        owner: 'tenant-a',
        containerFormat: 'bare',
        diskFormat: 'raw',
        additionalProperties: {},
      })
      expect(response.headers.get('location')).toBe(`${emulator.url}/v2/images/${response.entity?.id}`)
    })

    it('should reject an unknown disk format', async () => {
      const response = await client.createImage({ diskFormat: 'floppy' })

      expect(response.statusCode).toBe(400)
      expect(response.entity).toBeUndefined()
    })

    it('should require a token', async () => {
      const anonymous = new ImagesClient(emulator.url, 'not-a-token', { logger: quiet })

      expect((await anonymous.createImage()).statusCode).toBe(401)
    })
  })

  describe('updateImage', () => {
    it('should add, replace and remove additional properties', async () => {
      const id = await createImage()

      const added = await client.updateImage(id, { add: { user_prop: 'v1' } })
      expect(added.statusCode).toBe(200)
      expect(added.entity?.additionalProperties).toEqual({ user_prop: 'v1' })

      const replaced = await client.updateImage(id, { replace: { user_prop: 'v2' } })
      expect(replaced.entity?.additionalProperties).toEqual({ user_prop: 'v2' })

      const removed = await client.updateImage(id, { remove: { user_prop: 'v2' } })
      expect(removed.statusCode).toBe(200)
      expect(removed.entity?.additionalProperties).toEqual({})
    })

    it('should apply several operations in one request', async () => {
      const id = await createImage({ stale: 'old' })

      const response = await client.updateImage(id, {
        add: { fresh: 'new' },
        remove: { stale: '' },
        replace: { name: 'renamed' },
      })

      expect(response.statusCode).toBe(200)
      expect(response.entity?.name).toBe('renamed')
      expect(response.entity?.additionalProperties).toEqual({ fresh: 'new' })
    })

    it('should answer 409 when replacing or removing a missing property', async () => {
      const id = await createImage()

      expect((await client.updateImage(id, { replace: { user_prop: 'v' } })).statusCode).toBe(409)
      expect((await client.updateImage(id, { remove: { user_prop: 'v' } })).statusCode).toBe(409)
    })

    it('should answer 403 for read-only and base properties', async () => {
      const id = await createImage()

      expect((await client.updateImage(id, { replace: { status: 'active' } })).statusCode).toBe(403)
      expect((await client.updateImage(id, { remove: { name: '' } })).statusCode).toBe(403)
    })

    it('should answer 400 for a non-string additional property', async () => {
      const id = await createImage()

      expect((await client.updateImage(id, { add: { user_prop: 5 } })).statusCode).toBe(400)
    })

    it('should answer 415 without the patch media type', async () => {
      const id = await createImage()

      const response = await client.request('PATCH', `/images/${id}`, { json: [] })

      expect(response.statusCode).toBe(415)
    })

    it('should answer 404 for an unknown image', async () => {
      expect((await client.updateImage('missing', { add: { user_prop: 'v' } })).statusCode).toBe(404)
    })
  })

  describe('listImages', () => {
    it('should page with limit and marker', async () => {
      const ids = [await createImage(), await createImage(), await createImage()]

      const first = await client.listImages({ limit: 2 })
      expect(first.entity?.images.map((image) => image.id)).toEqual(ids.slice(0, 2))
      expect(first.entity?.next).toBe(`/v2/images?marker=${ids[1]}&limit=2`)

      const second = await client.listImages({ limit: 2, marker: ids[1] })
      expect(second.entity?.images.map((image) => image.id)).toEqual([ids[2]])
      expect(second.entity?.next).toBeUndefined()
    })

    it('should filter by name', async () => {
      await createImage()
      const other = await client.createImage({ name: 'other' })

      const listing = await client.listImages({ name: 'other' })

      expect(listing.entity?.images.map((image) => image.id)).toEqual([other.entity?.id])
    })
  })

  describe('tags and deletion', () => {
    it('should add and remove tags', async () => {
      const id = await createImage()

      expect((await client.addTag(id, 'probe-tag')).statusCode).toBe(204)
      expect((await client.getImage(id)).entity?.tags).toEqual(['probe-tag'])
      expect((await client.deleteTag(id, 'probe-tag')).statusCode).toBe(204)
      expect((await client.deleteTag(id, 'probe-tag')).statusCode).toBe(404)
    })

    it('should delete images and refuse protected ones', async () => {
      const id = await createImage()
      const guarded = await client.createImage({ name: 'guarded', protected: true })

      expect((await client.deleteImage(id)).statusCode).toBe(204)
      expect((await client.getImage(id)).statusCode).toBe(404)
      expect((await client.deleteImage(guarded.entity?.id ?? '')).statusCode).toBe(403)
      expect(emulator.imageCount()).toBe(1)
    })
  })
})
