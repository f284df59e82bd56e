import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { sendJson, sendText, startHttpServer } from '../../src/emulator/http.js'
import { startObjectStorageEmulator, TokenStore, type ObjectStorageEmulator } from '../../src/emulator/index.js'
import { HttpError, ObjectStorageError } from '../../src/errors/index.js'
import { ObjectStorageBehaviors, ObjectStorageClient } from '../../src/objectstorage/index.js'
import { createLogger } from '../../src/utils/logger.js'

const quiet = createLogger({ level: 'error' })

const apiConfig = {
  features: '',
  excludedFeatures: '',
  baseContainerName: 'qe_container',
  baseObjectName: 'qe_object',
  useSwiftInfo: true,
}

describe('ObjectStorageClient', () => {
  const tokens = new TokenStore()
  let emulator: ObjectStorageEmulator
  let client: ObjectStorageClient

  beforeAll(async () => {
    emulator = await startObjectStorageEmulator({ tokens })
  })

  afterAll(async () => {
    await emulator.close()
  })

  beforeEach(() => {
    emulator.reset()
    const token = tokens.issue('tenant-a')
    client = new ObjectStorageClient(emulator.accountUrl('tenant-a'), token.id, { logger: quiet })
  })

  describe('authorization', () => {
    it('should get 401 without a valid token', async () => {
      const anonymous = new ObjectStorageClient(emulator.accountUrl('tenant-a'), 'not-a-token', { logger: quiet })

      expect((await anonymous.listContainers()).statusCode).toBe(401)
    })

    it("should get 403 for another tenant's account", async () => {
      const token = tokens.issue('tenant-b')
      const intruder = new ObjectStorageClient(emulator.accountUrl('tenant-a'), token.id, { logger: quiet })

      expect((await intruder.listContainers()).statusCode).toBe(403)
    })
  })

  describe('containers', () => {
    it('should answer 201 on create and 202 when the container exists', async () => {
      expect((await client.createContainer('alpha')).statusCode).toBe(201)
      expect((await client.createContainer('alpha')).statusCode).toBe(202)
    })

    it('should list containers with usage in name order', async () => {
      await client.createContainer('beta')
      await client.createContainer('alpha')
      await client.createObject('beta', 'o', 'abc')

      const listing = await client.listContainers()

      expect(listing.entity).toEqual([
        { name: 'alpha', count: 0, bytes: 0 },
        { name: 'beta', count: 1, bytes: 3 },
      ])
    })

    it('should page listings with marker and limit', async () => {
      for (const name of ['c1', 'c2', 'c3']) {
        await client.createContainer(name)
      }

      const first = await client.listContainers({ limit: 2 })
      const second = await client.listContainers({ marker: 'c2' })

      expect(first.entity?.map((entry) => entry.name)).toEqual(['c1', 'c2'])
      expect(second.entity?.map((entry) => entry.name)).toEqual(['c3'])
    })

    it('should return 404 for a missing container', async () => {
      expect((await client.getContainerMetadata('absent')).statusCode).toBe(404)
      expect((await client.deleteContainer('absent')).statusCode).toBe(404)
    })
  })

  describe('objects', () => {
    it('should return an md5 etag on upload', async () => {
      await client.createContainer('alpha')

      const response = await client.createObject('alpha', 'hello.txt', 'hello')

      expect(response.statusCode).toBe(201)
      expect(response.headers.get('etag')).toBe('5d41402abc4b2a76b9719d911017c592')
    })

    it('should list objects as JSON entries', async () => {
      await client.createContainer('alpha')
      await client.createObject('alpha', 'dir/file', 'data', { 'Content-Type': 'text/plain' })

      const listing = await client.listObjects('alpha')

      expect(listing.entity).toHaveLength(1)
      expect(listing.entity?.[0]).toMatchObject({ name: 'dir/file', bytes: 4, content_type: 'text/plain' })
    })

    it('should delete objects and report 404 afterwards', async () => {
      await client.createContainer('alpha')
      await client.createObject('alpha', 'gone', 'x')

      expect((await client.deleteObject('alpha', 'gone')).statusCode).toBe(204)
      expect((await client.getObjectMetadata('alpha', 'gone')).statusCode).toBe(404)
    })
  })

  describe('forceDeleteContainers', () => {
    it('should empty and delete every container', async () => {
      await client.createContainer('full')
      await client.createContainer('empty')
      await client.createObject('full', 'a', '1')
      await client.createObject('full', 'b/c', '2')

      await client.forceDeleteContainers(['full', 'empty'])

      expect(emulator.containerNames('tenant-a')).toEqual([])
    })

    it('should ignore containers that do not exist', async () => {
      await expect(client.forceDeleteContainers(['never-created'])).resolves.toBeUndefined()
    })

    it('should finish when listings keep showing objects that are already deleted', async () => {
      const listingQueries: Record<string, string>[] = []
      const lagging = await startHttpServer((req, res, url) => {
        if (req.method === 'GET' && url.pathname === '/v1/AUTH_lag/stale') {
          listingQueries.push(Object.fromEntries(url.searchParams))
          const marker = url.searchParams.get('marker') ?? ''
          const ghosts = ['ghost-1', 'ghost-2']
            .filter((name) => name > marker)
            .map((name) => ({ name, bytes: 1, hash: 'x', content_type: 'text/plain', last_modified: '2024-01-01T00:00:00' }))
          sendJson(res, 200, ghosts)
          return
        }
        if (req.method === 'DELETE' && url.pathname.startsWith('/v1/AUTH_lag/stale/')) {
          sendText(res, 404, 'Not Found')
          return
        }
        res.writeHead(204).end()
      }, quiet)
      try {
        const laggingClient = new ObjectStorageClient(`${lagging.url}/v1/AUTH_lag`, 'test-token', { logger: quiet })

        await expect(laggingClient.forceDeleteContainers(['stale'])).resolves.toBeUndefined()

        expect(listingQueries).toEqual([
          { format: 'json', limit: '1000' },
          { format: 'json', limit: '1000', marker: 'ghost-2' },
        ])
      } finally {
        await lagging.close()
      }
    })

    it('should raise ObjectStorageError when listing is refused', async () => {
      const intruder = new ObjectStorageClient(emulator.accountUrl('tenant-a'), tokens.issue('tenant-b').id, {
        logger: quiet,
      })

      await expect(intruder.forceDeleteContainers(['full'])).rejects.toMatchObject({
        code: 'objectstorage/unexpected-status',
        message: 'Listing container full returned 403',
      })
      await expect(intruder.forceDeleteContainers(['full'])).rejects.toBeInstanceOf(ObjectStorageError)
    })
  })

  describe('transport', () => {
    it('should raise HttpError when the service is unreachable', async () => {
      const stopped = await startObjectStorageEmulator({ tokens })
      const url = stopped.accountUrl('tenant-a')
      await stopped.close()

      const unreachable = new ObjectStorageClient(url, 'test-token', { logger: quiet })

      await expect(unreachable.listContainers()).rejects.toMatchObject({ code: 'http/unavailable' })
      await expect(unreachable.listContainers()).rejects.toBeInstanceOf(HttpError)
    })
  })
})

describe('ObjectStorageBehaviors', () => {
  const tokens = new TokenStore()
  let emulator: ObjectStorageEmulator

  beforeAll(async () => {
    emulator = await startObjectStorageEmulator({
      tokens,
      capabilities: { swift: { version: 'test' }, tempurl: {}, slo: {} },
    })
  })

  afterAll(async () => {
    await emulator.close()
  })

  function behaviors(): ObjectStorageBehaviors {
    const client = new ObjectStorageClient(emulator.accountUrl('tenant-a'), tokens.issue('tenant-a').id, {
      logger: quiet,
    })
    return new ObjectStorageBehaviors(client, apiConfig)
  }

  it('should report capability keys as features', async () => {
    expect(await behaviors().getSwiftFeatures()).toBe('swift tempurl slo')
  })

  it('should generate unique container and object names', () => {
    const subject = behaviors()

    expect(subject.generateUniqueContainerName('bulk')).toMatch(/^qe_container_bulk_[0-9a-f]{12}$/)
    expect(subject.generateUniqueContainerName()).toMatch(/^qe_container_[0-9a-f]{12}$/)
    expect(subject.generateUniqueObjectName('seg')).toMatch(/^qe_object_seg_[0-9a-f]{12}$/)
    expect(subject.generateUniqueContainerName('x')).not.toBe(subject.generateUniqueContainerName('x'))
  })

  it('should raise ObjectStorageError when /info fails', async () => {
    const failing = await startObjectStorageEmulator({ tokens, infoStatus: 503 })
    try {
      const client = new ObjectStorageClient(failing.accountUrl('tenant-a'), 'test-token', { logger: quiet })
      await expect(new ObjectStorageBehaviors(client, apiConfig).getSwiftInfo()).rejects.toMatchObject({
        code: 'objectstorage/unexpected-status',
        message: 'GET /info returned 503',
      })
    } finally {
      await failing.close()
    }
  })
})
