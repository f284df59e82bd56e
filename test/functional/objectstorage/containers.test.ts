import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest'
import { ObjectStorageFixture } from '../../../src/fixtures/index.js'
import { startTarget, type FunctionalTarget } from '../../support/harness.js'

describe('objectstorage: containers', () => {
  let target: FunctionalTarget
  let fixture: ObjectStorageFixture

  beforeAll(async () => {
    target = await startTarget()
    fixture = new ObjectStorageFixture(target.config)
    await fixture.setup()
  })

  afterEach(async () => {
    await fixture.cleanup()
  })

  afterAll(async () => {
    await target?.stop()
  })

  it('should create a container with a generated name', async () => {
    const name = await fixture.createTempContainer('listing')

    expect(name.startsWith(`${fixture.config.objectStorageApi.baseContainerName}_listing_`)).toBe(true)

    const listing = await fixture.client.listContainers({ prefix: name })
    expect(listing.statusCode).toBe(200)
    expect(listing.entity?.map((entry) => entry.name)).toEqual([name])
  })

  it('should store and read back an object', async () => {
    const container = await fixture.createTempContainer('objects')
    const objectName = fixture.behaviors.generateUniqueObjectName()

    const created = await fixture.client.createObject(container, objectName, 'object body', {
      'Content-Type': 'text/plain',
      'X-Object-Meta-Owner': 'probe',
    })
    expect(created.statusCode).toBe(201)

    const fetched = await fixture.client.getObject(container, objectName)
    expect(fetched.statusCode).toBe(200)
    expect(fetched.text).toBe('object body')
    expect(fetched.headers.get('x-object-meta-owner')).toBe('probe')
  })

  it('should report object count and bytes used', async () => {
    const container = await fixture.createTempContainer('usage')
    await fixture.client.createObject(container, 'a', '12345')
    await fixture.client.createObject(container, 'b', '678')

    const response = await fixture.client.getContainerMetadata(container)

    expect(response.statusCode).toBe(204)
    expect(response.headers.get('x-container-object-count')).toBe('2')
    expect(response.headers.get('x-container-bytes-used')).toBe('8')
  })

  it('should refuse to delete a container that still holds objects', async () => {
    const container = await fixture.createTempContainer('conflict')
    await fixture.client.createObject(container, 'pinned', 'x')

    const response = await fixture.client.deleteContainer(container)

    expect(response.statusCode).toBe(409)
  })

  it('should force delete a container and its objects', async () => {
    const container = await fixture.createTempContainer('force')
    await fixture.client.createObject(container, 'nested/path/object', 'x')
    await fixture.client.createObject(container, 'flat', 'y')

    await fixture.client.forceDeleteContainers([container])

    const response = await fixture.client.getContainerMetadata(container)
    expect(response.statusCode).toBe(404)
  })

  it('should keep quota metadata on the container', async (ctx) => {
    await fixture.requireFeatures(ctx, 'container_quotas')

    const container = await fixture.createTempContainer('quota', { 'X-Container-Meta-Quota-Bytes': '10' })

    const response = await fixture.client.getContainerMetadata(container)
    expect(response.headers.get('x-container-meta-quota-bytes')).toBe('10')
  })

  it('should update and remove container metadata', async (ctx) => {
    await fixture.requireFeatures(ctx, 'swift')

    const container = await fixture.createTempContainer('meta')
    const updated = await fixture.client.setContainerMetadata(container, { 'X-Container-Meta-Stage': 'one' })
    expect(updated.statusCode).toBe(204)
    expect((await fixture.client.getContainerMetadata(container)).headers.get('x-container-meta-stage')).toBe('one')

    await fixture.client.setContainerMetadata(container, { 'X-Remove-Container-Meta-Stage': 'x' })
    expect((await fixture.client.getContainerMetadata(container)).headers.get('x-container-meta-stage')).toBeNull()
  })
})
