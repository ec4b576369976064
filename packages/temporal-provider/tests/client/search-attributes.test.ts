import { status as GrpcStatus } from '@grpc/grpc-js'
import { beforeEach, describe, expect, it } from 'vitest'

import { type TemporalService, createTemporalService } from '../../src/client'
import { PreconditionError, TemporalRpcError } from '../../src/errors'
import { FakeTemporal, createGrpcError } from '../helpers/fake-temporal'

describe('search attribute operations', () => {
  let fake: FakeTemporal
  let service: TemporalService

  beforeEach(() => {
    fake = new FakeTemporal()
    fake.seedNamespace({ name: 'orders' })
    service = createTemporalService({ connection: fake })
  })

  it('creates an attribute that describes back with name, type and namespace', async () => {
    await service.createSearchAttribute({ name: 'CustomerId', type: 'Keyword', temporalNamespaceName: 'orders' })

    await expect(service.describeSearchAttributeByName('orders', 'CustomerId')).resolves.toEqual({
      name: 'CustomerId',
      type: 'Keyword',
      temporalNamespaceName: 'orders',
    })
    expect(fake.callsTo('addSearchAttributes')[0]?.request).toEqual({
      namespace: 'orders',
      searchAttributes: { CustomerId: 2 },
    })
  })

  it('lists custom attributes sorted by name', async () => {
    await service.createSearchAttribute({ name: 'Zone', type: 'Text', temporalNamespaceName: 'orders' })
    await service.createSearchAttribute({ name: 'Amount', type: 'Double', temporalNamespaceName: 'orders' })
    await service.createSearchAttribute({ name: 'Tags', type: 'KeywordList', temporalNamespaceName: 'orders' })

    await expect(service.listSearchAttributesByNamespace('orders')).resolves.toEqual([
      { name: 'Amount', type: 'Double', temporalNamespaceName: 'orders' },
      { name: 'Tags', type: 'KeywordList', temporalNamespaceName: 'orders' },
      { name: 'Zone', type: 'Text', temporalNamespaceName: 'orders' },
    ])
  })

  it('treats creating an existing attribute as success', async () => {
    await service.createSearchAttribute({ name: 'CustomerId', type: 'Keyword', temporalNamespaceName: 'orders' })
    await service.createSearchAttribute({ name: 'CustomerId', type: 'Keyword', temporalNamespaceName: 'orders' })

    await expect(service.listSearchAttributesByNamespace('orders')).resolves.toHaveLength(1)
  })

  it('returns undefined for an attribute that does not exist', async () => {
    await expect(service.describeSearchAttributeByName('orders', 'Missing')).resolves.toBeUndefined()
  })

  it('deletes an attribute and ignores a repeated delete', async () => {
    await service.createSearchAttribute({ name: 'CustomerId', type: 'Keyword', temporalNamespaceName: 'orders' })

    await service.deleteSearchAttributeByName('orders', 'CustomerId')
    await service.deleteSearchAttributeByName('orders', 'CustomerId')

    await expect(service.describeSearchAttributeByName('orders', 'CustomerId')).resolves.toBeUndefined()
    expect(fake.callsTo('removeSearchAttributes')[0]?.request).toEqual({
      namespace: 'orders',
      searchAttributes: ['CustomerId'],
    })
  })

  it('requires an owning namespace', async () => {
    await expect(
      service.createSearchAttribute({ name: 'CustomerId', type: 'Keyword', temporalNamespaceName: '' }),
    ).rejects.toThrow(PreconditionError)
    expect(fake.calls).toEqual([])
  })

  it('surfaces failures for an unknown namespace', async () => {
    const error = await service.listSearchAttributesByNamespace('ghost').catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(TemporalRpcError)
    expect(error).toMatchObject({ operation: 'listSearchAttributes', kind: 'not-found' })
  })

  it('surfaces unexpected add failures', async () => {
    fake.failNext('addSearchAttributes', createGrpcError(GrpcStatus.INVALID_ARGUMENT, 'too many attributes'))

    await expect(
      service.createSearchAttribute({ name: 'CustomerId', type: 'Keyword', temporalNamespaceName: 'orders' }),
    ).rejects.toMatchObject({ operation: 'addSearchAttributes', kind: 'unexpected', retryable: false })
  })
})
