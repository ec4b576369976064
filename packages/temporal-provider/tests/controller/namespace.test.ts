import { status as GrpcStatus } from '@grpc/grpc-js'
import { beforeEach, describe, expect, it } from 'vitest'

import { createTemporalService } from '../../src/client'
import { EXTERNAL_NAME_ANNOTATION } from '../../src/controller/external-name'
import { ManagedExternal } from '../../src/controller/managed'
import { namespaceHandler, namespaceReadiness } from '../../src/controller/namespace'
import { ReconcileError } from '../../src/errors'
import type { TemporalNamespace, TemporalNamespaceObservation } from '../../src/types'
import { FakeTemporal, createGrpcError } from '../helpers/fake-temporal'
import { captureLogger } from '../helpers/logging'

const NOW = '2026-05-01T12:00:00.000Z'
const nowIso = () => NOW

const ordersResource = (): TemporalNamespace => ({
  metadata: { name: 'orders-ns' },
  spec: {
    forProvider: {
      name: 'orders',
      description: 'Order processing',
      workflowExecutionRetentionDays: 7,
    },
  },
})

describe('namespace reconciler', () => {
  let fake: FakeTemporal
  let external: ManagedExternal<TemporalNamespace, TemporalNamespaceObservation>

  beforeEach(() => {
    fake = new FakeTemporal()
    external = new ManagedExternal(
      createTemporalService({ connection: fake, id: 'svc-1' }),
      namespaceHandler,
      captureLogger().logger,
    )
  })

  it('observes a missing namespace without touching status', async () => {
    const resource = ordersResource()

    await expect(external.observe(resource, { nowIso })).resolves.toEqual({
      resourceExists: false,
      resourceUpToDate: false,
      diff: '',
    })
    expect(resource.status).toBeUndefined()
  })

  it('creates the namespace and records its external name', async () => {
    const resource = ordersResource()

    await external.create(resource, { nowIso })

    expect(resource.metadata.annotations).toEqual({ [EXTERNAL_NAME_ANNOTATION]: 'orders' })
    expect(resource.status?.conditions).toEqual([
      { type: 'Ready', status: 'False', reason: 'Creating', message: '', lastTransitionTime: NOW },
    ])
    expect(fake.namespace('orders')?.description).toBe('Order processing')
  })

  it('reports an existing namespace as available and up to date', async () => {
    const resource = ordersResource()
    await external.create(resource, { nowIso: () => '2026-05-01T11:00:00.000Z' })

    const observation = await external.observe(resource, { nowIso })

    expect(observation).toEqual({ resourceExists: true, resourceUpToDate: true, diff: '' })
    expect(resource.status?.atProvider).toMatchObject({ id: 'ns-2', name: 'orders', state: 'Registered' })
    expect(resource.status?.conditions).toEqual([
      { type: 'Ready', status: 'True', reason: 'Available', message: '', lastTransitionTime: NOW },
    ])
  })

  it('detects drift and converges on update', async () => {
    const resource = ordersResource()
    await external.create(resource, { nowIso })
    const stored = fake.namespace('orders')
    if (stored) {
      stored.description = 'edited by hand'
    }

    await expect(external.observe(resource, { nowIso })).resolves.toEqual({
      resourceExists: true,
      resourceUpToDate: false,
      diff: 'description: "Order processing" → "edited by hand"',
    })

    await external.update(resource, { nowIso })

    await expect(external.observe(resource, { nowIso })).resolves.toMatchObject({ resourceUpToDate: true })
    expect(fake.callsTo('updateNamespace')).toHaveLength(1)
  })

  it('deletes permissively and marks the resource as deleting', async () => {
    const resource = ordersResource()
    await external.create(resource, { nowIso })

    await external.delete(resource, { nowIso })
    await external.delete(resource, { nowIso })

    expect(fake.namespace('orders')).toBeUndefined()
    expect(resource.status?.conditions).toEqual([
      { type: 'Ready', status: 'False', reason: 'Deleting', message: '', lastTransitionTime: NOW },
    ])
  })

  it('wraps remote failures with the failing hook', async () => {
    fake.failNext('describeNamespace', createGrpcError(GrpcStatus.UNAVAILABLE, 'connection refused'))

    const error = await external.observe(ordersResource()).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ReconcileError)
    expect(error).toMatchObject({
      hook: 'describe',
      resourceName: 'orders-ns',
      retryable: true,
      message:
        'failed to describe TemporalNamespace resource: temporal rpc describeNamespace failed: 14 UNAVAILABLE: connection refused',
    })
  })
})

describe('namespaceReadiness', () => {
  it.each([
    { state: 'Registered', status: 'True', reason: 'Available' },
    { state: 'Unspecified', status: 'False', reason: 'Unavailable' },
    { state: 'Deprecated', status: 'False', reason: 'Unavailable' },
    { state: 'Deleted', status: 'False', reason: 'Deleting' },
  ] as const)('maps $state to $reason', ({ state, status, reason }) => {
    expect(namespaceReadiness(state)).toEqual({ type: 'Ready', status, reason })
  })
})
