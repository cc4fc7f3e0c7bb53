/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions for creating test data across all hub tests.
 */

import {
  type Condition,
  type VolumeReplicationGroupObject,
  type WorkBundle,
  type WorkLocation,
  type WorkOwner,
  toManifest,
} from '@workbridge/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'
import type { Logger } from '../lib/logger'

// =============================================================================
// Identifiers
// =============================================================================

export function createOwner(overrides?: Partial<WorkOwner>): WorkOwner {
  return {
    name: `app-${faker.string.alphanumeric({ length: 6, casing: 'lower' })}`,
    namespace: `ns-${faker.string.alphanumeric({ length: 6, casing: 'lower' })}`,
    ...overrides,
  }
}

export function createLocation(): WorkLocation {
  return `cluster-${faker.string.alphanumeric({ length: 6, casing: 'lower' })}`
}

// =============================================================================
// Objects and bundles
// =============================================================================

export function createVrg(overrides?: Partial<VolumeReplicationGroupObject>): VolumeReplicationGroupObject {
  return {
    apiVersion: 'ramendr.openshift.io/v1alpha1',
    kind: 'VolumeReplicationGroup',
    metadata: {
      name: faker.word.noun().toLowerCase(),
      namespace: `ns-${faker.string.alphanumeric({ length: 6, casing: 'lower' })}`,
    },
    spec: {
      pvcSelector: { matchLabels: { app: faker.word.noun().toLowerCase() } },
      replicationState: 'primary',
      s3Profiles: [faker.internet.domainWord()],
    },
    ...overrides,
  }
}

export function createWorkBundle(overrides?: Partial<WorkBundle>): WorkBundle {
  return {
    name: `${faker.word.noun().toLowerCase()}-mw`,
    location: createLocation(),
    labels: {},
    annotations: {},
    manifests: [toManifest(createVrg())],
    ...overrides,
  }
}

export function createConditions(statuses: Record<string, Condition['status']>): Condition[] {
  return Object.entries(statuses).map(([type, status]) => ({ type, status }))
}

// =============================================================================
// Logging
// =============================================================================

export function createTestLogger(): Logger {
  return pino({ level: 'silent' })
}
