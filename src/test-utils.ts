/**
 * Test utilities for kinesis-source
 */

import { wrapPayload } from './converter/payload-buffer'
import type { RawStreamRecord } from './types/records'

/**
 * Creates a raw record with a fresh payload
 */
export function rawRecord(overrides: Partial<Omit<RawStreamRecord, 'data'>> & { data?: number[] } = {}): RawStreamRecord {
  const { data = [0x01, 0x02], ...rest } = overrides
  return {
    partitionKey: fixtures.record.partitionKey,
    sequenceNumber: fixtures.record.sequenceNumber,
    approximateArrivalTimestamp: fixtures.record.arrivalTimestamp,
    ...rest,
    data: wrapPayload(Uint8Array.from(data)),
  }
}

/**
 * Creates a test request init with JSON body
 */
export function jsonRequest(method: string = 'POST', body?: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  }
}

/**
 * Test fixtures for common entities
 */
export const fixtures = {
  record: {
    partitionKey: 'pk1',
    sequenceNumber: 'seq-100',
    arrivalTimestamp: 1700000000000,
  },

  shard: {
    streamName: 'orders',
    shardId: 'shard-0',
    topic: 'orders-topic',
  },
}
