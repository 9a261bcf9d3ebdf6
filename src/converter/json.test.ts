import { describe, it, expect } from 'vitest'
import { fixtures, rawRecord } from '../test-utils'
import { sourceRecordToJson } from './json'
import { RecordConverter } from './record-converter'

describe('sourceRecordToJson', () => {
  const { streamName, shardId, topic } = fixtures.shard
  const converter = new RecordConverter({ topic, shardId })

  it('renders payload bytes as base64 and schemas by name', () => {
    const json = sourceRecordToJson(converter.sourceRecord(streamName, shardId, rawRecord()))

    expect(json).toEqual({
      topic: 'orders-topic',
      kafkaPartition: null,
      keySchema: 'kinesis.source.KinesisKey',
      key: { partitionKey: 'pk1' },
      valueSchema: 'kinesis.source.KinesisValue',
      value: {
        sequenceNumber: 'seq-100',
        approximateArrivalTimestamp: 1700000000000,
        data: 'AQI=',
        partitionKey: 'pk1',
        shardId: 'shard-0',
        streamName: 'orders',
      },
      timestamp: 1700000000000,
      sourcePartition: { shardId: 'shard-0' },
      sourceOffset: { sequenceNumber: 'seq-100' },
    })
  })

  it('renders an empty payload as an empty string', () => {
    const json = sourceRecordToJson(converter.sourceRecord(streamName, shardId, rawRecord({ data: [] })))
    expect(json.value.data).toBe('')
  })
})
