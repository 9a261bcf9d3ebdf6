import type { CheckpointTuple, SourceRecord } from '../types/records'

/**
 * JSON-safe view of a source record
 */
export interface SourceRecordJson {
  topic: string
  kafkaPartition: null
  keySchema: string
  key: { partitionKey: string | null }
  valueSchema: string
  value: {
    sequenceNumber: string | null
    approximateArrivalTimestamp: number | null
    /** Base64 encoded payload */
    data: string | null
    partitionKey: string | null
    shardId: string | null
    streamName: string | null
  }
  timestamp: number
  sourcePartition: CheckpointTuple['sourcePartition']
  sourceOffset: CheckpointTuple['sourceOffset']
}

export function sourceRecordToJson(record: SourceRecord): SourceRecordJson {
  const { value } = record
  return {
    topic: record.topic,
    kafkaPartition: record.kafkaPartition,
    keySchema: record.keySchema.name,
    key: { partitionKey: record.key.partitionKey },
    valueSchema: record.valueSchema.name,
    value: {
      sequenceNumber: value.sequenceNumber,
      approximateArrivalTimestamp: value.approximateArrivalTimestamp,
      data: value.data === null ? null : Buffer.from(value.data).toString('base64'),
      partitionKey: value.partitionKey,
      shardId: value.shardId,
      streamName: value.streamName,
    },
    timestamp: record.timestamp,
    sourcePartition: record.sourcePartition,
    sourceOffset: record.sourceOffset,
  }
}
