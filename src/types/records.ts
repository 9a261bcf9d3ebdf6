/**
 * Core record types for stream-to-topic conversion
 */

import type { StructSchema } from '../schema/builder'
import type { PartitionKeyStruct, StreamEventStruct } from '../schema/struct'

/**
 * Single-read byte payload.
 *
 * Reading drains the payload: after `get` fills a target of `remaining`
 * bytes, `remaining` is zero.
 */
export interface StreamPayload {
  /** Number of bytes not yet read */
  readonly remaining: number
  /** Copy the next `target.length` bytes into target and advance */
  get(target: Uint8Array): void
}

/**
 * A record read from a stream shard
 */
export interface RawStreamRecord {
  /** Record payload */
  data: StreamPayload
  /** Application-supplied grouping key (may be absent) */
  partitionKey?: string | null
  /** Per-shard, strictly increasing identifier assigned by the stream service */
  sequenceNumber?: string | null
  /** Time the stream service accepted the record, as a Date or epoch milliseconds */
  approximateArrivalTimestamp?: Date | number | null
}

/**
 * Identifies the shard a converted record came from
 */
export interface SourcePartition {
  shardId: string
}

/**
 * Position to resume after
 */
export interface SourceOffset {
  sequenceNumber: string
}

/**
 * Bookkeeping persisted by the checkpoint store so consumption resumes
 * strictly after `sourceOffset.sequenceNumber`
 */
export interface CheckpointTuple {
  sourcePartition: Readonly<SourcePartition>
  sourceOffset: Readonly<SourceOffset>
}

/**
 * A structured record ready for delivery to a topic
 */
export interface SourceRecord extends CheckpointTuple {
  /** Destination topic */
  topic: string
  /** Always null: the messaging system picks the partition from the key */
  kafkaPartition: null
  keySchema: StructSchema
  key: PartitionKeyStruct
  valueSchema: StructSchema
  value: StreamEventStruct
  /** Record timestamp in epoch milliseconds */
  timestamp: number
}

/**
 * Outcome of converting one batch from a single shard
 */
export interface ConvertedBatch {
  records: SourceRecord[]
  /** Checkpoint of the last record, null for an empty batch */
  checkpoint: CheckpointTuple | null
}
