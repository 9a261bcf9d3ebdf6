/**
 * Record Converter
 *
 * Turns raw stream records into structured source records plus the
 * checkpoint tuple that lets a polling loop resume after a crash or
 * rebalance. Conversion is pure: no I/O, no shared mutable state.
 */

import { ConfigurationError, ConversionError, SequenceOrderError } from '../errors'
import { createModuleLogger } from '../logger'
import { KEY_SCHEMA, VALUE_SCHEMA } from '../schema/schema'
import {
  createStruct,
  type PartitionKeyStruct,
  type StreamEventStruct,
} from '../schema/struct'
import type {
  CheckpointTuple,
  ConvertedBatch,
  RawStreamRecord,
  SourceRecord,
  StreamPayload,
} from '../types/records'

const log = createModuleLogger('record-converter')

/**
 * Configuration for a converter bound to one shard
 */
export interface RecordConverterConfig {
  /** Destination topic for every converted record */
  topic: string
  /** Stable identifier of the shard in the checkpoint namespace */
  shardId: string
}

function requireSetting(name: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${name} must be a non-empty string`)
  }
  return value
}

function arrivalMillis(record: RawStreamRecord): number {
  const timestamp = record.approximateArrivalTimestamp
  if (timestamp === undefined || timestamp === null) {
    throw new ConversionError(`Record ${record.sequenceNumber} has no arrival timestamp`)
  }
  const millis = timestamp instanceof Date ? timestamp.getTime() : timestamp
  if (!Number.isSafeInteger(millis)) {
    throw new ConversionError(
      `Record ${record.sequenceNumber} has an invalid arrival timestamp`
    )
  }
  return millis
}

/**
 * Copy the unread bytes of a payload into a buffer of exactly that size
 */
function materialize(payload: StreamPayload, sequenceNumber: string): Uint8Array {
  try {
    const remaining = payload.remaining
    if (!Number.isInteger(remaining) || remaining < 0) {
      throw new RangeError(`remaining byte count is ${remaining}`)
    }
    const data = new Uint8Array(remaining)
    payload.get(data)
    return data
  } catch (error) {
    throw new ConversionError(`Unable to read payload of record ${sequenceNumber}`, {
      cause: error,
    })
  }
}

/**
 * Compare two sequence numbers made of decimal digits.
 * Returns null when either is not purely numeric.
 */
export function compareSequenceNumbers(a: string, b: string): number | null {
  if (!/^\d+$/.test(a) || !/^\d+$/.test(b)) {
    return null
  }
  const left = BigInt(a)
  const right = BigInt(b)
  return left === right ? 0 : left < right ? -1 : 1
}

/**
 * RecordConverter - Converts records read from one shard
 */
export class RecordConverter {
  private readonly topic: string
  private readonly shardId: string

  constructor(config: RecordConverterConfig) {
    this.topic = requireSetting('topic', config.topic)
    this.shardId = requireSetting('shardId', config.shardId)
  }

  /**
   * Convert a single record.
   *
   * Reads (and so drains) the record's payload; the record must not be
   * reused afterwards. Throws ConversionError rather than emitting a
   * partially populated record.
   */
  sourceRecord(streamName: string, shardId: string, record: RawStreamRecord): SourceRecord {
    const sequenceNumber = record.sequenceNumber
    if (typeof sequenceNumber !== 'string' || sequenceNumber === '') {
      throw new ConversionError(`Record from shard ${shardId} of ${streamName} has no sequence number`)
    }
    const timestamp = arrivalMillis(record)
    const data = materialize(record.data, sequenceNumber)
    const partitionKey = record.partitionKey ?? null

    let key: PartitionKeyStruct
    let value: StreamEventStruct
    try {
      key = createStruct<PartitionKeyStruct>(KEY_SCHEMA, { partitionKey })
      value = createStruct<StreamEventStruct>(VALUE_SCHEMA, {
        sequenceNumber,
        approximateArrivalTimestamp: timestamp,
        data,
        partitionKey,
        shardId,
        streamName,
      })
    } catch (error) {
      throw new ConversionError(`Record ${sequenceNumber} does not fit the record schemas`, {
        cause: error,
      })
    }

    const checkpoint = this.checkpoint(sequenceNumber)

    return Object.freeze({
      sourcePartition: checkpoint.sourcePartition,
      sourceOffset: checkpoint.sourceOffset,
      topic: this.topic,
      kafkaPartition: null,
      keySchema: KEY_SCHEMA,
      key,
      valueSchema: VALUE_SCHEMA,
      value,
      timestamp,
    })
  }

  /**
   * Convert a batch of records read from one shard, in order.
   *
   * Either every record converts or the whole batch fails. Numeric sequence
   * numbers must strictly increase within the batch.
   */
  convertBatch(streamName: string, shardId: string, records: RawStreamRecord[]): ConvertedBatch {
    const converted: SourceRecord[] = []
    let previous: string | null = null

    for (const [index, record] of records.entries()) {
      const current = record.sequenceNumber
      if (previous !== null && typeof current === 'string') {
        const order = compareSequenceNumbers(previous, current)
        if (order !== null && order >= 0) {
          throw new SequenceOrderError(
            `Sequence number ${current} at index ${index} does not follow ${previous} in shard ${shardId}`
          )
        }
      }

      try {
        converted.push(this.sourceRecord(streamName, shardId, record))
      } catch (error) {
        if (!(error instanceof ConversionError)) {
          throw error
        }
        throw new ConversionError(
          `Failed to convert record ${current ?? '<none>'} at index ${index} of shard ${shardId}`,
          { cause: error }
        )
      }
      previous = current ?? null
    }

    const last = converted.at(-1)
    log.debug(
      { streamName, shardId, count: converted.length, sequenceNumber: last?.sourceOffset.sequenceNumber },
      'Converted batch'
    )

    return {
      records: converted,
      checkpoint: last
        ? { sourcePartition: last.sourcePartition, sourceOffset: last.sourceOffset }
        : null,
    }
  }

  private checkpoint(sequenceNumber: string): CheckpointTuple {
    return {
      sourcePartition: Object.freeze({ shardId: this.shardId }),
      sourceOffset: Object.freeze({ sequenceNumber }),
    }
  }
}

/**
 * Convert one raw record into a source record for `destinationTopic`,
 * checkpointed under `checkpointPartitionId`
 */
export function convert(
  streamName: string,
  partitionId: string,
  raw: RawStreamRecord,
  destinationTopic: string,
  checkpointPartitionId: string
): SourceRecord {
  return new RecordConverter({ topic: destinationTopic, shardId: checkpointPartitionId }).sourceRecord(
    streamName,
    partitionId,
    raw
  )
}
