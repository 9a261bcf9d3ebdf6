/**
 * Key and value schemas for converted stream records
 *
 * Field names are part of the wire contract read by downstream consumers.
 * Every field is optional so the schemas can evolve; the converter still
 * guarantees a sequence number and shard id on every record it emits.
 */

import {
  bytesSchema,
  stringSchema,
  structSchema,
  timestampSchema,
  type StructSchema,
} from './builder'

export const FIELD_SEQUENCE_NUMBER = 'sequenceNumber'
export const FIELD_APPROXIMATE_ARRIVAL_TIMESTAMP = 'approximateArrivalTimestamp'
export const FIELD_DATA = 'data'
export const FIELD_PARTITION_KEY = 'partitionKey'
export const FIELD_SHARD_ID = 'shardId'
export const FIELD_STREAM_NAME = 'streamName'

export const KEY_SCHEMA_NAME = 'kinesis.source.KinesisKey'
export const VALUE_SCHEMA_NAME = 'kinesis.source.KinesisValue'

const PARTITION_KEY_DOC =
  'A partition key is used to group data by shard within a stream. The stream service segregates ' +
  'the data records belonging to a stream into multiple shards, using the partition key associated ' +
  'with each data record to determine which shard a given data record belongs to. Partition keys are ' +
  'Unicode strings with a maximum length of 256 bytes, supplied by the application putting the data ' +
  'into the stream. An MD5 hash maps each partition key to a 128-bit integer, which selects the shard.'

const SHARD_ID_DOC =
  'A shard is a uniquely identified group of data records in a stream. A stream is composed of one ' +
  'or more shards, each of which provides a fixed unit of capacity: up to 5 read transactions per ' +
  'second at up to 2 MB per second, and up to 1,000 records per second at up to 1 MB per second for ' +
  'writes, partition keys included. The total capacity of a stream is the sum of the capacities of ' +
  'its shards.'

export const KEY_SCHEMA: StructSchema = structSchema({
  name: KEY_SCHEMA_NAME,
  version: 1,
  doc: 'A partition key is used to group data by shard within a stream.',
  fields: [
    { name: FIELD_PARTITION_KEY, schema: stringSchema({ doc: PARTITION_KEY_DOC, optional: true }) },
  ],
})

export const VALUE_SCHEMA: StructSchema = structSchema({
  name: VALUE_SCHEMA_NAME,
  version: 1,
  doc:
    'The unit of data of a stream, composed of a sequence number, a partition key and a data blob, ' +
    'together with the shard and stream it was read from.',
  fields: [
    {
      name: FIELD_SEQUENCE_NUMBER,
      schema: stringSchema({
        doc: 'The unique identifier of the record within its shard. Sequence numbers increase over time.',
        optional: true,
      }),
    },
    {
      name: FIELD_APPROXIMATE_ARRIVAL_TIMESTAMP,
      schema: timestampSchema({
        doc: 'The approximate time that the record was inserted into the stream, in epoch milliseconds.',
        optional: true,
      }),
    },
    {
      name: FIELD_DATA,
      schema: bytesSchema({
        doc: 'The data blob, copied verbatim from the stream record.',
        optional: true,
      }),
    },
    { name: FIELD_PARTITION_KEY, schema: stringSchema({ doc: PARTITION_KEY_DOC, optional: true }) },
    { name: FIELD_SHARD_ID, schema: stringSchema({ doc: SHARD_ID_DOC, optional: true }) },
    {
      name: FIELD_STREAM_NAME,
      schema: stringSchema({ doc: 'The name of the source stream.', optional: true }),
    },
  ],
})
