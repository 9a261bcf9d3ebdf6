/**
 * Kinesis record adapters
 *
 * Maps the record shapes produced by Kinesis clients onto RawStreamRecord so
 * the converter never depends on a particular client library.
 */

import { z } from 'zod'
import { InvalidRequestError } from '../errors'
import type { RawStreamRecord } from '../types/records'
import { wrapPayload } from './payload-buffer'

/**
 * Structural shape of a record returned by the AWS SDK v3 Kinesis client
 */
export interface SdkRecord {
  Data?: Uint8Array
  PartitionKey?: string
  SequenceNumber?: string
  ApproximateArrivalTimestamp?: Date
  /** Accepted so SDK records fit this shape; not carried into the converted record */
  EncryptionType?: string
}

/**
 * Adapt an SDK record. Missing data becomes an empty payload; a missing
 * sequence number or timestamp is left for the converter to reject.
 */
export function fromSdkRecord(record: SdkRecord): RawStreamRecord {
  return {
    data: wrapPayload(record.Data ?? new Uint8Array(0)),
    partitionKey: record.PartitionKey ?? null,
    sequenceNumber: record.SequenceNumber ?? null,
    approximateArrivalTimestamp: record.ApproximateArrivalTimestamp ?? null,
  }
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

/**
 * A record in the JSON body of a GetRecords response
 */
export const wireRecordSchema = z.object({
  Data: z.string().regex(BASE64, 'Data must be base64 encoded'),
  PartitionKey: z.string().optional(),
  SequenceNumber: z.string().min(1),
  /** Epoch seconds, possibly fractional */
  ApproximateArrivalTimestamp: z.number().nonnegative(),
  /** Accepted for wire compatibility; not carried into the converted record */
  EncryptionType: z.enum(['NONE', 'KMS']).optional(),
})

export const getRecordsResponseSchema = z.object({
  Records: z.array(wireRecordSchema),
  NextShardIterator: z.string().nullish(),
  MillisBehindLatest: z.number().int().nonnegative().optional(),
})

export type WireRecord = z.infer<typeof wireRecordSchema>
export type GetRecordsResponse = z.infer<typeof getRecordsResponseSchema>

export function fromWireRecord(record: WireRecord): RawStreamRecord {
  return {
    data: wrapPayload(Buffer.from(record.Data, 'base64')),
    partitionKey: record.PartitionKey ?? null,
    sequenceNumber: record.SequenceNumber,
    approximateArrivalTimestamp: Math.round(record.ApproximateArrivalTimestamp * 1000),
  }
}

/**
 * Validate a GetRecords JSON body and adapt its records
 */
export function parseGetRecordsResponse(body: unknown): RawStreamRecord[] {
  const parsed = getRecordsResponseSchema.safeParse(body)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<body>'}: ${issue.message}`)
      .join('; ')
    throw new InvalidRequestError(`Invalid GetRecords body: ${issues}`, { cause: parsed.error })
  }
  return parsed.data.Records.map(fromWireRecord)
}
