/**
 * Record conversion
 */

export {
  RecordConverter,
  convert,
  compareSequenceNumbers,
  type RecordConverterConfig,
} from './record-converter'
export { PayloadBuffer, wrapPayload } from './payload-buffer'
export {
  fromSdkRecord,
  fromWireRecord,
  parseGetRecordsResponse,
  getRecordsResponseSchema,
  wireRecordSchema,
  type SdkRecord,
  type WireRecord,
  type GetRecordsResponse,
} from './kinesis'
export { sourceRecordToJson, type SourceRecordJson } from './json'
