export type { Logger } from './application/interfaces/Logger';
export type { MessageDecoder } from './application/interfaces/MessageDecoder';
export type { MetricsCollector } from './application/interfaces/MetricsCollector';
export { type StreamItem, StreamingMessageDecoder } from './application/handlers/StreamingMessageDecoder';
export {
  type DecodeErrorPolicy,
  type DecodeFeedOptions,
  DecodeFeedUsecase,
  type FeedSummary,
} from './application/usecases/DecodeFeedUsecase';
export { FeedDecodeError } from './domain/errors/FeedDecodeError';
export {
  type DecodeFailure,
  type DecodeFailureKind,
  type DecodeResult,
  describeFailure,
  type IncompleteFailure,
  type MalformedFailure,
  type UnrecognizedTagFailure,
} from './domain/models/DecodeResult';
export { type SymbolFactory, stringSymbol } from './domain/models/SymbolFactory';
export { type Timestamp, timestampFromNanos, timestampToDate, timestampToIsoString } from './domain/models/Timestamp';
export type {
  MarketSession,
  OpaqueMessage,
  OpaqueMessageKind,
  QuoteUpdate,
  SaleCondition,
  SystemEvent,
  SystemEventKind,
  TopsMessage,
  TopsMessageType,
  TradeReport,
} from './domain/models/TopsMessage';
export type { StreamPublisher } from './domain/repositories/StreamPublisher';
export { MESSAGE_LAYOUTS, type MessageLayout } from './infra/decoder/MessageLayout';
export { decodeMessage, TopsMessageDecoder } from './infra/decoder/TopsMessageDecoder';
export { type SymbolId, SymbolInterner } from './infra/symbol/SymbolInterner';
