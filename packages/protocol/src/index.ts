export * from './errors';
export * from './types/protocol';
export * from './codec/GenericValue';
export * from './codec/ValueCodec';
export * from './envelope/Envelope';
export * from './envelope/messages';
export * from './stream/StreamAssembler';
