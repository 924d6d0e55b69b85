export * from './types';
export * from './errors';
export * from './signature';
export * from './classifier';
export * from './retry';
export * from './batcher';
export * from './config';
export * from './logger';
export { Dispatcher, type PostOptions, type SignedRequest } from './Dispatcher';
export * from './cache';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
