export * from './bindings';
export * from './notifications';
export * from './runs';
export * from './session';
export * from './tools';
export { formatReply, type ReplyFormat } from './reply-format';
export type { LoggerLike } from './logger';
