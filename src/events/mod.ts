export { EventEmitter, events } from './emitter.ts';
export type { ListenerErrorHandler } from './emitter.ts';
export { ConsoleListener } from './listeners/console.ts';
export { LogListener } from './listeners/log.ts';
export type { EventListener, ReaderEvent } from './types.ts';
