export type { NotificationSink, SinkKind, LineWriter } from './types.js';
export { ConsoleSink } from './ConsoleSink.js';
export { JsonLinesSink } from './JsonLinesSink.js';
