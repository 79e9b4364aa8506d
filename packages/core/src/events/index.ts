/**
 * Event codec, builders and parsers.
 */

export { serializeEvent, getEventHash, validateEventTemplate } from './codec.js';
export {
  createEvent,
  nowInSeconds,
  buildEncryptedDirectMessage,
  type EventConfig,
} from './builders.js';
export { parseEvent, isSignedEvent, SignedEventSchema, RumorSchema } from './parsers.js';
