/**
 * @nostrand/core
 *
 * Nostr event model: canonical hashing, Schnorr signing and verification,
 * shared-secret derivation and versioned payload encryption.
 */

export const VERSION = '0.1.0';

// Event kind constants
export {
  TEXT_NOTE_KIND,
  ENCRYPTED_DIRECT_MESSAGE_KIND,
  SEAL_KIND,
  PRIVATE_DIRECT_MESSAGE_KIND,
  GIFT_WRAP_KIND,
  NOSTR_CONNECT_KIND,
} from './constants.js';

// TypeScript interfaces
export type {
  Tag,
  EventTemplate,
  UnsignedEvent,
  IdentifiedEvent,
  SignedEvent,
  CipherVersion,
} from './types.js';

// Error classes
export {
  NostrandError,
  KeyError,
  InvalidEventError,
  CipherError,
  DecryptionFailedError,
  RemoteSignerError,
} from './errors.js';

// Event codec, builders and parsers
export {
  serializeEvent,
  getEventHash,
  validateEventTemplate,
  createEvent,
  nowInSeconds,
  buildEncryptedDirectMessage,
  parseEvent,
  isSignedEvent,
  SignedEventSchema,
  type EventConfig,
} from './events/index.js';

// Keys
export { KeyManager, verifySignature, verifyEvent, normalizePublicKey } from './keys/index.js';

// Payload encryption
export {
  encrypt,
  decrypt,
  encryptText,
  decryptText,
  detectVersion,
  calcPaddedLength,
} from './crypto/index.js';

// Gift wrap
export {
  createRumor,
  createSeal,
  createGiftWrap,
  createPrivateDirectMessage,
  unwrapGiftWrap,
} from './giftwrap/index.js';

// Remote signing
export {
  NIP46_METHODS,
  Nip46RequestSchema,
  Nip46ResponseSchema,
  createNip46Request,
  parseNip46Request,
  respondToNip46Command,
  parseNip46Response,
  getNip46Result,
  parseSignEventResult,
  type Nip46Method,
  type Nip46Request,
  type Nip46Response,
  type Nip46Command,
  type Nip46SignerOptions,
} from './nip46/index.js';
