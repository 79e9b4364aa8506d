export { KeyManager } from './KeyManager.js';
export { verifySignature, verifyEvent, normalizePublicKey } from './verify.js';
