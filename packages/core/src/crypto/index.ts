/**
 * Versioned payload encryption.
 */

export { encrypt, decrypt, encryptText, decryptText, detectVersion } from './CipherSuite.js';
export { calcPaddedLength } from './current.js';
