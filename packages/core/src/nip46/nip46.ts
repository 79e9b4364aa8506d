/**
 * Remote signing over kind:24133 events.
 *
 * A client holds only its own key and sends encrypted requests to a remote
 * signer's public key. The signer performs the operation with the secret it
 * holds and answers with an encrypted response addressed back to the client,
 * under the same cipher generation the request used.
 */

import { bytesToHex, randomBytes } from '@noble/hashes/utils';
import { z } from 'zod';
import { NOSTR_CONNECT_KIND } from '../constants.js';
import { detectVersion } from '../crypto/CipherSuite.js';
import { InvalidEventError, NostrandError, RemoteSignerError } from '../errors.js';
import { createEvent } from '../events/builders.js';
import { parseEvent, SignedEventSchema } from '../events/parsers.js';
import type { KeyManager } from '../keys/KeyManager.js';
import { normalizePublicKey, verifyEvent } from '../keys/verify.js';
import type { CipherVersion, EventTemplate, SignedEvent } from '../types.js';

export const NIP46_METHODS = [
  'connect',
  'disconnect',
  'ping',
  'get_public_key',
  'sign_event',
  'nip04_encrypt',
  'nip04_decrypt',
  'nip44_encrypt',
  'nip44_decrypt',
] as const;

export type Nip46Method = (typeof NIP46_METHODS)[number];

export const Nip46RequestSchema = z.object({
  id: z.string().min(1),
  method: z.enum(NIP46_METHODS),
  params: z.array(z.string()),
});

export type Nip46Request = z.infer<typeof Nip46RequestSchema>;

export const Nip46ResponseSchema = z.object({
  id: z.string().min(1),
  result: z.string(),
  error: z.string().optional(),
});

export type Nip46Response = z.infer<typeof Nip46ResponseSchema>;

const EventTemplateSchema = SignedEventSchema.pick({
  kind: true,
  created_at: true,
  tags: true,
  content: true,
});

type CipherMethod = 'nip04_encrypt' | 'nip04_decrypt' | 'nip44_encrypt' | 'nip44_decrypt';

/**
 * A request as the signer sees it once decrypted and validated.
 */
export type Nip46Command = {
  id: string;
  /** Public key of the client that sent the request */
  client: string;
  /** Cipher generation of the request, reused for the response */
  version: CipherVersion;
} & (
  | { method: 'connect'; signerPubkey: string | undefined; secret: string | undefined }
  | { method: 'disconnect' | 'ping' | 'get_public_key' }
  | { method: 'sign_event'; template: EventTemplate }
  | { method: CipherMethod; peer: string; payload: string }
);

export interface Nip46SignerOptions {
  /** Connection secret a `connect` request must present (default: none required) */
  secret?: string;
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidEventError(
      `${what} content is not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Checks kind and signature, then decrypts the content from its author.
 */
function openMessage(keys: KeyManager, event: SignedEvent, what: string): unknown {
  if (event.kind !== NOSTR_CONNECT_KIND) {
    throw new InvalidEventError(`expected kind ${NOSTR_CONNECT_KIND}, got ${event.kind}`);
  }
  if (!verifyEvent(event)) {
    throw new InvalidEventError(`${what} signature verification failed`);
  }
  return parseJson(keys.decrypt(event.pubkey, event.content), what);
}

function sealMessage(
  keys: KeyManager,
  recipientPubkey: string,
  body: Nip46Request | Nip46Response,
  version: CipherVersion
): SignedEvent {
  return keys.signEvent(
    createEvent({
      kind: NOSTR_CONNECT_KIND,
      tags: [['p', recipientPubkey]],
      content: keys.encrypt(recipientPubkey, JSON.stringify(body), version),
    })
  );
}

/**
 * Builds a signed, encrypted request for the signer at `signerPubkey`.
 *
 * @example
 * ```typescript
 * const { request, event } = createNip46Request(keys, signerPubkey, 'sign_event', [
 *   JSON.stringify(createEvent({ content: 'hello' })),
 * ]);
 * ```
 */
export function createNip46Request(
  keys: KeyManager,
  signerPubkey: string,
  method: Nip46Method,
  params: string[] = [],
  version: CipherVersion = 'current'
): { request: Nip46Request; event: SignedEvent } {
  const request: Nip46Request = { id: bytesToHex(randomBytes(8)), method, params: [...params] };
  return { request, event: sealMessage(keys, signerPubkey, request, version) };
}

/**
 * Opens a request addressed to the signer's `keys`.
 *
 * @throws {InvalidEventError} If the event, request body or method params are malformed
 * @throws {DecryptionFailedError} If the content does not decrypt
 */
export function parseNip46Request(keys: KeyManager, event: SignedEvent): Nip46Command {
  const body = openMessage(keys, event, 'request');
  const parsed = Nip46RequestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || 'request';
    throw new InvalidEventError(`Invalid request: ${path}: ${issue?.message ?? 'malformed'}`);
  }

  const { id, method, params } = parsed.data;
  const base = { id, client: event.pubkey, version: detectVersion(event.content) };

  switch (method) {
    case 'connect':
      return { ...base, method, signerPubkey: params[0], secret: params[1] };
    case 'disconnect':
    case 'ping':
    case 'get_public_key':
      return { ...base, method };
    case 'sign_event': {
      const template = EventTemplateSchema.safeParse(
        params.length > 0 ? parseJson(params[0], 'sign_event') : undefined
      );
      if (!template.success) {
        throw new InvalidEventError('sign_event params must hold an event template');
      }
      return { ...base, method, template: template.data };
    }
    case 'nip04_encrypt':
    case 'nip04_decrypt':
    case 'nip44_encrypt':
    case 'nip44_decrypt': {
      const peer = params.length >= 2 ? normalizePublicKey(params[0]) : undefined;
      if (!peer) {
        throw new InvalidEventError(`${method} params must be a public key and a text`);
      }
      return { ...base, method, peer, payload: params[1] };
    }
  }
}

function cipherVersionOf(method: CipherMethod): CipherVersion {
  return method.startsWith('nip04') ? 'legacy' : 'current';
}

function execute(keys: KeyManager, command: Nip46Command, options: Nip46SignerOptions): string {
  switch (command.method) {
    case 'connect':
      if (command.signerPubkey !== undefined && command.signerPubkey !== keys.publicKey) {
        throw new RemoteSignerError('unknown signer', command.id);
      }
      if (options.secret !== undefined && command.secret !== options.secret) {
        throw new RemoteSignerError('invalid secret', command.id);
      }
      return 'ack';
    case 'disconnect':
      return 'ack';
    case 'ping':
      return 'pong';
    case 'get_public_key':
      return keys.publicKey;
    case 'sign_event':
      return JSON.stringify(keys.signEvent(command.template));
    case 'nip04_encrypt':
    case 'nip44_encrypt':
      return keys.encrypt(command.peer, command.payload, cipherVersionOf(command.method));
    case 'nip04_decrypt':
    case 'nip44_decrypt': {
      const expected = cipherVersionOf(command.method);
      if (detectVersion(command.payload) !== expected) {
        throw new RemoteSignerError(`${command.method} expects a ${expected} envelope`, command.id);
      }
      return keys.decrypt(command.peer, command.payload);
    }
  }
}

/**
 * Performs `command` with the signer's `keys` and builds the encrypted
 * response for the client. Failures of the operation itself are reported to
 * the client in the response's `error` field.
 */
export function respondToNip46Command(
  keys: KeyManager,
  command: Nip46Command,
  options: Nip46SignerOptions = {}
): SignedEvent {
  let response: Nip46Response;
  try {
    response = { id: command.id, result: execute(keys, command, options) };
  } catch (error) {
    if (!(error instanceof NostrandError)) throw error;
    response = { id: command.id, result: '', error: error.message };
  }
  return sealMessage(keys, command.client, response, command.version);
}

/**
 * Opens a response addressed to the client's `keys`.
 *
 * @throws {InvalidEventError} If the event or response body is malformed
 * @throws {DecryptionFailedError} If the content does not decrypt
 */
export function parseNip46Response(keys: KeyManager, event: SignedEvent): Nip46Response {
  const parsed = Nip46ResponseSchema.safeParse(openMessage(keys, event, 'response'));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || 'response';
    throw new InvalidEventError(`Invalid response: ${path}: ${issue?.message ?? 'malformed'}`);
  }
  return parsed.data;
}

/**
 * Returns the result of a response, or throws the error the signer reported.
 *
 * @throws {RemoteSignerError} If the response carries an error
 */
export function getNip46Result(response: Nip46Response): string {
  if (response.error !== undefined && response.error !== '') {
    throw new RemoteSignerError(response.error, response.id);
  }
  return response.result;
}

/**
 * Extracts and verifies the event a signer returned for `sign_event`.
 *
 * @throws {RemoteSignerError} If the signer reported an error
 * @throws {InvalidEventError} If the result is not a validly signed event
 */
export function parseSignEventResult(response: Nip46Response): SignedEvent {
  const event = parseEvent(parseJson(getNip46Result(response), 'sign_event result'));
  if (!verifyEvent(event)) {
    throw new InvalidEventError('signed event verification failed');
  }
  return event;
}
