/**
 * Sealed and gift-wrapped private events.
 *
 * A rumor (identified but unsigned event) is encrypted into a seal signed by
 * the author, and the seal is encrypted again into a gift wrap signed by a
 * throwaway key. Only the recipient named in the wrap's `p` tag can open it.
 * Seal and wrap timestamps are backdated by a random amount so they do not
 * reveal when the rumor was written.
 */

import { randomBytes } from '@noble/hashes/utils';
import {
  GIFT_WRAP_KIND,
  PRIVATE_DIRECT_MESSAGE_KIND,
  SEAL_KIND,
  TIMESTAMP_TWEAK_WINDOW,
} from '../constants.js';
import { InvalidEventError } from '../errors.js';
import { createEvent, nowInSeconds } from '../events/builders.js';
import { getEventHash } from '../events/codec.js';
import { parseEvent, RumorSchema } from '../events/parsers.js';
import { KeyManager } from '../keys/KeyManager.js';
import { verifyEvent } from '../keys/verify.js';
import type { EventTemplate, IdentifiedEvent, SignedEvent } from '../types.js';

function randomPastTimestamp(): number {
  const offset = new DataView(randomBytes(4).buffer).getUint32(0) % TIMESTAMP_TWEAK_WINDOW;
  return nowInSeconds() - offset;
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
 * Binds a template to the author's key and computes its identifier, without
 * signing it.
 */
export function createRumor(keys: KeyManager, template: EventTemplate): IdentifiedEvent {
  const unsigned = keys.toUnsigned(template);
  return { ...unsigned, id: getEventHash(unsigned) };
}

/**
 * Encrypts a rumor for `recipientPubkey` into a kind:13 seal signed by the author.
 */
export function createSeal(
  keys: KeyManager,
  rumor: IdentifiedEvent,
  recipientPubkey: string
): SignedEvent {
  return keys.signEvent({
    kind: SEAL_KIND,
    created_at: randomPastTimestamp(),
    tags: [],
    content: keys.encrypt(recipientPubkey, JSON.stringify(rumor), 'current'),
  });
}

/**
 * Seals a rumor and wraps the seal in a kind:1059 event signed by a throwaway key.
 */
export function createGiftWrap(
  keys: KeyManager,
  rumor: IdentifiedEvent,
  recipientPubkey: string
): SignedEvent {
  const seal = createSeal(keys, rumor, recipientPubkey);
  const throwaway = KeyManager.generate();
  return throwaway.signEvent({
    kind: GIFT_WRAP_KIND,
    created_at: randomPastTimestamp(),
    tags: [['p', recipientPubkey]],
    content: throwaway.encrypt(recipientPubkey, JSON.stringify(seal), 'current'),
  });
}

/**
 * Builds a gift-wrapped kind:14 private direct message for `recipientPubkey`.
 */
export function createPrivateDirectMessage(
  keys: KeyManager,
  recipientPubkey: string,
  text: string
): SignedEvent {
  const rumor = createRumor(
    keys,
    createEvent({
      kind: PRIVATE_DIRECT_MESSAGE_KIND,
      tags: [['p', recipientPubkey]],
      content: text,
    })
  );
  return createGiftWrap(keys, rumor, recipientPubkey);
}

/**
 * Opens a gift wrap addressed to `keys` and returns the rumor inside.
 *
 * @throws {InvalidEventError} If the wrap or seal is malformed, badly signed,
 *   or the seal author differs from the rumor author
 * @throws {DecryptionFailedError} If either layer does not decrypt
 */
export function unwrapGiftWrap(keys: KeyManager, wrap: SignedEvent): IdentifiedEvent {
  if (wrap.kind !== GIFT_WRAP_KIND) {
    throw new InvalidEventError(`expected kind ${GIFT_WRAP_KIND}, got ${wrap.kind}`);
  }
  if (!verifyEvent(wrap)) {
    throw new InvalidEventError('gift wrap signature verification failed');
  }

  const seal = parseEvent(parseJson(keys.decrypt(wrap.pubkey, wrap.content), 'gift wrap'));
  if (seal.kind !== SEAL_KIND) {
    throw new InvalidEventError(`expected seal kind ${SEAL_KIND}, got ${seal.kind}`);
  }
  if (!verifyEvent(seal)) {
    throw new InvalidEventError('seal signature verification failed');
  }

  const parsed = RumorSchema.safeParse(parseJson(keys.decrypt(seal.pubkey, seal.content), 'seal'));
  if (!parsed.success) {
    throw new InvalidEventError('seal does not contain a valid rumor');
  }
  const rumor = parsed.data;
  if (rumor.pubkey !== seal.pubkey) {
    throw new InvalidEventError('seal author does not match rumor author');
  }
  if (getEventHash(rumor) !== rumor.id) {
    throw new InvalidEventError('rumor identifier does not match its content');
  }
  return rumor;
}
