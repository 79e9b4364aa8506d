/**
 * Wire frames exchanged between a client and a relay.
 *
 * Client → relay: `["EVENT", event]`, `["REQ", id, ...filters]`, `["CLOSE", id]`.
 * Relay → client: `EVENT`, `OK`, `EOSE`, `NOTICE`, `CLOSED`, `AUTH`. Trailing
 * elements beyond the known ones are ignored.
 */

import { SignedEventSchema, type SignedEvent } from '@nostrand/core';
import type { Filter } from 'nostr-tools/filter';
import { z } from 'zod';

export type ClientFrame =
  | ['EVENT', SignedEvent]
  | ['REQ', string, ...Filter[]]
  | ['CLOSE', string];

export type RelayMessage =
  | { type: 'EVENT'; subscriptionId: string; event: SignedEvent }
  | { type: 'OK'; eventId: string; accepted: boolean; message: string }
  | { type: 'EOSE'; subscriptionId: string }
  | { type: 'NOTICE'; message: string }
  | { type: 'CLOSED'; subscriptionId: string; message: string }
  | { type: 'AUTH'; challenge: string };

export type ParseResult = { ok: true; message: RelayMessage } | { ok: false; reason: string };

const EventMessageSchema = z
  .tuple([z.literal('EVENT'), z.string(), SignedEventSchema])
  .rest(z.unknown());
const OkMessageSchema = z
  .tuple([z.literal('OK'), z.string(), z.boolean(), z.string()])
  .rest(z.unknown());
const EoseMessageSchema = z.tuple([z.literal('EOSE'), z.string()]).rest(z.unknown());
const NoticeMessageSchema = z.tuple([z.literal('NOTICE'), z.string()]).rest(z.unknown());
const ClosedMessageSchema = z
  .tuple([z.literal('CLOSED'), z.string(), z.string()])
  .rest(z.unknown());
const AuthMessageSchema = z.tuple([z.literal('AUTH'), z.string()]).rest(z.unknown());

/**
 * Serializes a client frame for transmission.
 */
export function encodeClientFrame(frame: ClientFrame): string {
  return JSON.stringify(frame);
}

function describeIssues(tag: string, error: z.ZodError): string {
  const issue = error.issues[0];
  const path = issue?.path.join('.') || 'frame';
  return `malformed ${tag} frame: ${path}: ${issue?.message ?? 'invalid'}`;
}

/**
 * Decodes one relay frame. Never throws: unrecognized or malformed input is
 * reported as `{ ok: false, reason }`.
 */
export function parseRelayMessage(raw: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid JSON' };
  }
  if (!Array.isArray(data) || data.length === 0) {
    return { ok: false, reason: 'frame is not a non-empty array' };
  }

  const tag: unknown = data[0];
  switch (tag) {
    case 'EVENT': {
      const result = EventMessageSchema.safeParse(data);
      if (!result.success) return { ok: false, reason: describeIssues(tag, result.error) };
      const [, subscriptionId, event] = result.data;
      return { ok: true, message: { type: 'EVENT', subscriptionId, event } };
    }
    case 'OK': {
      const result = OkMessageSchema.safeParse(data);
      if (!result.success) return { ok: false, reason: describeIssues(tag, result.error) };
      const [, eventId, accepted, message] = result.data;
      return { ok: true, message: { type: 'OK', eventId, accepted, message } };
    }
    case 'EOSE': {
      const result = EoseMessageSchema.safeParse(data);
      if (!result.success) return { ok: false, reason: describeIssues(tag, result.error) };
      return { ok: true, message: { type: 'EOSE', subscriptionId: result.data[1] } };
    }
    case 'NOTICE': {
      const result = NoticeMessageSchema.safeParse(data);
      if (!result.success) return { ok: false, reason: describeIssues(tag, result.error) };
      return { ok: true, message: { type: 'NOTICE', message: result.data[1] } };
    }
    case 'CLOSED': {
      const result = ClosedMessageSchema.safeParse(data);
      if (!result.success) return { ok: false, reason: describeIssues(tag, result.error) };
      const [, subscriptionId, message] = result.data;
      return { ok: true, message: { type: 'CLOSED', subscriptionId, message } };
    }
    case 'AUTH': {
      const result = AuthMessageSchema.safeParse(data);
      if (!result.success) return { ok: false, reason: describeIssues(tag, result.error) };
      return { ok: true, message: { type: 'AUTH', challenge: result.data[1] } };
    }
    default:
      return { ok: false, reason: `unknown message type: ${String(tag)}` };
  }
}
