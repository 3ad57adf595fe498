import dnsPacket from 'dns-packet';
import type { DecodedPacket } from 'dns-packet';
import { DNS_RECORD_CLASSES, DNS_RESPONSE_CODES } from './constants.js';
import { ParsingError } from './errors.js';
import type { DnsQuery, DnsQueryInit, DnsRecordClass, DnsResponse, PacketQuestion } from './types.js';
import { getFlagsBitmask, getFlagsFromBitmask, normalizeName, toResponseType } from './utils.js';

// whether `value` is a known record class
function isRecordClass(value: string): value is DnsRecordClass {
  return Object.hasOwn(DNS_RECORD_CLASSES, value);
}

// build an immutable, normalized query
export function createQuery(init: DnsQueryInit): DnsQuery {
  return Object.freeze({
    id: init.id ?? 0,
    name: normalizeName(init.name),
    type: init.type ?? 'A',
    class: init.class ?? 'IN',
    recursionDesired: init.recursionDesired ?? true,
    checkingDisabled: init.checkingDisabled ?? false,
  });
}

// decode a wire-format query into a DnsQuery
export function decodeQuery(message: Buffer): DnsQuery {
  let packet: DecodedPacket;
  try {
    packet = dnsPacket.decode(message);
  } catch (error) {
    throw new ParsingError(`Failed to decode query: ${String(error)}`);
  }

  if (packet.flag_qr) {
    throw new ParsingError('Expected a query, got a response');
  }

  const question = packet.questions?.[0];
  if (!question) {
    throw new ParsingError('Query has no question');
  }

  const questionClass = String(question.class ?? 'IN').toUpperCase();
  if (!isRecordClass(questionClass)) {
    throw new ParsingError(`Unsupported query class: ${questionClass}`);
  }

  return createQuery({
    id: packet.id ?? 0,
    name: question.name,
    type: question.type,
    class: questionClass,
    recursionDesired: packet.flag_rd,
    checkingDisabled: packet.flag_cd,
  });
}

// encode a query, for tests and for backend collaborators that speak the wire format
export function encodeQuery(query: DnsQuery): Buffer {
  return dnsPacket.encode({
    type: 'query',
    id: query.id,
    flags: getFlagsBitmask([
      ...(query.recursionDesired ? (['RD'] as const) : []),
      ...(query.checkingDisabled ? (['CD'] as const) : []),
    ]),
    questions: [toPacketQuestion(query)],
  });
}

// encode a response; provenance stays behind
export function encodeResponse(response: DnsResponse): Buffer {
  return dnsPacket.encode({
    type: 'response',
    id: response.id,
    // rcode goes in the low 4 bits of the flags word
    flags: getFlagsBitmask(response.flags) | DNS_RESPONSE_CODES[response.rcode],
    questions: response.question ? [toPacketQuestion(response.question)] : [],
    answers: response.answers,
    authorities: response.authorities,
    additionals: response.additionals,
  });
}

// decode a wire-format response, tagging it with the given provenance
export function decodeResponse(
  message: Buffer,
  provenance: DnsResponse['provenance']
): DnsResponse {
  let packet: DecodedPacket;
  try {
    packet = dnsPacket.decode(message);
  } catch (error) {
    throw new ParsingError(`Failed to decode response: ${String(error)}`);
  }

  const rcode = toResponseType(packet.flags === undefined ? 0 : packet.flags & 0x0f);
  if (rcode === null) {
    throw new ParsingError(`Unknown response code in flags ${packet.flags}`);
  }

  const question = packet.questions?.[0];
  const questionClass = String(question?.class ?? 'IN').toUpperCase();
  return {
    id: packet.id ?? 0,
    rcode,
    flags: getFlagsFromBitmask(packet.flags ?? 0),
    question:
      question && isRecordClass(questionClass)
        ? createQuery({
            id: packet.id,
            name: question.name,
            type: question.type,
            class: questionClass,
            recursionDesired: packet.flag_rd,
            checkingDisabled: packet.flag_cd,
          })
        : null,
    answers: packet.answers ?? [],
    authorities: packet.authorities ?? [],
    additionals: packet.additionals ?? [],
    provenance,
  };
}

function toPacketQuestion(query: DnsQuery): PacketQuestion {
  return { name: query.name, type: query.type, class: query.class };
}
